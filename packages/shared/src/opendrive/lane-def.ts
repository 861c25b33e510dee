import { GeneralIssueInputArguments } from '../errors';
import { Lane, LaneSection, Lanes } from './lane';
import type { RoadMark } from './lane';
import { LaneLinker } from './links';
import { getCoeffsForPoly3 } from './numeric';
import { brokenRoadMark, solidRoadMark } from './road-marks';

/**
 * Lane count change over [sStart, sEnd) on one side of a road.
 *
 * `subLane` is the signed id of the lane that appears (split) or disappears
 * (merge). Widths are per lane, inside out; end widths default to the start widths.
 */
export class LaneDef {
  readonly laneStartWidths: number[];
  readonly laneEndWidths: number[];

  constructor(
    readonly sStart: number,
    readonly sEnd: number,
    readonly nLanesStart: number,
    readonly nLanesEnd: number,
    readonly subLane?: number,
    laneStartWidths: number[] = [],
    laneEndWidths: number[] = []
  ) {
    this.laneStartWidths = [...laneStartWidths];
    this.laneEndWidths = laneEndWidths.length === 0 ? [...laneStartWidths] : [...laneEndWidths];
  }

  get length(): number {
    return this.sEnd - this.sStart;
  }

  get isMerge(): boolean {
    return this.nLanesStart > this.nLanesEnd;
  }

  get isSplit(): boolean {
    return this.nLanesStart < this.nLanesEnd;
  }

  /** Copy with missing widths filled in and a zero width at the sub lane */
  withResolvedWidths(defaultWidth: number): LaneDef {
    const start =
      this.laneStartWidths.length === 0 ? new Array<number>(this.nLanesStart).fill(defaultWidth) : [...this.laneStartWidths];
    const end =
      this.laneEndWidths.length === 0 ? new Array<number>(this.nLanesEnd).fill(defaultWidth) : [...this.laneEndWidths];

    if (this.subLane !== undefined && this.subLane !== 0) {
      const index = Math.abs(this.subLane) - 1;
      if (end.length > 0 && end.length < this.nLanesStart) {
        end.splice(index, 0, 0);
      } else if (start.length > 0 && start.length < this.nLanesEnd) {
        start.splice(index, 0, 0);
      }
    }
    return new LaneDef(this.sStart, this.sEnd, this.nLanesStart, this.nLanesEnd, this.subLane, start, end);
  }
}

/** Lane layout of one road side: a constant count or a list of changes */
export type LaneSpec = { kind: 'constant'; lanes: number } | { kind: 'changing'; defs: LaneDef[] };

export function toLaneSpec(value: number | LaneDef[]): LaneSpec {
  return typeof value === 'number' ? { kind: 'constant', lanes: value } : { kind: 'changing', defs: value };
}

// change-points closer than this are the same s
const S_TOLERANCE = 1e-9;

function sameS(s1: number, s2: number): boolean {
  return Math.abs(s1 - s2) < S_TOLERANCE;
}

interface SideCursor {
  defs: LaneDef[];
  constant?: number;
  index: number;
  out: LaneDef[];
}

function cursorFor(spec: LaneSpec): SideCursor {
  return spec.kind === 'constant'
    ? { defs: [], constant: spec.lanes, index: 0, out: [] }
    : { defs: [...spec.defs].sort((d1, d2) => d1.sStart - d2.sStart), index: 0, out: [] };
}

function nextDef(side: SideCursor): LaneDef | undefined {
  return side.defs[side.index];
}

/** Lane count kept by a side that has no change starting at the present s */
function steadyLaneCount(side: SideCursor): number {
  const upcoming = nextDef(side);
  if (upcoming) return upcoming.nLanesStart;
  if (side.constant !== undefined) return side.constant;
  const last = side.defs[side.defs.length - 1];
  return last ? last.nLanesEnd : 0;
}

function withoutSubLane(widths: number[], def: LaneDef): number[] {
  if (def.subLane === undefined || def.subLane === 0) return [...widths];
  const index = Math.abs(def.subLane) - 1;
  return widths.filter((_, i) => i !== index);
}

/** Widths of a synthetic constant section, taken from the neighbouring changes */
function steadyWidths(side: SideCursor, count: number, defaultWidth: number): number[] {
  const previous = side.out[side.out.length - 1];
  if (previous) {
    const widths = previous.isMerge ? withoutSubLane(previous.laneEndWidths, previous) : previous.laneEndWidths;
    if (widths.length === count) return [...widths];
  }
  const upcoming = nextDef(side)?.withResolvedWidths(defaultWidth);
  if (upcoming) {
    const widths = upcoming.isSplit ? withoutSubLane(upcoming.laneStartWidths, upcoming) : upcoming.laneStartWidths;
    if (widths.length === count) return widths;
  }
  return new Array<number>(count).fill(defaultWidth);
}

function steadyDef(side: SideCursor, sStart: number, sEnd: number, defaultWidth: number): LaneDef {
  const count = steadyLaneCount(side);
  const widths = steadyWidths(side, count, defaultWidth);
  return new LaneDef(sStart, sEnd, count, count, undefined, widths, widths);
}

/**
 * Expand both road sides into lane definitions that share section boundaries
 * and together tile [0, totalLength).
 */
export function createLaneLists(
  right: LaneSpec,
  left: LaneSpec,
  totalLength: number,
  defaultWidth: number
): { right: LaneDef[]; left: LaneDef[] } {
  const rightSide = cursorFor(right);
  const leftSide = cursorFor(left);
  let presentS = 0;

  while (presentS < totalLength - S_TOLERANCE) {
    const nextRight = nextDef(rightSide);
    const nextLeft = nextDef(leftSide);
    const addRight = nextRight !== undefined && sameS(nextRight.sStart, presentS);
    const addLeft = nextLeft !== undefined && sameS(nextLeft.sStart, presentS);

    if (nextRight && !addRight && nextRight.sStart < presentS) {
      throw new GeneralIssueInputArguments(`Right lane definition at s=${nextRight.sStart} overlaps the previous one`);
    }
    if (nextLeft && !addLeft && nextLeft.sStart < presentS) {
      throw new GeneralIssueInputArguments(`Left lane definition at s=${nextLeft.sStart} overlaps the previous one`);
    }

    if (addRight && addLeft && nextRight && nextLeft) {
      if (!sameS(nextRight.sEnd, nextLeft.sEnd)) {
        throw new GeneralIssueInputArguments(
          `Lane changes starting at s=${presentS} on both sides must end at the same s`
        );
      }
      rightSide.out.push(nextRight.withResolvedWidths(defaultWidth));
      leftSide.out.push(nextLeft.withResolvedWidths(defaultWidth));
      rightSide.index++;
      leftSide.index++;
      presentS = nextRight.sEnd;
    } else if (addRight && nextRight) {
      if (nextLeft && nextLeft.sStart < nextRight.sEnd - S_TOLERANCE) {
        throw new GeneralIssueInputArguments(
          `Left lane change at s=${nextLeft.sStart} starts inside the right lane change ${nextRight.sStart}-${nextRight.sEnd}`
        );
      }
      rightSide.out.push(nextRight.withResolvedWidths(defaultWidth));
      leftSide.out.push(steadyDef(leftSide, presentS, nextRight.sEnd, defaultWidth));
      rightSide.index++;
      presentS = nextRight.sEnd;
    } else if (addLeft && nextLeft) {
      if (nextRight && nextRight.sStart < nextLeft.sEnd - S_TOLERANCE) {
        throw new GeneralIssueInputArguments(
          `Right lane change at s=${nextRight.sStart} starts inside the left lane change ${nextLeft.sStart}-${nextLeft.sEnd}`
        );
      }
      leftSide.out.push(nextLeft.withResolvedWidths(defaultWidth));
      rightSide.out.push(steadyDef(rightSide, presentS, nextLeft.sEnd, defaultWidth));
      leftSide.index++;
      presentS = nextLeft.sEnd;
    } else {
      const sEnd = Math.min(nextRight?.sStart ?? totalLength, nextLeft?.sStart ?? totalLength, totalLength);
      rightSide.out.push(steadyDef(rightSide, presentS, sEnd, defaultWidth));
      leftSide.out.push(steadyDef(leftSide, presentS, sEnd, defaultWidth));
      presentS = sEnd;
    }
  }

  return { right: rightSide.out, left: leftSide.out };
}

interface LaneWidthInput {
  laneWidth: number;
  laneWidthEnd?: number;
}

/** Lane at index `i` (inside out) of one side of a section */
function buildSideLane(def: LaneDef, i: number, widths: LaneWidthInput): Lane {
  const taperIndex = def.subLane === undefined ? -1 : Math.abs(def.subLane) - 1;
  const { laneWidth, laneWidthEnd } = widths;

  if (def.isMerge && i === taperIndex) {
    return Lane.fromCoefficients(getCoeffsForPoly3(def.length, def.laneStartWidths[i], false, def.laneEndWidths[i]));
  }
  if (def.isSplit && i === taperIndex) {
    return Lane.fromCoefficients(getCoeffsForPoly3(def.length, def.laneStartWidths[i], true, def.laneEndWidths[i]));
  }
  if (laneWidthEnd !== undefined && laneWidthEnd !== laneWidth) {
    return Lane.fromCoefficients(getCoeffsForPoly3(def.length, laneWidth, false, laneWidthEnd));
  }
  if (def.laneStartWidths.length > 0) {
    return Lane.fromCoefficients(getCoeffsForPoly3(def.length, def.laneStartWidths[i], false, def.laneEndWidths[i]));
  }
  return new Lane('driving', laneWidth);
}

function laneAt(lanes: Lane[], index: number): Lane | undefined {
  return index >= 0 ? lanes[index] : undefined;
}

function linkIfPresent(linker: LaneLinker, predecessor: Lane | undefined, successor: Lane | undefined): void {
  if (predecessor && successor) {
    linker.addLink(predecessor, successor);
  }
}

/**
 * Build lane sections for a road whose lane counts change along s, with
 * poly3 tapers on merging and splitting lanes and links across section borders.
 */
export function createLanesMergeSplit(
  right: LaneSpec,
  left: LaneSpec,
  roadLength: number,
  centerRoadMark: RoadMark,
  laneWidth: number,
  laneWidthEnd?: number
): Lanes {
  const lists = createLaneLists(right, left, roadLength, laneWidth);
  const widths: LaneWidthInput = laneWidthEnd === undefined ? { laneWidth } : { laneWidth, laneWidthEnd };
  const sections: LaneSection[] = [];

  lists.left.forEach((leftDef, index) => {
    const rightDef = lists.right[index];
    const center = new Lane('driving', 0).addRoadMark(centerRoadMark.clone());
    const section = new LaneSection(leftDef.sStart, center);

    const rightCount = Math.max(rightDef.nLanesStart, rightDef.nLanesEnd);
    for (let i = 0; i < rightCount; i++) {
      const lane = buildSideLane(rightDef, i, widths);
      lane.addRoadMark(i === rightCount - 1 ? solidRoadMark() : brokenRoadMark());
      section.addRightLane(lane);
    }

    const leftCount = Math.max(leftDef.nLanesStart, leftDef.nLanesEnd);
    for (let i = 0; i < leftCount; i++) {
      const lane = buildSideLane(leftDef, i, widths);
      lane.addRoadMark(i === leftCount - 1 ? solidRoadMark() : brokenRoadMark());
      section.addLeftLane(lane);
    }

    sections.push(section);
  });

  const linker = new LaneLinker();
  for (let i = 1; i < sections.length; i++) {
    const previousLanes = sections[i - 1].rightLanes;
    const currentLanes = sections[i].rightLanes;
    const previousDef = lists.right[i - 1];
    const currentDef = lists.right[i];

    if (currentDef.isSplit) {
      const sub = currentDef.subLane ?? 0;
      for (let j = 0; j <= previousDef.nLanesEnd; j++) {
        if (sub < -(j + 1)) linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j));
        else if (sub > -(j + 1)) linkIfPresent(linker, laneAt(previousLanes, j - 1), laneAt(currentLanes, j));
      }
    } else if (previousDef.isMerge) {
      const sub = previousDef.subLane ?? 0;
      for (let j = 0; j <= previousDef.nLanesEnd; j++) {
        if (sub < -(j + 1)) linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j));
        else if (sub > -(j + 1)) linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j - 1));
      }
    } else {
      for (let j = 0; j < previousDef.nLanesEnd; j++) {
        linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j));
      }
    }
  }

  for (let i = 1; i < sections.length; i++) {
    const previousLanes = sections[i - 1].leftLanes;
    const currentLanes = sections[i].leftLanes;
    const previousDef = lists.left[i - 1];
    const currentDef = lists.left[i];

    if (currentDef.isSplit) {
      const sub = currentDef.subLane ?? 0;
      for (let j = 0; j <= previousDef.nLanesEnd; j++) {
        if (sub < j + 1) linkIfPresent(linker, laneAt(previousLanes, j - 1), laneAt(currentLanes, j));
        else if (sub > j + 1) linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j));
      }
    } else if (previousDef.isMerge) {
      const sub = previousDef.subLane ?? 0;
      for (let j = 0; j <= previousDef.nLanesEnd; j++) {
        if (sub < j + 1) linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j - 1));
        else if (sub > j + 1) linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j));
      }
    } else {
      for (let j = 0; j < previousDef.nLanesEnd; j++) {
        linkIfPresent(linker, laneAt(previousLanes, j), laneAt(currentLanes, j));
      }
    }
  }

  const lanes = new Lanes();
  for (const section of sections) {
    lanes.addLaneSection(section, linker);
  }
  return lanes;
}
