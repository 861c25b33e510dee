import { RoadsAndLanesNotAdjusted } from '../errors';
import { logger } from '../logger';
import type { ContactPoint, LinkType } from './enums';
import { ExplicitRoadLine } from './lane';
import type { Lane, RoadLine, RoadMark } from './lane';
import { roadContacts } from './network';
import type { RoadContact } from './network';
import type { Road } from './road';

const PHASE_TOLERANCE = 1e-9;

/** Phase of a line continuing into `lane` across the end a road is aligned from */
type PhaseSource = (lane: Lane, index: number, line: RoadLine) => number | undefined;

function period(line: RoadLine): number {
  return line.length + line.space;
}

/**
 * Position within the dash-and-gap period, 0 where a dash begins.
 * Values within the tolerance of a full period wrap to 0.
 */
function wrap(value: number, length: number): number {
  const phase = ((value % length) + length) % length;
  return length - phase < PHASE_TOLERANCE ? 0 : phase;
}

function isBroken(line: RoadLine): boolean {
  return line.length > 0 && line.space > 0;
}

function samePattern(line: RoadLine, other: RoadLine): boolean {
  return Math.abs(line.length - other.length) < PHASE_TOLERANCE && Math.abs(line.space - other.space) < PHASE_TOLERANCE;
}

/** The lane's only road mark, when it has broken lines */
function brokenMark(lane: Lane | undefined): RoadMark | undefined {
  if (lane === undefined || lane.roadMarks.length !== 1) return undefined;
  const mark = lane.roadMarks[0];
  return mark.roadLines.some(isBroken) ? mark : undefined;
}

function sectionLength(road: Road, index: number): number {
  const sections = road.lanes.laneSections;
  const next = sections[index + 1];
  return (next ? next.s : road.length) - sections[index].s;
}

function sectionAt(road: Road, end: ContactPoint): number {
  return end === 'start' ? 0 : road.lanes.laneSections.length - 1;
}

/** Phase of line `index` of `lane` at one end of its section, if it repeats `line` */
function phaseAt(lane: Lane | undefined, index: number, line: RoadLine, length: number, at: ContactPoint): number | undefined {
  const other = brokenMark(lane)?.roadLines[index];
  if (other === undefined || !isBroken(other) || !samePattern(line, other)) return undefined;
  const start = wrap(-other.sOffset, period(other));
  return at === 'start' ? start : wrap(start + length, period(other));
}

/** Start the pattern so that it has `phase` at the given end of a section */
function alignLine(mark: RoadMark, index: number, line: RoadLine, phase: number, at: ContactPoint, length: number): void {
  const start = at === 'start' ? phase : wrap(phase - length, period(line));
  mark.shiftRoadLine(index, wrap(-start, period(line)));
  // the pattern paints nothing before its sOffset, so a dash cut by the boundary is drawn explicitly
  if (start > PHASE_TOLERANCE && start < line.length) {
    mark.addExplicitRoadLine(new ExplicitRoadLine(line.width, line.length - start, line.tOffset, 0, line.rule));
  }
}

/**
 * Align every broken mark of `road`, section by section away from `from`.
 * The first section takes its phases from `source`; lines it knows nothing
 * about start a dash right at that end.
 */
function alignRoad(road: Road, from: ContactPoint, source: PhaseSource): void {
  const sections = road.lanes.laneSections;
  const order = sections.map((_, index) => index);
  if (from === 'end') order.reverse();
  const linkType: LinkType = from === 'start' ? 'predecessor' : 'successor';
  const facing: ContactPoint = from === 'start' ? 'end' : 'start';

  let previous: number | undefined;
  for (const index of order) {
    const length = sectionLength(road, index);
    for (const lane of sections[index].allLanes) {
      const mark = brokenMark(lane);
      if (!mark) continue;
      const laneId = lane.requireId();
      for (let i = 0; i < mark.roadLines.length; i++) {
        const line = mark.roadLines[i];
        if (!isBroken(line)) continue;
        let phase: number | undefined;
        if (previous === undefined) {
          phase = source(lane, i, line);
        } else {
          const linked = laneId === 0 ? 0 : lane.getLinkedLaneId(linkType) ?? laneId;
          phase = phaseAt(sections[previous].getLane(linked), i, line, sectionLength(road, previous), facing);
        }
        alignLine(mark, i, line, phase ?? 0, from, length);
      }
    }
    previous = index;
  }
  road.lanes.roadMarksAdjusted = true;
}

/**
 * Phases at the end of `road` named by `contact`, seen from the neighbour.
 * A neighbour running the other way sees each dash mirrored.
 */
function continuing(road: Road, contact: RoadContact): PhaseSource {
  const sameDirection = contact.end !== contact.neighborEnd;
  const sectionIndex = sectionAt(road, contact.end);
  const section = road.lanes.getSection(sectionIndex);
  const length = sectionLength(road, sectionIndex);
  const linkType: LinkType = contact.neighborEnd === 'start' ? 'predecessor' : 'successor';

  return (lane, index, line) => {
    const laneId = lane.requireId();
    const linked = contact.linkedBack ? lane.getLinkedLaneId(linkType) : undefined;
    const ownId = laneId === 0 ? 0 : linked ?? (sameDirection ? laneId : -laneId);
    const phase = phaseAt(section.getLane(ownId), index, line, length, contact.end);
    if (phase === undefined) return undefined;
    return sameDirection ? phase : wrap(line.length - phase, period(line));
  };
}

/**
 * Shift the broken road marks of every road so dashes run on without a jump
 * across lane sections and from road to road. Each group of connected roads
 * starts from its first road, with dashes beginning at its start.
 */
export function adjustRoadmarks(roads: ReadonlyMap<number, Road>): void {
  const unpositioned = [...roads.values()].filter((road) => !road.isAdjusted()).map((road) => road.id);
  if (unpositioned.length > 0) {
    throw new RoadsAndLanesNotAdjusted(
      `Roads ${unpositioned.join(', ')} are not adjusted, call adjustRoadsAndLanes() before adjusting road marks`
    );
  }

  for (const anchor of roads.values()) {
    if (anchor.lanes.roadMarksAdjusted) continue;
    alignRoad(anchor, 'start', () => undefined);
    logger.debug(`Road marks of road ${anchor.id} aligned from its start`);

    const queue = [anchor];
    for (let road = queue.shift(); road !== undefined; road = queue.shift()) {
      for (const end of ['start', 'end'] as const) {
        for (const contact of roadContacts(roads, road, end)) {
          const { neighbor } = contact;
          if (neighbor.lanes.roadMarksAdjusted) continue;
          alignRoad(neighbor, contact.neighborEnd, continuing(road, contact));
          logger.debug(`Road marks of road ${neighbor.id} aligned with road ${road.id}`);
          queue.push(neighbor);
        }
      }
    }
  }
}
