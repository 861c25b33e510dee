import { GeneralIssueInputArguments, MixOfGeometryAddition, RoadsAndLanesNotAdjusted } from '../errors';
import { wrapAngle } from '../types';
import type { Pose, PoseWithLength } from '../types';
import type { AdjustmentState } from './enums';
import type { GeometryPrimitive } from './geometry';
import type { LaneDef } from './lane-def';
import type { RoadMark } from './lane';
import { attrs, element } from './xml';
import type { XmlElement, XmlSerializable } from './xml';

/**
 * A primitive placed at an absolute pose and s-coordinate
 */
export class PositionedGeometry implements XmlSerializable {
  constructor(
    public s: number,
    readonly x: number,
    readonly y: number,
    readonly h: number,
    readonly geometry: GeometryPrimitive
  ) {}

  get length(): number {
    return this.geometry.length;
  }

  getEndData(): PoseWithLength {
    return this.geometry.getEndData(this.x, this.y, this.h);
  }

  getElement(): XmlElement {
    return element(
      'geometry',
      attrs({ s: this.s, x: this.x, y: this.y, hdg: this.h, length: this.length }),
      [this.geometry.getElement()]
    );
  }
}

interface RawGeometry {
  geometry: GeometryPrimitive;
  heading?: number;
}

type AdditionMode = 'sequential' | 'fixed';

/**
 * Ordered geometry records of one road.
 *
 * Geometries are either appended sequentially and positioned later by
 * `adjustGeometries`, or added at absolute poses with `addFixedGeometry`.
 */
export class PlanView implements XmlSerializable {
  private raw: RawGeometry[] = [];
  private positioned: PositionedGeometry[] = [];
  private additionMode: AdditionMode | undefined;
  private present: Pose = { x: 0, y: 0, h: 0 };
  private presentS = 0;
  private start: Pose | undefined;
  private end: Pose | undefined;
  private pinned = false;
  state: AdjustmentState = 'unadjusted';

  constructor(start?: Pose) {
    if (start) {
      this.setStartPoint(start.x, start.y, start.h);
    }
  }

  /** Start pose set explicitly, or geometry placed at absolute poses */
  get fixed(): boolean {
    return this.pinned;
  }

  get adjusted(): boolean {
    return this.state === 'adjusted';
  }

  get geometries(): readonly PositionedGeometry[] {
    return this.positioned;
  }

  addGeometry(geometry: GeometryPrimitive, heading?: number): this {
    if (this.additionMode === 'fixed') {
      throw new MixOfGeometryAddition('A fixed geometry was already added, use only addFixedGeometry on this plan view');
    }
    if (this.adjusted) {
      throw new GeneralIssueInputArguments('Cannot add geometry to an adjusted plan view');
    }
    this.raw.push(heading === undefined ? { geometry } : { geometry, heading });
    this.additionMode = 'sequential';
    return this;
  }

  addFixedGeometry(geometry: GeometryPrimitive, x: number, y: number, h: number, s?: number): this {
    if (this.additionMode === 'sequential') {
      throw new MixOfGeometryAddition('A geometry was already added with addGeometry, use only one addition mode');
    }
    const placed = new PositionedGeometry(s ?? this.presentS, x, y, h, geometry);
    if (!this.pinned || this.start === undefined) {
      this.start = { x, y, h: wrapAngle(h) };
      this.pinned = true;
    }
    this.positioned.push(placed);
    const endData = placed.getEndData();
    this.end = { x: endData.x, y: endData.y, h: wrapAngle(endData.h) };
    this.presentS = placed.s + endData.length;
    this.additionMode = 'fixed';
    this.state = 'adjusted';
    return this;
  }

  /**
   * Pose the next adjustment starts from. When adjusting from the end this is the
   * end position with the heading pointing backwards along the road.
   */
  setStartPoint(x = 0, y = 0, h = 0): void {
    if (this.adjusted) {
      throw new GeneralIssueInputArguments('Cannot move the start point of an adjusted plan view');
    }
    this.present = { x, y, h };
    this.pinned = true;
  }

  adjustGeometries(fromEnd = false): void {
    if (this.adjusted) {
      throw new GeneralIssueInputArguments('Plan view is already adjusted');
    }
    if (this.raw.length === 0) {
      throw new GeneralIssueInputArguments('Plan view has no geometries to adjust');
    }
    if (fromEnd) {
      this.adjustFromEnd();
    } else {
      this.adjustFromStart();
    }
    this.state = 'adjusted';
  }

  private adjustFromStart(): void {
    let { x, y, h } = this.present;
    let s = 0;
    this.start = { x, y, h: wrapAngle(h) };
    for (const entry of this.raw) {
      if (entry.heading !== undefined) h = entry.heading;
      const placed = new PositionedGeometry(s, x, y, wrapAngle(h), entry.geometry);
      const endData = entry.geometry.getEndData(x, y, h);
      ({ x, y, h } = endData);
      s += endData.length;
      this.positioned.push(placed);
    }
    this.presentS = s;
    this.end = { x, y, h: wrapAngle(h) };
  }

  private adjustFromEnd(): void {
    const anchor = this.present;
    let { x, y, h } = anchor;
    const reversed: { x: number; y: number; h: number; geometry: GeometryPrimitive }[] = [];
    for (let i = this.raw.length - 1; i >= 0; i--) {
      const geometry = this.raw[i].geometry;
      const startData = geometry.getStartData(x, y, h);
      ({ x, y, h } = startData);
      reversed.push({ x, y, h: wrapAngle(h + Math.PI), geometry });
    }
    this.start = { x, y, h: wrapAngle(h + Math.PI) };
    this.end = { x: anchor.x, y: anchor.y, h: wrapAngle(anchor.h + Math.PI) };

    let s = 0;
    for (const record of reversed.reverse()) {
      this.positioned.push(new PositionedGeometry(s, record.x, record.y, record.h, record.geometry));
      s += record.geometry.length;
    }
    this.presentS = s;
  }

  getStartPoint(): Pose {
    if (!this.adjusted || this.start === undefined) {
      throw new RoadsAndLanesNotAdjusted('Plan view start point is not known before adjustment');
    }
    return { ...this.start };
  }

  getEndPoint(): Pose {
    if (!this.adjusted || this.end === undefined) {
      throw new RoadsAndLanesNotAdjusted('Plan view end point is not known before adjustment');
    }
    return { ...this.end };
  }

  getTotalLength(): number {
    if (this.adjusted) return this.presentS;
    return this.raw.reduce((sum, entry) => sum + entry.geometry.length, 0);
  }

  getElement(): XmlElement {
    if (!this.adjusted) {
      throw new RoadsAndLanesNotAdjusted('Plan view must be adjusted before serialization');
    }
    return element('planView', {}, this.positioned.map((geometry) => geometry.getElement()));
  }
}

export interface AdjustablePlanviewOptions {
  leftLaneDefs?: LaneDef[] | number;
  rightLaneDefs?: LaneDef[] | number;
  centerRoadMark?: RoadMark;
  laneWidth?: number;
  laneWidthEnd?: number;
}

/**
 * Placeholder for a road whose geometry is fitted between its already
 * positioned predecessor and successor during network adjustment.
 */
export class AdjustablePlanview {
  readonly fixed = false;
  state: AdjustmentState = 'unadjusted';

  constructor(readonly options: AdjustablePlanviewOptions = {}) {}

  get adjusted(): boolean {
    return this.state === 'adjusted';
  }
}
