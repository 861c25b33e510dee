import { GeneralIssueInputArguments } from '../errors';
import type {
  AdjustmentDomain,
  AdjustmentState,
  ContactPoint,
  ElementType,
  NeighborDirection,
  RoadType,
  SpeedUnit,
  TrafficRule,
} from './enums';
import { ElevationProfile, LateralProfile, Poly3Profile } from './elevation';
import type { LaneSection, Lanes } from './lane';
import { Link, Links } from './links';
import { AdjustablePlanview, PlanView } from './planview';
import type { IdAllocator, RoadObject, Signal } from './signals-objects';
import { attrs, element } from './xml';
import type { XmlElement, XmlSerializable } from './xml';

export type SpeedLimit = number | 'no limit' | 'undefined';

/** Road type record from s onwards, with an optional speed limit */
export class RoadTypeRecord implements XmlSerializable {
  constructor(
    readonly roadType: RoadType,
    readonly s = 0,
    readonly country?: string,
    readonly speed?: SpeedLimit,
    readonly speedUnit: SpeedUnit = 'm/s'
  ) {}

  getElement(): XmlElement {
    const children =
      this.speed === undefined ? [] : [element('speed', attrs({ max: this.speed, unit: this.speedUnit }))];
    return element('type', attrs({ s: this.s, type: this.roadType, country: this.country }), children);
  }
}

export interface RoadOptions {
  /** -1 for an ordinary road, else the id of the junction it belongs to */
  roadType?: number;
  name?: string;
  rule?: TrafficRule;
}

/**
 * One road: reference line, lanes and links to its neighbours.
 */
export class Road implements XmlSerializable {
  readonly id: number;
  planview: PlanView | AdjustablePlanview;
  lanes: Lanes;
  readonly roadType: number;
  readonly name?: string;
  readonly rule?: TrafficRule;

  readonly links = new Links();
  predecessor: Link | undefined;
  successor: Link | undefined;
  /** Lane offsets toward each neighbour, keyed by the neighbour's id */
  readonly laneOffsetPred = new Map<number, number>();
  readonly laneOffsetSuc = new Map<number, number>();
  /** Lane offsets toward roads reached through a direct junction */
  readonly predDirectJunction = new Map<number, number>();
  readonly succDirectJunction = new Map<number, number>();

  readonly types: RoadTypeRecord[] = [];
  readonly elevationProfile = new ElevationProfile();
  readonly lateralProfile = new LateralProfile();
  private readonly objects: RoadObject[] = [];
  private readonly signals: Signal[] = [];
  private neighborCount = 0;
  private idAllocator: IdAllocator | undefined;

  constructor(id: number, planview: PlanView | AdjustablePlanview, lanes: Lanes, options: RoadOptions = {}) {
    this.id = id;
    this.planview = planview;
    this.lanes = lanes;
    this.roadType = options.roadType ?? -1;
    this.name = options.name;
    this.rule = options.rule;
  }

  /** Connecting road inside a junction */
  get isConnector(): boolean {
    return this.roadType !== -1;
  }

  get adjustablePlanview(): AdjustablePlanview | undefined {
    return this.planview instanceof AdjustablePlanview ? this.planview : undefined;
  }

  /** Plan view once it holds real geometry */
  requirePlanview(): PlanView {
    if (!(this.planview instanceof PlanView)) {
      throw new GeneralIssueInputArguments(`Road ${this.id} has no geometry yet`);
    }
    return this.planview;
  }

  adjustmentState(domain: AdjustmentDomain): AdjustmentState {
    switch (domain) {
      case 'planview':
        return this.planview.state;
      case 'elevation':
        return this.elevationProfile.state;
      case 'superelevation':
        return this.lateralProfile.superelevationState;
      case 'shape':
        return this.lateralProfile.shapeState;
    }
  }

  isAdjusted(domain: AdjustmentDomain = 'planview'): boolean {
    return this.adjustmentState(domain) === 'adjusted';
  }

  get length(): number {
    return this.requirePlanview().getTotalLength();
  }

  /** Lane section at one end of the road, with the section-local s of that end */
  contactSection(contactPoint: ContactPoint): { section: LaneSection; s: number } {
    if (contactPoint === 'start') {
      return { section: this.lanes.getSection(0), s: 0 };
    }
    const section = this.lanes.getSection(-1);
    return { section, s: this.length - section.s };
  }

  addSuccessor(elementType: ElementType, elementId: number, contactPoint?: ContactPoint, laneOffset = 0): this {
    if (this.successor) {
      throw new GeneralIssueInputArguments(`Road ${this.id} already has a successor`);
    }
    this.successor = new Link('successor', elementId, { elementType, contactPoint });
    this.links.add(this.successor);
    this.laneOffsetSuc.set(elementId, laneOffset);
    return this;
  }

  addPredecessor(elementType: ElementType, elementId: number, contactPoint?: ContactPoint, laneOffset = 0): this {
    if (this.predecessor) {
      throw new GeneralIssueInputArguments(`Road ${this.id} already has a predecessor`);
    }
    this.predecessor = new Link('predecessor', elementId, { elementType, contactPoint });
    this.links.add(this.predecessor);
    this.laneOffsetPred.set(elementId, laneOffset);
    return this;
  }

  addNeighbor(elementType: ElementType, elementId: number, direction: NeighborDirection): this {
    if (this.neighborCount > 1) {
      throw new GeneralIssueInputArguments(`Road ${this.id} already has two neighbors`);
    }
    this.links.add(new Link('neighbor', elementId, { elementType, direction }));
    this.neighborCount++;
    return this;
  }

  addElevation(s: number, a: number, b: number, c: number, d: number): this {
    this.elevationProfile.addElevation(new Poly3Profile(s, a, b, c, d, 'elevation'));
    return this;
  }

  addSuperelevation(s: number, a: number, b: number, c: number, d: number): this {
    this.lateralProfile.addSuperelevation(new Poly3Profile(s, a, b, c, d, 'superelevation'));
    return this;
  }

  addShape(s: number, t: number, a: number, b: number, c: number, d: number): this {
    this.lateralProfile.addShape(new Poly3Profile(s, a, b, c, d, 'shape', t));
    return this;
  }

  addType(roadType: RoadType, s = 0, country?: string, speed?: SpeedLimit, speedUnit: SpeedUnit = 'm/s'): this {
    this.types.push(new RoadTypeRecord(roadType, s, country, speed, speedUnit));
    return this;
  }

  addObject(object: RoadObject | RoadObject[]): this {
    for (const entry of Array.isArray(object) ? object : [object]) {
      this.assignId(entry);
      this.objects.push(entry);
    }
    return this;
  }

  addSignal(signal: Signal | Signal[]): this {
    for (const entry of Array.isArray(signal) ? signal : [signal]) {
      this.assignId(entry);
      this.signals.push(entry);
    }
    return this;
  }

  get roadObjects(): readonly RoadObject[] {
    return this.objects;
  }

  get roadSignals(): readonly Signal[] {
    return this.signals;
  }

  /**
   * Register with the network's id allocator. Features added before get their
   * ids now, later ones when they are added.
   */
  attachIdAllocator(allocator: IdAllocator): void {
    this.idAllocator = allocator;
    for (const feature of [...this.objects, ...this.signals]) {
      this.assignId(feature);
    }
  }

  private assignId(feature: RoadObject | Signal): void {
    if (this.idAllocator) {
      feature.id = this.idAllocator.assign(feature.kind, feature.id);
    }
  }

  getElement(): XmlElement {
    const planview = this.requirePlanview();
    const children: XmlElement[] = [
      this.links.getElement(),
      ...this.types.map((type) => type.getElement()),
      planview.getElement(),
      this.elevationProfile.getElement(),
      this.lateralProfile.getElement(),
      this.lanes.getElement(),
    ];
    if (this.objects.length > 0) {
      children.push(
        element(
          'objects',
          {},
          this.objects.map((object) => object.getElement())
        )
      );
    }
    if (this.signals.length > 0) {
      children.push(
        element(
          'signals',
          {},
          this.signals.map((signal) => signal.getElement())
        )
      );
    }
    return element(
      'road',
      attrs({
        name: this.name,
        rule: this.rule,
        id: this.id,
        junction: this.roadType,
        length: planview.getTotalLength(),
      }),
      children
    );
  }
}
