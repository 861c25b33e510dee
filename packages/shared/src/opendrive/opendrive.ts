import { settings } from '../config';
import {
  GeneralIssueInputArguments,
  IdAlreadyExists,
  MixingDrivingDirection,
  RoadsAndLanesNotAdjusted,
  UndefinedRoadNetwork,
} from '../errors';
import { logger } from '../logger';
import type { Pose } from '../types';
import { ThreeClothoidG2Solver } from './clothoid';
import type { ClothoidG2Solver } from './clothoid';
import type { ContactPoint, LinkType } from './enums';
import { adjustElevations } from './elevation-adjuster';
import { spiralsFromSegments } from './generators';
import { Junction, JunctionGroup } from './junction';
import type { DirectJunctionCreator, JunctionCreator } from './junction-creator';
import type { Lane, Lanes } from './lane';
import { createLanesMergeSplit, LaneDef, toLaneSpec } from './lane-def';
import { createLaneLinks } from './lane-linking';
import type { Link } from './links';
import { PlanView } from './planview';
import type { AdjustablePlanview } from './planview';
import type { Road } from './road';
import { solidRoadMark } from './road-marks';
import { adjustRoadmarks } from './roadmark-adjuster';
import { IdAllocator } from './signals-objects';
import { attrs, element, toXmlString, writeXml } from './xml';
import type { XmlElement, XmlSerializable } from './xml';

export interface HeaderOptions {
  revMajor?: string;
  revMinor?: string;
  geoReference?: string;
  date?: Date;
}

export class Header implements XmlSerializable {
  readonly revMajor: string;
  readonly revMinor: string;
  readonly geoReference?: string;
  private readonly date?: Date;

  constructor(
    readonly name: string,
    options: HeaderOptions = {}
  ) {
    const config = settings.get();
    this.revMajor = options.revMajor ?? config.revMajor;
    this.revMinor = options.revMinor ?? config.revMinor;
    this.geoReference = options.geoReference;
    this.date = options.date;
  }

  getElement(): XmlElement {
    const children = this.geoReference === undefined ? [] : [element('geoReference', {}, [], this.geoReference)];
    return element(
      'header',
      attrs({
        name: this.name,
        revMajor: this.revMajor,
        revMinor: this.revMinor,
        date: (this.date ?? new Date()).toISOString(),
        north: '0.0',
        south: '0.0',
        east: '0.0',
        west: '0.0',
      }),
      children
    );
  }
}

export interface OpenDriveOptions extends HeaderOptions {
  /** Fits the geometry of roads with an AdjustablePlanview */
  solver?: ClothoidG2Solver;
}

/** Where a road touches an already positioned neighbour */
interface Contact {
  neighbor: Road;
  contactPoint: ContactPoint;
}

function contactOf(link: Link, road: Road): ContactPoint {
  if (link.contactPoint === undefined) {
    throw new GeneralIssueInputArguments(`The ${link.linkType} link of road ${road.id} has no contact point`);
  }
  return link.contactPoint;
}

/** Pose at `contactPoint`, heading away from the neighbour */
function outwardPose(neighbor: Road, contactPoint: ContactPoint): Pose {
  const planview = neighbor.requirePlanview();
  if (contactPoint === 'start') {
    const start = planview.getStartPoint();
    return { ...start, h: start.h + Math.PI };
  }
  return planview.getEndPoint();
}

/** (x, y) moved `distance` to the left of heading h */
function shiftLeft(pose: Pose, distance: number): Pose {
  return { x: pose.x - distance * Math.sin(pose.h), y: pose.y + distance * Math.cos(pose.h), h: pose.h };
}

/**
 * Lateral distance covered by `lanes` lanes of `neighbor` at the contact:
 * left lane widths for a positive count, negated right lane widths for a negative one.
 */
function offsetWidth(neighbor: Road, contactPoint: ContactPoint, lanes: number): number {
  if (lanes === 0) return 0;
  const { section, s } = neighbor.contactSection(contactPoint);
  const side = lanes > 0 ? section.leftLanes : section.rightLanes;
  const count = Math.abs(lanes);
  if (side.length < count) {
    throw new GeneralIssueInputArguments(
      `Road ${neighbor.id} has only ${side.length} ${lanes > 0 ? 'left' : 'right'} lanes, an offset of ${lanes} lanes was asked for`
    );
  }
  const width = side.slice(0, count).reduce((sum, lane) => sum + lane.getWidth(s), 0);
  return lanes > 0 ? width : -width;
}

function widthsAt(lanes: readonly Lane[], s: number): number[] {
  return lanes.map((lane) => lane.getWidth(s));
}

/** Pads the shorter list with zero-width outer lanes */
function padded(widths: number[], count: number): number[] {
  return [...widths, ...new Array<number>(count - widths.length).fill(0)];
}

/**
 * Road network: roads, junctions and the header, plus the adjustment that
 * positions every road from its neighbours and links their lanes.
 */
export class OpenDrive implements XmlSerializable {
  readonly roads = new Map<number, Road>();
  readonly junctions: Junction[] = [];
  readonly junctionGroups: JunctionGroup[] = [];
  readonly header: Header;
  readonly idAllocator = new IdAllocator();
  private readonly solver: ClothoidG2Solver;

  constructor(
    readonly name: string,
    options: OpenDriveOptions = {}
  ) {
    this.header = new Header(name, options);
    this.solver = options.solver ?? new ThreeClothoidG2Solver();
  }

  addRoad(road: Road): this {
    if (this.roads.has(road.id)) {
      throw new IdAlreadyExists(`Road id ${road.id} has already been added`);
    }
    road.attachIdAllocator(this.idAllocator);
    this.roads.set(road.id, road);
    return this;
  }

  addJunction(junction: Junction): this {
    if (this.junctions.some((existing) => existing.id === junction.id)) {
      throw new IdAlreadyExists(`Junction id ${junction.id} has already been added`);
    }
    this.junctions.push(junction);
    return this;
  }

  addJunctionGroup(group: JunctionGroup): this {
    if (this.junctionGroups.some((existing) => existing.id === group.id)) {
      throw new IdAlreadyExists(`Junction group id ${group.id} has already been added`);
    }
    this.junctionGroups.push(group);
    return this;
  }

  /** Adds the creator's junction, and its connecting roads for a default junction */
  addJunctionCreator(creator: JunctionCreator | DirectJunctionCreator): this {
    if (creator.junction.junctionType === 'default' && 'getConnectingRoads' in creator) {
      for (const road of creator.getConnectingRoads()) {
        this.addRoad(road);
      }
    }
    return this.addJunction(creator.junction);
  }

  /** Position every road, then link lanes between every pair of roads */
  adjustRoadsAndLanes(): void {
    this.adjustStartpoints();
    const roads = [...this.roads.values()];
    for (let i = 0; i < roads.length; i++) {
      for (let j = i + 1; j < roads.length; j++) {
        createLaneLinks(roads[i], roads[j]);
      }
    }
  }

  /** Fill missing elevation and superelevation profiles from the neighbouring roads */
  adjustElevations(): void {
    adjustElevations(this.roads);
  }

  /** Align broken road marks across lane sections and roads */
  adjustRoadmarks(): void {
    adjustRoadmarks(this.roads);
  }

  private requireRoad(id: number, from: Road): Road {
    const road = this.roads.get(id);
    if (!road) {
      throw new UndefinedRoadNetwork(`Road ${from.id} links to road ${id}, which is not in the network`);
    }
    return road;
  }

  /**
   * Position all roads. Pinned roads are placed first, or else the first
   * ordinary road at the origin; then every road is placed from a positioned
   * neighbour until none are left.
   */
  adjustStartpoints(): void {
    let adjusted = 0;
    let anchored = false;

    for (const road of this.roads.values()) {
      if (road.planview.fixed && !road.isAdjusted()) {
        road.requirePlanview().adjustGeometries();
        logger.debug(`Road ${road.id} adjusted from its pinned start point`);
        adjusted++;
        anchored = true;
      } else if (road.isAdjusted()) {
        adjusted++;
        anchored = true;
      }
    }

    if (!anchored && this.roads.size > 0) {
      const anchor = [...this.roads.values()].find((road) => !road.isConnector && !road.adjustablePlanview);
      if (!anchor) {
        throw new UndefinedRoadNetwork('The network has no ordinary road to start the adjustment from');
      }
      anchor.requirePlanview().adjustGeometries();
      logger.debug(`Road ${anchor.id} anchored at the origin`);
      adjusted++;
    }

    while (adjusted < this.roads.size) {
      let adjustedThisPass = 0;
      for (const road of this.roads.values()) {
        if (!road.isAdjusted()) {
          adjustedThisPass += this.adjustRoad(road);
        }
      }
      adjusted += adjustedThisPass;
      if (adjustedThisPass === 0 && adjusted < this.roads.size) {
        const missing = [...this.roads.values()].filter((road) => !road.isAdjusted()).map((road) => road.id);
        throw new UndefinedRoadNetwork(
          `Roads ${missing.join(', ')} cannot be reached from a positioned road; add links or a start point for one of them`
        );
      }
    }
  }

  /** Number of roads positioned, including any chained through a connecting road */
  private adjustRoad(road: Road): number {
    const adjustable = road.adjustablePlanview;
    if (adjustable) {
      return this.adjustAdjustablePlanview(road, adjustable) ? 1 : 0;
    }

    const predecessor = road.predecessor;
    if (predecessor?.elementType === 'road') {
      const neighbor = this.requireRoad(predecessor.elementId, road);
      if (neighbor.isAdjusted()) {
        this.checkConnection(road, predecessor, neighbor);
        this.attach(road, neighbor, contactOf(predecessor, road), 'predecessor');
        return 1 + this.chainThrough(road, 'successor');
      }
    }

    const successor = road.successor;
    if (successor?.elementType === 'road') {
      const neighbor = this.requireRoad(successor.elementId, road);
      if (neighbor.isAdjusted()) {
        this.checkConnection(road, successor, neighbor);
        this.attach(road, neighbor, contactOf(successor, road), 'successor');
        return 1 + this.chainThrough(road, 'predecessor');
      }
    }

    if (successor?.elementType === 'junction') {
      const contact = this.directJunctionContact(road, road.succDirectJunction);
      if (contact) {
        this.attach(road, contact.neighbor, contact.contactPoint, 'successor');
        return 1;
      }
    }
    if (predecessor?.elementType === 'junction') {
      const contact = this.directJunctionContact(road, road.predDirectJunction);
      if (contact) {
        this.attach(road, contact.neighbor, contact.contactPoint, 'predecessor');
        return 1;
      }
    }
    return 0;
  }

  /**
   * The neighbour must link back: to this road for an ordinary road, to the
   * junction for a connecting road.
   */
  private checkConnection(road: Road, link: Link, neighbor: Road): void {
    const back = contactOf(link, road) === 'start' ? neighbor.predecessor : neighbor.successor;
    const expected = road.isConnector
      ? back?.elementType === 'junction' && back.elementId === road.roadType
      : back?.elementType === 'road' && back.elementId === road.id;
    if (!expected) {
      throw new MixingDrivingDirection(
        `Road ${road.id} and road ${neighbor.id} have a mismatch in connections, check predecessors, successors and contact points`
      );
    }
  }

  private declaredOffset(road: Road, neighborId: number, side: LinkType): number {
    return side === 'predecessor'
      ? road.predDirectJunction.get(neighborId) ?? road.laneOffsetPred.get(neighborId) ?? 0
      : road.succDirectJunction.get(neighborId) ?? road.laneOffsetSuc.get(neighborId) ?? 0;
  }

  /**
   * Place `road` against `neighbor`. As a predecessor the neighbour fixes the
   * road's start, as a successor its end; lane offsets move the road sideways.
   */
  private attach(road: Road, neighbor: Road, contactPoint: ContactPoint, side: LinkType, lanes?: number): void {
    const anchor = outwardPose(neighbor, contactPoint);
    const width = offsetWidth(neighbor, contactPoint, lanes ?? this.declaredOffset(road, neighbor.id, side));
    const planview = road.requirePlanview();
    // a successor's anchor heading already points back along the road
    const start = shiftLeft(anchor, side === 'predecessor' ? width : -width);
    planview.setStartPoint(start.x, start.y, start.h);
    planview.adjustGeometries(side === 'successor');
    logger.debug(`Road ${road.id} adjusted from its ${side} ${neighbor.id} at its ${contactPoint}`);
  }

  /**
   * A connecting road placed from one side positions the road on its other side
   * right away. That road uses its own offset toward the connector if it has
   * one, else the connector's offset toward it, inverted.
   */
  private chainThrough(connector: Road, farSide: LinkType): number {
    if (!connector.isConnector) return 0;
    const link = farSide === 'successor' ? connector.successor : connector.predecessor;
    if (link?.elementType !== 'road') return 0;
    const far = this.requireRoad(link.elementId, connector);
    if (far.isAdjusted() || far.adjustablePlanview) return 0;

    const contactPoint = contactOf(link, connector);
    const connectorEnd: ContactPoint = farSide === 'successor' ? 'end' : 'start';
    const farLinkType: LinkType = contactPoint === 'start' ? 'predecessor' : 'successor';
    const own =
      farLinkType === 'predecessor'
        ? far.predDirectJunction.get(connector.id) ?? far.laneOffsetPred.get(connector.id)
        : far.succDirectJunction.get(connector.id) ?? far.laneOffsetSuc.get(connector.id);

    if (own !== undefined && own !== 0) {
      this.attach(far, connector, connectorEnd, farLinkType, own);
      return 1;
    }

    const lanes = this.declaredOffset(connector, far.id, farSide);
    const width = offsetWidth(far, contactPoint, lanes);
    const planview = connector.requirePlanview();
    const pose = connectorEnd === 'end' ? planview.getEndPoint() : planview.getStartPoint();
    const anchor = shiftLeft(pose, -width);
    const heading = farSide === 'predecessor' ? pose.h + Math.PI : pose.h;
    const farPlanview = far.requirePlanview();
    farPlanview.setStartPoint(anchor.x, anchor.y, heading);
    farPlanview.adjustGeometries(contactPoint === 'end');
    logger.debug(`Road ${far.id} adjusted through connecting road ${connector.id}`);
    return 1;
  }

  /** A positioned road sharing a direct junction with `road` */
  private directJunctionContact(road: Road, offsets: ReadonlyMap<number, number>): Contact | undefined {
    for (const id of offsets.keys()) {
      const neighbor = this.requireRoad(id, road);
      if (!neighbor.isAdjusted()) continue;
      if (neighbor.succDirectJunction.has(road.id)) return { neighbor, contactPoint: 'end' };
      if (neighbor.predDirectJunction.has(road.id)) return { neighbor, contactPoint: 'start' };
      throw new UndefinedRoadNetwork(`Direct junction between road ${road.id} and road ${neighbor.id} is not properly defined`);
    }
    return undefined;
  }

  /** Positioned neighbour on one side of a road with an AdjustablePlanview */
  private adjustableContact(road: Road, link: Link, side: LinkType): Contact | undefined {
    if (link.elementType === 'road') {
      const neighbor = this.requireRoad(link.elementId, road);
      return neighbor.isAdjusted() ? { neighbor, contactPoint: contactOf(link, road) } : undefined;
    }

    const direct = side === 'predecessor' ? road.predDirectJunction : road.succDirectJunction;
    if (direct.size > 0) {
      for (const id of direct.keys()) {
        const neighbor = this.requireRoad(id, road);
        if (!neighbor.isAdjusted()) continue;
        const viaSuccessor =
          neighbor.successor?.elementType === 'junction' && neighbor.successor.elementId === link.elementId;
        return { neighbor, contactPoint: viaSuccessor ? 'end' : 'start' };
      }
      return undefined;
    }

    for (const connector of this.roads.values()) {
      if (connector.roadType !== link.elementId || !connector.isAdjusted()) continue;
      const { predecessor, successor } = connector;
      if (predecessor?.elementType === 'road' && predecessor.elementId === road.id) {
        return { neighbor: connector, contactPoint: 'start' };
      }
      if (successor?.elementType === 'road' && successor.elementId === road.id) {
        return { neighbor: connector, contactPoint: 'end' };
      }
    }
    return undefined;
  }

  /**
   * Fit clothoids between the positioned predecessor and successor, then
   * build the lanes, either from the plan view's lane definitions or by
   * blending the neighbours' lane widths.
   */
  private adjustAdjustablePlanview(road: Road, adjustable: AdjustablePlanview): boolean {
    if (!road.predecessor || !road.successor) {
      throw new UndefinedRoadNetwork(`Road ${road.id} has an AdjustablePlanview and needs both a predecessor and a successor`);
    }
    const from = this.adjustableContact(road, road.predecessor, 'predecessor');
    const to = this.adjustableContact(road, road.successor, 'successor');
    if (!from || !to) return false;

    const startWidth = offsetWidth(from.neighbor, from.contactPoint, this.declaredOffset(road, from.neighbor.id, 'predecessor'));
    const start = shiftLeft(outwardPose(from.neighbor, from.contactPoint), startWidth);
    const inward = outwardPose(to.neighbor, to.contactPoint);
    const endWidth = offsetWidth(to.neighbor, to.contactPoint, this.declaredOffset(road, to.neighbor.id, 'successor'));
    const end = shiftLeft({ ...inward, h: inward.h + Math.PI }, endWidth);

    const curvature = settings.get().startClothoidCurvature;
    const segments = this.solver.solve({ ...start, curvature }, { ...end, curvature });
    const planview = new PlanView(start);
    for (const spiral of spiralsFromSegments(segments)) {
      planview.addGeometry(spiral);
    }
    planview.adjustGeometries();

    road.lanes = this.adjustableLanes(adjustable, planview.getTotalLength(), from, to);
    road.planview = planview;
    adjustable.state = 'adjusted';
    logger.debug(`Road ${road.id} fitted between road ${from.neighbor.id} and road ${to.neighbor.id}`);
    return true;
  }

  private adjustableLanes(adjustable: AdjustablePlanview, length: number, from: Contact, to: Contact): Lanes {
    const options = adjustable.options;
    const laneWidth = options.laneWidth ?? settings.get().standardLaneWidth;

    if (options.leftLaneDefs !== undefined || options.rightLaneDefs !== undefined) {
      return createLanesMergeSplit(
        toLaneSpec(options.rightLaneDefs ?? 1),
        toLaneSpec(options.leftLaneDefs ?? 1),
        length,
        options.centerRoadMark ?? solidRoadMark(),
        laneWidth,
        options.laneWidthEnd
      );
    }

    // flow direction decides which neighbour side continues as which side here
    const startLanes = from.neighbor.contactSection(from.contactPoint);
    const endLanes = to.neighbor.contactSection(to.contactPoint);
    const flipStart = from.contactPoint === 'start';
    const flipEnd = to.contactPoint === 'end';
    const leftStart = widthsAt(flipStart ? startLanes.section.rightLanes : startLanes.section.leftLanes, startLanes.s);
    const rightStart = widthsAt(flipStart ? startLanes.section.leftLanes : startLanes.section.rightLanes, startLanes.s);
    const leftEnd = widthsAt(flipEnd ? endLanes.section.rightLanes : endLanes.section.leftLanes, endLanes.s);
    const rightEnd = widthsAt(flipEnd ? endLanes.section.leftLanes : endLanes.section.rightLanes, endLanes.s);

    const leftCount = Math.max(leftStart.length, leftEnd.length);
    const rightCount = Math.max(rightStart.length, rightEnd.length);
    const centerRoadMark =
      options.centerRoadMark ?? startLanes.section.centerLane.roadMarks[0]?.clone() ?? solidRoadMark();

    return createLanesMergeSplit(
      toLaneSpec([new LaneDef(0, length, rightCount, rightCount, undefined, padded(rightStart, rightCount), padded(rightEnd, rightCount))]),
      toLaneSpec([new LaneDef(0, length, leftCount, leftCount, undefined, padded(leftStart, leftCount), padded(leftEnd, leftCount))]),
      length,
      centerRoadMark,
      laneWidth
    );
  }

  /** Throws RoadsAndLanesNotAdjusted while any road is still unpositioned */
  getElement(): XmlElement {
    const unadjusted = [...this.roads.values()].filter((road) => !road.isAdjusted()).map((road) => road.id);
    if (unadjusted.length > 0) {
      throw new RoadsAndLanesNotAdjusted(
        `Roads ${unadjusted.join(', ')} are not adjusted, call adjustRoadsAndLanes() first`
      );
    }
    return element('OpenDRIVE', {}, [
      this.header.getElement(),
      ...[...this.roads.values()].map((road) => road.getElement()),
      ...this.junctions.map((junction) => junction.getElement()),
      ...this.junctionGroups.map((group) => group.getElement()),
    ]);
  }

  toXml(prettyPrint = true): string {
    return toXmlString(this.getElement(), prettyPrint);
  }

  writeXml(file = `${this.name}.xodr`, prettyPrint = true): void {
    writeXml(this.getElement(), file, prettyPrint);
  }
}
