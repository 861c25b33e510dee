import { settings } from '../config';
import { GeneralIssueInputArguments, NotEnoughInputArguments, NotSameAmountOfLanesError } from '../errors';
import { normalizeAngle } from '../types';
import { ThreeClothoidG2Solver } from './clothoid';
import type { ClothoidG2Solver } from './clothoid';
import type { ContactPoint, LinkType } from './enums';
import { clothArcClothGeometries, createRoad, spiralsFromSegments, uniformLanes, walkGeometries } from './generators';
import { Line } from './geometry';
import type { GeometryPrimitive } from './geometry';
import { Connection, Junction } from './junction';
import type { Lane, RoadMark } from './lane';
import { LaneDef } from './lane-def';
import { PlanView } from './planview';
import { Road } from './road';
import { solidRoadMark } from './road-marks';

const STRAIGHT_TOLERANCE = 1e-9;

export type ConnectorMode = 'g2' | 'clothArcCloth';

export interface ConnectorGeometryOptions {
  mode?: ConnectorMode;
  /** Share of the turn taken by each spiral in clothArcCloth mode */
  spiralPart?: number;
  /** Share of the turn taken by the arc in clothArcCloth mode */
  arcPart?: number;
  solver?: ClothoidG2Solver;
}

interface ResolvedGeometryOptions {
  mode: ConnectorMode;
  spiralPart: number;
  arcPart: number;
  solver: ClothoidG2Solver;
}

function resolveGeometryOptions(options: ConnectorGeometryOptions): ResolvedGeometryOptions {
  const { spiralPart, arcPart } = options;
  let parts: { spiralPart: number; arcPart: number };
  if (spiralPart !== undefined && arcPart !== undefined) {
    if (Math.abs(2 * spiralPart + arcPart - 1) > 1e-9) {
      throw new GeneralIssueInputArguments('Two spiral parts and the arc part must add up to 1');
    }
    parts = { spiralPart, arcPart };
  } else if (arcPart !== undefined) {
    parts = { spiralPart: (1 - arcPart) / 2, arcPart };
  } else if (spiralPart !== undefined) {
    parts = { spiralPart, arcPart: 1 - 2 * spiralPart };
  } else {
    parts = { spiralPart: 1 / 3, arcPart: 1 / 3 };
  }
  if (parts.spiralPart <= 0 || parts.arcPart < 0) {
    throw new GeneralIssueInputArguments('Spiral part must be positive and arc part not negative');
  }
  return { mode: options.mode ?? 'g2', solver: options.solver ?? new ThreeClothoidG2Solver(), ...parts };
}

/** Turn from the first road into the second, in (−π, π] */
function turnAngle(firstAngle: number, secondAngle: number): number {
  return normalizeAngle(secondAngle - firstAngle - Math.PI);
}

/**
 * Spiral–arc–spiral between two roads facing a common center at distances
 * `firstRadius` and `secondRadius`. The curve is symmetric, so the longer
 * side gets a straight lead.
 */
function clothArcClothConnector(
  firstRadius: number,
  secondRadius: number,
  turn: number,
  options: ResolvedGeometryOptions
): GeometryPrimitive[] {
  const unit = walkGeometries(clothArcClothGeometries(1, turn * options.arcPart, turn * options.spiralPart));
  const unitTangent = unit.x - unit.y / Math.tan(turn);
  if (!Number.isFinite(unitTangent) || unitTangent <= 0) {
    throw new GeneralIssueInputArguments(`A spiral-arc-spiral connector cannot turn ${turn} rad`);
  }
  const tangent = Math.min(firstRadius, secondRadius);
  const geometries = clothArcClothGeometries(unitTangent / tangent, turn * options.arcPart, turn * options.spiralPart);
  if (firstRadius > tangent) geometries.unshift(new Line(firstRadius - tangent));
  if (secondRadius > tangent) geometries.push(new Line(secondRadius - tangent));
  return geometries;
}

/** Connector geometry between two roads laid out around a center point */
function circularConnector(
  first: CircularPlacement,
  second: CircularPlacement,
  options: ResolvedGeometryOptions
): GeometryPrimitive[] {
  const turn = turnAngle(first.angle, second.angle);
  if (Math.abs(turn) < STRAIGHT_TOLERANCE) {
    return [new Line(first.radius + second.radius)];
  }
  if (options.mode === 'clothArcCloth') {
    return clothArcClothConnector(first.radius, second.radius, turn, options);
  }
  const curvature = settings.get().startClothoidCurvature;
  return spiralsFromSegments(
    options.solver.solve(
      { x: -first.radius, y: 0, h: 0, curvature },
      { x: second.radius * Math.cos(turn), y: second.radius * Math.sin(turn), h: turn, curvature }
    )
  );
}

/** Connector geometry between two road ends given in absolute coordinates; always a G2 fit when curved */
function cartesianConnector(
  first: CartesianPlacement,
  second: CartesianPlacement,
  options: ResolvedGeometryOptions
): GeometryPrimitive[] {
  const turn = turnAngle(first.heading, second.heading);
  if (Math.abs(turn) < STRAIGHT_TOLERANCE) {
    return [new Line(Math.hypot(second.x - first.x, second.y - first.y))];
  }
  const curvature = settings.get().startClothoidCurvature;
  return spiralsFromSegments(
    options.solver.solve(
      { x: 0, y: 0, h: first.heading - Math.PI, curvature },
      { x: second.x - first.x, y: second.y - first.y, h: second.heading, curvature }
    )
  );
}

/** Which end of `road` is linked to the junction */
export function junctionContactPoint(road: Road, junctionId: number): ContactPoint {
  if (road.successor?.elementType === 'junction' && road.successor.elementId === junctionId) return 'end';
  if (road.predecessor?.elementType === 'junction' && road.predecessor.elementId === junctionId) return 'start';
  throw new GeneralIssueInputArguments(`Road ${road.id} is not connected to junction ${junctionId}`);
}

/**
 * Lanes of `road` that run the same way as the connector's left and right lanes.
 * A road flowing into the connector keeps its sides, one flowing out of it swaps them.
 */
function alignedSides(road: Road, contactPoint: ContactPoint, asPredecessor: boolean): { left: Lane[]; right: Lane[]; s: number } {
  const { section, s } = road.contactSection(contactPoint);
  const same = asPredecessor ? contactPoint === 'end' : contactPoint === 'start';
  return same
    ? { left: section.leftLanes, right: section.rightLanes, s }
    : { left: section.rightLanes, right: section.leftLanes, s };
}

function constantDef(length: number, widths: number[]): LaneDef {
  return new LaneDef(0, length, widths.length, widths.length, undefined, widths);
}

function totalLength(geometries: readonly GeometryPrimitive[]): number {
  return geometries.reduce((sum, geometry) => sum + geometry.length, 0);
}

/** Road lane a connector lane continues into */
function roadLaneFor(connectorLane: number, sign: 1 | -1, offset: number): number {
  const base = connectorLane * sign;
  return base + Math.sign(base) * Math.abs(offset);
}

/**
 * Connection records for a connecting road, one per linked road: lane links run
 * from the road lane to the connector lane.
 */
export function connectionsForConnector(connector: Road): Connection[] {
  const connections: Connection[] = [];
  const successor = connector.successor;
  if (successor?.elementType === 'road') {
    const connection = new Connection(successor.elementId, connector.id, 'end');
    const sign = successor.contactPoint === 'start' ? 1 : -1;
    const offset = connector.laneOffsetSuc.get(successor.elementId) ?? 0;
    const section = connector.lanes.getSection(-1);
    for (const lane of [...section.leftLanes, ...section.rightLanes]) {
      const id = lane.requireId();
      connection.addLaneLink(roadLaneFor(id, sign, offset), id);
    }
    connections.push(connection);
  }
  const predecessor = connector.predecessor;
  if (predecessor?.elementType === 'road') {
    const connection = new Connection(predecessor.elementId, connector.id, 'start');
    const sign = predecessor.contactPoint === 'start' ? -1 : 1;
    const offset = connector.laneOffsetPred.get(predecessor.elementId) ?? 0;
    const section = connector.lanes.getSection(0);
    for (const lane of [...section.leftLanes, ...section.rightLanes]) {
      const id = lane.requireId();
      connection.addLaneLink(roadLaneFor(id, sign, offset), id);
    }
    connections.push(connection);
  }
  return connections;
}

interface CircularPlacement {
  kind: 'circular';
  radius: number;
  angle: number;
}

interface CartesianPlacement {
  kind: 'cartesian';
  x: number;
  y: number;
  heading: number;
}

interface IncomingRoad {
  road: Road;
  contactPoint: ContactPoint;
  placement: CircularPlacement | CartesianPlacement;
}

export interface JunctionCreatorOptions extends ConnectorGeometryOptions {
  /** Id of the first connecting road, counted up per connection */
  startId?: number;
}

/**
 * Builds the connecting roads of a default junction from incoming roads
 * placed around a center (circular) or at absolute poses (cartesian).
 */
export class JunctionCreator {
  readonly junction: Junction;
  private readonly incoming: IncomingRoad[] = [];
  private readonly connectors: Road[] = [];
  private readonly geometryOptions: ResolvedGeometryOptions;
  private nextRoadId: number;

  constructor(
    readonly id: number,
    name: string,
    options: JunctionCreatorOptions = {}
  ) {
    this.junction = new Junction(name, id);
    this.geometryOptions = resolveGeometryOptions(options);
    this.nextRoadId = options.startId ?? 100;
  }

  /**
   * Road ending `radius` from the junction center at `angle`, pointing away from it.
   * `link` adds the road's link to the junction when it has none yet.
   */
  addIncomingRoadCircular(road: Road, radius: number, angle: number, link?: LinkType): this {
    return this.register(road, { kind: 'circular', radius, angle }, link);
  }

  /** Road whose junction end sits at (x, y) with `heading` pointing away from the junction */
  addIncomingRoadCartesian(road: Road, x: number, y: number, heading: number, link?: LinkType): this {
    return this.register(road, { kind: 'cartesian', x, y, heading }, link);
  }

  private register(road: Road, placement: CircularPlacement | CartesianPlacement, link?: LinkType): this {
    const other = this.incoming.find((entry) => entry.placement.kind !== placement.kind);
    if (other) {
      throw new GeneralIssueInputArguments('Circular and cartesian incoming roads cannot be mixed in one junction');
    }
    if (this.incoming.some((entry) => entry.road.id === road.id)) {
      throw new GeneralIssueInputArguments(`Road ${road.id} is already an incoming road of junction ${this.id}`);
    }
    if (link === 'successor' && road.successor === undefined) {
      road.addSuccessor('junction', this.id);
    } else if (link === 'predecessor' && road.predecessor === undefined) {
      road.addPredecessor('junction', this.id);
    }
    this.incoming.push({ road, contactPoint: junctionContactPoint(road, this.id), placement });
    return this;
  }

  private entry(roadId: number): IncomingRoad {
    const found = this.incoming.find((entry) => entry.road.id === roadId);
    if (!found) {
      throw new GeneralIssueInputArguments(`Road ${roadId} is not an incoming road of junction ${this.id}`);
    }
    return found;
  }

  private geometryBetween(first: IncomingRoad, second: IncomingRoad): GeometryPrimitive[] {
    const a = first.placement;
    const b = second.placement;
    if (a.kind === 'circular' && b.kind === 'circular') return circularConnector(a, b, this.geometryOptions);
    if (a.kind === 'cartesian' && b.kind === 'cartesian') return cartesianConnector(a, b, this.geometryOptions);
    throw new GeneralIssueInputArguments('Circular and cartesian incoming roads cannot be mixed in one junction');
  }

  /**
   * Connect two incoming roads. Without lane ids every lane present on both
   * roads is connected; with lane ids a single-lane connector joins exactly those lanes.
   */
  addConnection(roadOneId: number, roadTwoId: number, laneOneId?: number, laneTwoId?: number): this {
    const first = this.entry(roadOneId);
    const second = this.entry(roadTwoId);
    const geometries = this.geometryBetween(first, second);
    const length = totalLength(geometries);

    let connector: Road;
    if (laneOneId === undefined && laneTwoId === undefined) {
      connector = this.allLanesConnector(first, second, geometries, length);
    } else if (laneOneId !== undefined && laneTwoId !== undefined) {
      connector = this.singleLaneConnector(first, second, laneOneId, laneTwoId, geometries, length);
    } else {
      throw new NotEnoughInputArguments('Give lane ids for both roads or for neither');
    }

    this.connectors.push(connector);
    for (const connection of connectionsForConnector(connector)) {
      this.junction.addConnection(connection);
    }
    this.nextRoadId++;
    return this;
  }

  private allLanesConnector(first: IncomingRoad, second: IncomingRoad, geometries: GeometryPrimitive[], length: number): Road {
    const from = alignedSides(first.road, first.contactPoint, true);
    const to = alignedSides(second.road, second.contactPoint, false);
    const leftCount = Math.min(from.left.length, to.left.length);
    const rightCount = Math.min(from.right.length, to.right.length);
    const widths = (lanes: Lane[], count: number): number[] => lanes.slice(0, count).map((lane) => lane.getWidth(from.s));

    return createRoad(geometries, this.nextRoadId, {
      leftLanes: [constantDef(length, widths(from.left, leftCount))],
      rightLanes: [constantDef(length, widths(from.right, rightCount))],
      roadType: this.id,
    })
      .addPredecessor('road', first.road.id, first.contactPoint)
      .addSuccessor('road', second.road.id, second.contactPoint);
  }

  private singleLaneConnector(
    first: IncomingRoad,
    second: IncomingRoad,
    laneOneId: number,
    laneTwoId: number,
    geometries: GeometryPrimitive[],
    length: number
  ): Road {
    const start = first.road.contactSection(first.contactPoint);
    const end = second.road.contactSection(second.contactPoint);
    const laneOne = laneOneId === 0 ? undefined : start.section.getLane(laneOneId);
    const laneTwo = laneTwoId === 0 ? undefined : end.section.getLane(laneTwoId);
    if (!laneOne || !laneTwo) {
      throw new GeneralIssueInputArguments(
        `Lane ${laneOne ? laneTwoId : laneOneId} does not exist at junction ${this.id}`
      );
    }

    const connectorLane = first.contactPoint === 'end' ? Math.sign(laneOneId) : -Math.sign(laneOneId);
    const expected = second.contactPoint === 'start' ? connectorLane : -connectorLane;
    if (Math.sign(laneTwoId) !== expected) {
      throw new GeneralIssueInputArguments(
        `Lane ${laneOneId} of road ${first.road.id} and lane ${laneTwoId} of road ${second.road.id} run in opposite directions`
      );
    }

    const widths = [laneOne.getWidth(start.s)];
    return createRoad(geometries, this.nextRoadId, {
      leftLanes: connectorLane > 0 ? [constantDef(length, widths)] : 0,
      rightLanes: connectorLane < 0 ? [constantDef(length, widths)] : 0,
      roadType: this.id,
    })
      .addPredecessor('road', first.road.id, first.contactPoint, connectorLane * (Math.abs(laneOneId) - 1))
      .addSuccessor('road', second.road.id, second.contactPoint, connectorLane * (Math.abs(laneTwoId) - 1));
  }

  getConnectingRoads(): Road[] {
    return [...this.connectors];
  }
}

/**
 * Direct junction: roads continue into each other without connecting roads,
 * e.g. a highway exit.
 */
export class DirectJunctionCreator {
  readonly junction: Junction;

  constructor(
    readonly id: number,
    name: string
  ) {
    this.junction = new Junction(name, id, 'direct');
  }

  /**
   * Link `incoming` to `linked`. A single lane pair with different |id| moves
   * the linked road sideways by the lane difference; lane lists are linked pairwise.
   */
  addConnection(
    incoming: Road,
    linked: Road,
    incomingLanes?: number | number[],
    linkedLanes?: number | number[]
  ): this {
    let succOffset = 0;
    let predOffset = 0;

    if (typeof incomingLanes === 'number' && typeof linkedLanes === 'number') {
      const difference = Math.abs(incomingLanes) - Math.abs(linkedLanes);
      if (difference !== 0) {
        succOffset = -Math.sign(incomingLanes) * difference;
        predOffset = Math.sign(linkedLanes) * difference;
      }
    }
    incoming.succDirectJunction.set(linked.id, succOffset);
    linked.predDirectJunction.set(incoming.id, predOffset);

    if (incomingLanes === undefined && linkedLanes === undefined) return this;
    if (incomingLanes === undefined || linkedLanes === undefined) {
      throw new NotEnoughInputArguments('Give lanes for both roads or for neither');
    }

    const from = Array.isArray(incomingLanes) ? incomingLanes : [incomingLanes];
    const to = Array.isArray(linkedLanes) ? linkedLanes : [linkedLanes];
    if (from.length !== to.length) {
      throw new GeneralIssueInputArguments('Incoming and linked lane lists must have the same length');
    }

    const connection = new Connection(incoming.id, linked.id, junctionContactPoint(linked, this.id));
    from.forEach((lane, i) => connection.addLaneLink(lane, to[i]));
    this.junction.addConnection(connection);
    return this;
  }
}

export interface JunctionRoadsOptions extends ConnectorGeometryOptions {
  junctionId?: number;
  startId?: number;
  /** Mark on every connector lane; none when left out */
  innerRoadMark?: RoadMark;
  /** Mark on the outermost lane on the turning side of curved connectors */
  outerRoadMark?: RoadMark;
}

/**
 * Connecting roads for every pair of `roads` placed around a junction center.
 * The first road gets the junction as successor, the others as predecessor.
 */
export function createJunctionRoads(
  roads: Road[],
  angles: number[],
  radii: number | number[],
  options: JunctionRoadsOptions = {}
): Road[] {
  if (roads.length !== angles.length) {
    throw new GeneralIssueInputArguments('roads and angles do not have the same size');
  }
  const radiusList = typeof radii === 'number' ? roads.map(() => radii) : [...radii];
  if (radiusList.length === 1) {
    radiusList.push(...roads.slice(1).map(() => radiusList[0]));
  } else if (radiusList.length !== roads.length) {
    throw new GeneralIssueInputArguments('roads and radii do not have the same size');
  }

  const junctionId = options.junctionId ?? 1;
  const geometryOptions = resolveGeometryOptions(options);
  const outerRoadMark = options.outerRoadMark ?? solidRoadMark();
  let nextId = options.startId ?? 100;

  roads.forEach((road, i) => {
    if (i === 0) road.addSuccessor('junction', junctionId);
    else road.addPredecessor('junction', junctionId);
  });

  const connectors: Road[] = [];
  for (let i = 0; i < roads.length - 1; i++) {
    const contactPoint: ContactPoint = i === 0 ? 'end' : 'start';
    for (let j = i + 1; j < roads.length; j++) {
      const from = alignedSides(roads[i], contactPoint, true);
      const to = alignedSides(roads[j], 'start', false);
      if (from.left.length !== to.left.length || from.right.length !== to.right.length) {
        throw new NotSameAmountOfLanesError(
          `Incoming road ${roads[i].id} and outgoing road ${roads[j].id} do not have the same number of lanes`
        );
      }
      const width = [...from.left, ...from.right][0]?.getWidth(from.s) ?? settings.get().standardLaneWidth;

      const first: CircularPlacement = { kind: 'circular', radius: radiusList[i], angle: angles[i] };
      const second: CircularPlacement = { kind: 'circular', radius: radiusList[j], angle: angles[j] };
      const planview = new PlanView();
      for (const geometry of circularConnector(first, second, geometryOptions)) {
        planview.addGeometry(geometry);
      }

      const lanes = uniformLanes(from.left.length, from.right.length, width, options.innerRoadMark);
      const turn = turnAngle(angles[i], angles[j]);
      const section = lanes.getSection(0);
      const outerLane =
        turn > STRAIGHT_TOLERANCE
          ? section.leftLanes[section.leftLanes.length - 1]
          : turn < -STRAIGHT_TOLERANCE
            ? section.rightLanes[section.rightLanes.length - 1]
            : undefined;
      outerLane?.addRoadMark(outerRoadMark.clone());

      connectors.push(
        new Road(nextId, planview, lanes, { roadType: junctionId })
          .addPredecessor('road', roads[i].id, contactPoint)
          .addSuccessor('road', roads[j].id, 'start')
      );
      nextId++;
    }
  }
  return connectors;
}

/**
 * Junction with one connection per connector side. Lane links run from the
 * road lane, shifted by the connector's lane offset, to the connector lane.
 */
export function createJunction(connectors: Road[], id: number, roads: Road[], name = 'my junction'): Junction {
  const junction = new Junction(name, id);
  const known = new Set(roads.map((road) => road.id));
  for (const connector of connectors) {
    if (!connector.successor || !connector.predecessor) {
      throw new GeneralIssueInputArguments(`Connecting road ${connector.id} needs a predecessor and a successor`);
    }
    for (const link of [connector.successor, connector.predecessor]) {
      if (!known.has(link.elementId)) {
        throw new GeneralIssueInputArguments(`Road ${link.elementId} linked from connecting road ${connector.id} is not given`);
      }
    }
    for (const connection of connectionsForConnector(connector)) {
      junction.addConnection(connection);
    }
  }
  return junction;
}
