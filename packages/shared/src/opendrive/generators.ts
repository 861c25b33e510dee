import { settings } from '../config';
import { GeneralIssueInputArguments } from '../errors';
import type { Pose } from '../types';
import type { ClothoidSegment } from './clothoid';
import { Arc, Spiral } from './geometry';
import type { GeometryPrimitive } from './geometry';
import { Lane, LaneSection, Lanes } from './lane';
import type { RoadMark } from './lane';
import { createLanesMergeSplit, toLaneSpec } from './lane-def';
import type { LaneDef } from './lane-def';
import { AdjustablePlanview, PlanView } from './planview';
import { Road } from './road';
import { brokenRoadMark, solidRoadMark } from './road-marks';

export interface CreateRoadOptions {
  leftLanes?: number | LaneDef[];
  rightLanes?: number | LaneDef[];
  /** -1 for an ordinary road, else the junction id */
  roadType?: number;
  centerRoadMark?: RoadMark;
  laneWidth?: number;
  /** Only with constant lane counts: widths taper linearly in s from laneWidth */
  laneWidthEnd?: number;
}

/**
 * Road from one or more geometries with lanes built from lane counts or lane
 * definitions.
 *
 * With an AdjustablePlanview the lanes are built once the geometry is solved.
 * Options passed here override the ones the plan view already carries.
 */
export function createRoad(
  geometry: GeometryPrimitive | GeometryPrimitive[] | AdjustablePlanview,
  id: number,
  options: CreateRoadOptions = {}
): Road {
  const roadType = options.roadType ?? -1;

  if (geometry instanceof AdjustablePlanview) {
    const own = geometry.options;
    const planview = new AdjustablePlanview({
      leftLaneDefs: options.leftLanes ?? own.leftLaneDefs,
      rightLaneDefs: options.rightLanes ?? own.rightLaneDefs,
      centerRoadMark: options.centerRoadMark ?? own.centerRoadMark,
      laneWidth: options.laneWidth ?? own.laneWidth,
      laneWidthEnd: options.laneWidthEnd ?? own.laneWidthEnd,
    });
    return new Road(id, planview, new Lanes(), { roadType });
  }

  const leftLanes = options.leftLanes ?? 1;
  const rightLanes = options.rightLanes ?? 1;
  if (options.laneWidthEnd !== undefined && (typeof leftLanes !== 'number' || typeof rightLanes !== 'number')) {
    throw new GeneralIssueInputArguments('laneWidthEnd can only be used with constant lane counts');
  }

  const planview = new PlanView();
  for (const entry of Array.isArray(geometry) ? geometry : [geometry]) {
    planview.addGeometry(entry);
  }

  const lanes = createLanesMergeSplit(
    toLaneSpec(rightLanes),
    toLaneSpec(leftLanes),
    planview.getTotalLength(),
    options.centerRoadMark ?? solidRoadMark(),
    options.laneWidth ?? settings.get().standardLaneWidth,
    options.laneWidthEnd
  );
  return new Road(id, planview, lanes, { roadType });
}

/** Driving lane of constant width, broken mark unless `roadMark` is null */
export function standardLane(width = settings.get().standardLaneWidth, roadMark: RoadMark | null = brokenRoadMark()): Lane {
  const lane = new Lane('driving', width);
  if (roadMark) lane.addRoadMark(roadMark);
  return lane;
}

/** One section of constant-width lanes, each with a copy of `roadMark` */
export function uniformLanes(leftCount: number, rightCount: number, width: number, roadMark?: RoadMark): Lanes {
  const center = new Lane('driving', 0);
  if (roadMark) center.addRoadMark(roadMark.clone());
  const section = new LaneSection(0, center);
  for (let i = 0; i < rightCount; i++) {
    section.addRightLane(standardLane(width, roadMark ? roadMark.clone() : null));
  }
  for (let i = 0; i < leftCount; i++) {
    section.addLeftLane(standardLane(width, roadMark ? roadMark.clone() : null));
  }
  return new Lanes().addLaneSection(section);
}

/**
 * Spiral, arc, spiral turning 2·clothAngle + arcAngle. The turn direction
 * follows the arc curvature; a negative clothAngle with positive curvature is
 * mirrored to a right turn.
 */
export function clothArcClothGeometries(
  arcCurvature: number,
  arcAngle: number,
  clothAngle: number,
  clothStart = settings.get().startClothoidCurvature
): GeometryPrimitive[] {
  let curvature = arcCurvature;
  let start = clothStart;
  if (clothAngle < 0 && arcCurvature > 0) {
    curvature = -curvature;
    start = -start;
  }
  return [
    new Spiral(start, curvature, { angle: clothAngle }),
    new Arc(curvature, { angle: arcAngle }),
    new Spiral(curvature, start, { angle: clothAngle }),
  ];
}

export interface ClothArcClothOptions {
  junction?: number;
  clothStart?: number;
  lanes?: number;
  laneWidth?: number;
}

export function createClothArcCloth(
  arcCurvature: number,
  arcAngle: number,
  clothAngle: number,
  id: number,
  options: ClothArcClothOptions = {}
): Road {
  const planview = new PlanView();
  for (const geometry of clothArcClothGeometries(arcCurvature, arcAngle, clothAngle, options.clothStart)) {
    planview.addGeometry(geometry);
  }
  const count = options.lanes ?? 1;
  const lanes = uniformLanes(count, count, options.laneWidth ?? settings.get().standardLaneWidth, brokenRoadMark());
  return new Road(id, planview, lanes, { roadType: options.junction ?? 1 });
}

export function spiralsFromSegments(segments: readonly ClothoidSegment[]): Spiral[] {
  return segments.map(
    (segment) => new Spiral(segment.curvatureStart, segment.curvatureEnd, { length: segment.length })
  );
}

/** Pose after walking the geometries from the origin */
export function walkGeometries(geometries: readonly GeometryPrimitive[], from: Pose = { x: 0, y: 0, h: 0 }): Pose {
  let pose = from;
  for (const geometry of geometries) {
    const end = geometry.getEndData(pose.x, pose.y, pose.h);
    pose = { x: end.x, y: end.y, h: end.h };
  }
  return pose;
}
