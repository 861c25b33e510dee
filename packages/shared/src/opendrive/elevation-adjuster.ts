import { RoadsAndLanesNotAdjusted } from '../errors';
import { logger } from '../logger';
import type { Pose } from '../types';
import type { ContactPoint } from './enums';
import { roadContacts } from './network';
import type { RoadContact } from './network';
import { solveLinearSystem } from './numeric';
import type { Poly3Coefficients } from './numeric';
import type { Road } from './road';

export type ProfileDomain = 'elevation' | 'superelevation';

/** Value and slope a neighbour imposes on one end, in the road's own direction */
interface EndCondition {
  value: number;
  slope: number;
  neighbor: Road;
}

function sAt(road: Road, end: ContactPoint): number {
  return end === 'start' ? 0 : road.length;
}

function poseAt(road: Road, end: ContactPoint): Pose {
  const planview = road.requirePlanview();
  return end === 'start' ? planview.getStartPoint() : planview.getEndPoint();
}

/**
 * Height gained by meeting a banked neighbour off its reference line, as a
 * road leaving through a direct junction does.
 */
function lateralRise(road: Road, contact: RoadContact, s: number): number {
  const angle = contact.neighbor.lateralProfile.superelevationAt(s);
  if (angle === 0) return 0;
  const anchor = poseAt(contact.neighbor, contact.neighborEnd);
  const own = poseAt(road, contact.end);
  const t = -(own.x - anchor.x) * Math.sin(anchor.h) + (own.y - anchor.y) * Math.cos(anchor.h);
  return t * Math.sin(angle);
}

/**
 * Elevation carries over unchanged and its slope flips where the neighbour runs
 * the other way; superelevation flips its angle there instead.
 */
function endCondition(road: Road, contact: RoadContact, domain: ProfileDomain): EndCondition {
  const { neighbor, neighborEnd } = contact;
  const s = sAt(neighbor, neighborEnd);
  const reversed = contact.end === neighborEnd;

  if (domain === 'superelevation') {
    const angle = neighbor.lateralProfile.superelevationAt(s);
    return { value: reversed ? -angle : angle, slope: neighbor.lateralProfile.superelevationDerivativeAt(s), neighbor };
  }
  const slope = neighbor.elevationProfile.evalDerivativeAt(s);
  return {
    value: neighbor.elevationProfile.evalAt(s) + lateralRise(road, contact, s),
    slope: reversed ? -slope : slope,
    neighbor,
  };
}

function condition(
  roads: ReadonlyMap<number, Road>,
  road: Road,
  end: ContactPoint,
  domain: ProfileDomain
): EndCondition | undefined {
  const contact = roadContacts(roads, road, end).find((candidate) => candidate.neighbor.isAdjusted(domain));
  return contact && endCondition(road, contact, domain);
}

/** Cubic meeting both ends with matching value and slope */
function blend(start: EndCondition, end: EndCondition, length: number): Poly3Coefficients {
  const matrix = [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [1, length, length ** 2, length ** 3],
    [0, 1, 2 * length, 3 * length ** 2],
  ];
  const [a, b, c, d] = solveLinearSystem(matrix, [start.value, start.slope, end.value, end.slope]);
  return { a, b, c, d };
}

/**
 * Profile continuing a single neighbour. Elevation keeps its slope along the
 * road; superelevation stays at the neighbour's angle.
 */
function extend(condition: EndCondition, end: ContactPoint, length: number, domain: ProfileDomain): Poly3Coefficients {
  if (domain === 'superelevation') {
    return { a: condition.value, b: 0, c: 0, d: 0 };
  }
  const a = end === 'start' ? condition.value : condition.value - condition.slope * length;
  return { a, b: condition.slope, c: 0, d: 0 };
}

function fillProfile(roads: ReadonlyMap<number, Road>, road: Road, domain: ProfileDomain): boolean {
  const start = condition(roads, road, 'start', domain);
  const end = condition(roads, road, 'end', domain);
  let coefficients: Poly3Coefficients;
  if (start && end) {
    coefficients = blend(start, end, road.length);
  } else if (start) {
    coefficients = extend(start, 'start', road.length, domain);
  } else if (end) {
    coefficients = extend(end, 'end', road.length, domain);
  } else {
    return false;
  }

  const { a, b, c, d } = coefficients;
  if (domain === 'elevation') {
    road.addElevation(0, a, b, c, d);
  } else {
    road.addSuperelevation(0, a, b, c, d);
  }
  const from = [start, end].flatMap((side) => (side ? [side.neighbor.id] : []));
  if (road.isConnector) {
    logger.warn(`Connecting road ${road.id} got its ${domain} from road ${from.join(' and ')}, set it explicitly if the result looks off`);
  } else {
    logger.debug(`Road ${road.id} got its ${domain} from road ${from.join(' and ')}`);
  }
  return true;
}

/**
 * Give every road without an elevation or superelevation profile one that
 * continues its neighbours' profiles. Superelevation goes first, since a banked
 * neighbour lifts roads that join it off-centre. A domain no road defines is
 * left alone, except that elevation starts at zero on the first road when some
 * road is banked.
 */
export function adjustElevations(roads: ReadonlyMap<number, Road>): void {
  const all = [...roads.values()];
  const unpositioned = all.filter((road) => !road.isAdjusted()).map((road) => road.id);
  if (unpositioned.length > 0) {
    throw new RoadsAndLanesNotAdjusted(
      `Roads ${unpositioned.join(', ')} are not adjusted, call adjustRoadsAndLanes() before adjusting elevations`
    );
  }

  for (const domain of ['superelevation', 'elevation'] as const) {
    let pending = all.filter((road) => !road.isAdjusted(domain));
    if (pending.length === all.length) {
      const banked = all.some((road) => road.isAdjusted('superelevation'));
      if (domain === 'superelevation' || !banked || all.length === 0) continue;
      all[0].addElevation(0, 0, 0, 0, 0);
      pending = pending.slice(1);
    }

    while (pending.length > 0) {
      let filled = 0;
      for (const road of pending) {
        if (fillProfile(roads, road, domain)) filled++;
      }
      pending = pending.filter((road) => !road.isAdjusted(domain));
      if (filled === 0) {
        logger.warn(`Cannot derive ${domain} for roads ${pending.map((road) => road.id).join(', ')}, no neighbour has one`);
        break;
      }
    }
  }
}
