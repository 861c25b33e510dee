import { GeneralIssueInputArguments, UndefinedRoadNetwork } from '../errors';
import type { ContactPoint } from './enums';
import type { Link } from './links';
import type { Road } from './road';

/** One road end touching one end of a neighbour */
export interface RoadContact {
  /** End of the road itself */
  end: ContactPoint;
  neighbor: Road;
  /** End of the neighbour touching it */
  neighborEnd: ContactPoint;
  /** The neighbour links straight to the road, so its lane links name the road's lanes */
  linkedBack: boolean;
}

function requireRoad(roads: ReadonlyMap<number, Road>, id: number, from: Road): Road {
  const road = roads.get(id);
  if (!road) {
    throw new UndefinedRoadNetwork(`Road ${from.id} links to road ${id}, which is not in the network`);
  }
  return road;
}

function linksTo(link: Link | undefined, road: Road): boolean {
  return link?.elementType === 'road' && link.elementId === road.id;
}

/**
 * Neighbours touching `end` of `road`: the linked road, the roads sharing a
 * direct junction, or the connecting roads of a default junction that lead to it.
 */
export function roadContacts(roads: ReadonlyMap<number, Road>, road: Road, end: ContactPoint): RoadContact[] {
  const link = end === 'start' ? road.predecessor : road.successor;
  if (!link) return [];

  if (link.elementType === 'road') {
    if (link.contactPoint === undefined) {
      throw new GeneralIssueInputArguments(`The ${link.linkType} link of road ${road.id} has no contact point`);
    }
    const neighbor = requireRoad(roads, link.elementId, road);
    const back = link.contactPoint === 'start' ? neighbor.predecessor : neighbor.successor;
    return [{ end, neighbor, neighborEnd: link.contactPoint, linkedBack: linksTo(back, road) }];
  }

  const direct = end === 'start' ? road.predDirectJunction : road.succDirectJunction;
  if (direct.size > 0) {
    return [...direct.keys()].map((id): RoadContact => {
      const neighbor = requireRoad(roads, id, road);
      if (neighbor.succDirectJunction.has(road.id)) return { end, neighbor, neighborEnd: 'end', linkedBack: false };
      if (neighbor.predDirectJunction.has(road.id)) return { end, neighbor, neighborEnd: 'start', linkedBack: false };
      throw new UndefinedRoadNetwork(`Direct junction between road ${road.id} and road ${neighbor.id} is not properly defined`);
    });
  }

  const contacts: RoadContact[] = [];
  for (const connector of roads.values()) {
    if (connector.roadType !== link.elementId) continue;
    if (linksTo(connector.predecessor, road)) {
      contacts.push({ end, neighbor: connector, neighborEnd: 'start', linkedBack: true });
    } else if (linksTo(connector.successor, road)) {
      contacts.push({ end, neighbor: connector, neighborEnd: 'end', linkedBack: true });
    }
  }
  return contacts;
}
