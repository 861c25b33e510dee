import { GeneralIssueInputArguments, NotSameAmountOfLanesError } from '../errors';
import type { LinkType } from './enums';
import type { LaneSection } from './lane';
import type { Link } from './links';
import type { Road } from './road';

export interface RelatedLaneSection {
  linkType: LinkType;
  /** -1 when lane ids flip sign across the connection */
  sign: 1 | -1;
  /** 0 for the first lane section, -1 for the last */
  laneSectionIndex: 0 | -1;
}

function linksToRoad(link: Link | undefined, roadId: number): link is Link {
  return link !== undefined && link.elementType === 'road' && link.elementId === roadId;
}

function sharesJunction(first: Link | undefined, second: Link | undefined): boolean {
  return (
    first !== undefined &&
    second !== undefined &&
    first.elementType === 'junction' &&
    second.elementType === 'junction' &&
    first.elementId === second.elementId
  );
}

/**
 * Which end of `road` touches `connected`, and whether lane ids keep their sign
 * across that contact.
 */
export function getRelatedLaneSection(road: Road, connected: Road): RelatedLaneSection | undefined {
  let related: RelatedLaneSection | undefined;

  if (linksToRoad(road.successor, connected.id)) {
    related = { linkType: 'successor', sign: road.successor.contactPoint === 'start' ? 1 : -1, laneSectionIndex: -1 };
  } else if (linksToRoad(road.predecessor, connected.id)) {
    related = {
      linkType: 'predecessor',
      sign: road.predecessor.contactPoint === 'start' ? -1 : 1,
      laneSectionIndex: 0,
    };
  }

  // Both roads meet in the same direct junction
  if (sharesJunction(road.predecessor, connected.predecessor)) {
    related = { linkType: 'predecessor', sign: -1, laneSectionIndex: 0 };
  } else if (sharesJunction(road.successor, connected.predecessor)) {
    related = { linkType: 'successor', sign: 1, laneSectionIndex: -1 };
  } else if (sharesJunction(road.successor, connected.successor)) {
    related = { linkType: 'successor', sign: -1, laneSectionIndex: -1 };
  } else if (sharesJunction(road.predecessor, connected.successor)) {
    related = { linkType: 'predecessor', sign: 1, laneSectionIndex: 0 };
  }

  if (related && connected.isConnector) {
    if (linksToRoad(connected.predecessor, road.id)) {
      related =
        connected.predecessor.contactPoint === 'start'
          ? { ...related, laneSectionIndex: 0, sign: -1 }
          : { ...related, laneSectionIndex: -1, sign: 1 };
    } else if (linksToRoad(connected.successor, road.id)) {
      related =
        connected.successor.contactPoint === 'start'
          ? { ...related, laneSectionIndex: 0, sign: 1 }
          : { ...related, laneSectionIndex: -1, sign: -1 };
    }
  }

  return related;
}

/** pre's successor is suc and suc's predecessor is pre */
export function areRoadsConsecutive(pre: Road, suc: Road): boolean {
  return linksToRoad(pre.successor, suc.id) && linksToRoad(suc.predecessor, pre.id);
}

/** Both roads point at each other with the same link type */
export function areRoadsConnected(road1: Road, road2: Road): LinkType | undefined {
  if (linksToRoad(road1.successor, road2.id) && linksToRoad(road2.successor, road1.id)) return 'successor';
  if (linksToRoad(road1.predecessor, road2.id) && linksToRoad(road2.predecessor, road1.id)) return 'predecessor';
  return undefined;
}

function assertSameCount(pre: Road, suc: Road, first: number, second: number, side: string): void {
  if (first !== second) {
    throw new NotSameAmountOfLanesError(
      `Road ${pre.id} and road ${suc.id} do not have the same number of ${side} lanes (${first} and ${second})`
    );
  }
}

/** Roads meeting head to head or tail to tail: left lanes continue as right lanes */
function linkSameTypeRoads(road1: Road, road2: Road, linkType: LinkType): void {
  const index = linkType === 'successor' ? -1 : 0;
  const first = road1.lanes.getSection(index);
  const second = road2.lanes.getSection(index);

  assertSameCount(road1, road2, first.leftLanes.length, second.rightLanes.length, 'left/right');
  first.leftLanes.forEach((lane, i) => {
    const id = lane.requireId();
    lane.addLink(linkType, -id);
    second.rightLanes[i].addLink(linkType, id);
  });

  assertSameCount(road1, road2, first.rightLanes.length, second.leftLanes.length, 'right/left');
  first.rightLanes.forEach((lane, i) => {
    const id = lane.requireId();
    lane.addLink(linkType, -id);
    second.leftLanes[i].addLink(linkType, id);
  });
}

function linkConsecutiveRoads(pre: Road, suc: Road): void {
  const preRelated = getRelatedLaneSection(pre, suc);
  const sucRelated = getRelatedLaneSection(suc, pre);
  if (!preRelated || !sucRelated) return;

  const preSection = pre.lanes.getSection(preRelated.laneSectionIndex);
  const sucSection = suc.lanes.getSection(sucRelated.laneSectionIndex);

  assertSameCount(pre, suc, preSection.leftLanes.length, sucSection.leftLanes.length, 'left');
  preSection.leftLanes.forEach((lane, i) => {
    const linkId = lane.requireId() * preRelated.sign;
    lane.addLink(preRelated.linkType, linkId);
    sucSection.leftLanes[i].addLink(sucRelated.linkType, linkId * preRelated.sign);
  });

  assertSameCount(pre, suc, preSection.rightLanes.length, sucSection.rightLanes.length, 'right');
  preSection.rightLanes.forEach((lane, i) => {
    const linkId = lane.requireId();
    lane.addLink(preRelated.linkType, linkId);
    sucSection.rightLanes[i].addLink(sucRelated.linkType, linkId);
  });
}

/** Link the connector's lanes to the road lanes they continue into */
function linkConnectingRoad(connector: Road, road: Road): void {
  const related = getRelatedLaneSection(connector, road);
  if (!related) return;

  const offsets = related.linkType === 'predecessor' ? connector.laneOffsetPred : connector.laneOffsetSuc;
  const offset = Math.abs(offsets.get(road.id) ?? 0);
  const section: LaneSection = connector.lanes.getSection(related.laneSectionIndex);

  for (const lane of [...section.leftLanes, ...section.rightLanes]) {
    const base = lane.requireId() * related.sign;
    lane.addLink(related.linkType, base + Math.sign(base) * offset);
  }
}

/**
 * Add lane links between two roads if they are connected. Pairs that are not
 * connected, and pairs of two connectors, are left alone.
 */
export function createLaneLinks(road1: Road, road2: Road): void {
  if (!road1.isConnector && !road2.isConnector) {
    if (areRoadsConsecutive(road1, road2)) {
      linkConsecutiveRoads(road1, road2);
    } else if (areRoadsConsecutive(road2, road1)) {
      linkConsecutiveRoads(road2, road1);
    } else {
      const linkType = areRoadsConnected(road1, road2);
      if (linkType) linkSameTypeRoads(road1, road2, linkType);
    }
  } else if (road1.isConnector && !road2.isConnector) {
    linkConnectingRoad(road1, road2);
  } else if (road2.isConnector && !road1.isConnector) {
    linkConnectingRoad(road2, road1);
  }
}

/**
 * Link explicit lane pairs between two ordinary roads, e.g. where lane counts differ
 */
export function createLaneLinksFromIds(road1: Road, road2: Road, road1LaneIds: number[], road2LaneIds: number[]): void {
  if (road1LaneIds.length !== road2LaneIds.length) {
    throw new GeneralIssueInputArguments('Lane id lists must have the same length');
  }
  if (road1LaneIds.includes(0) || road2LaneIds.includes(0)) {
    throw new GeneralIssueInputArguments('The center lane (id 0) cannot be linked');
  }
  if (road1.isConnector || road2.isConnector) {
    throw new GeneralIssueInputArguments('Linking lanes by id is not supported for junction connecting roads');
  }

  const first = getRelatedLaneSection(road1, road2);
  const second = getRelatedLaneSection(road2, road1);
  if (!first || !second) {
    throw new GeneralIssueInputArguments(`Road ${road1.id} and road ${road2.id} are not connected`);
  }

  const firstSection = road1.lanes.getSection(first.laneSectionIndex);
  const secondSection = road2.lanes.getSection(second.laneSectionIndex);

  road1LaneIds.forEach((id1, i) => {
    const id2 = road2LaneIds[i];
    const lane1 = firstSection.getLane(id1);
    const lane2 = secondSection.getLane(id2);
    if (!lane1 || !lane2) {
      throw new GeneralIssueInputArguments(`Lane ${lane1 ? id2 : id1} does not exist at the connection`);
    }
    lane1.addLink(first.linkType, id2);
    lane2.addLink(second.linkType, id1);
  });
}
