import { settings } from '../config';
import { GeneralIssueInputArguments, NotEnoughInputArguments } from '../errors';
import { logger } from '../logger';
import type { ContactPoint, ElementType, LinkType, NeighborDirection } from './enums';
import type { Lane, LaneSection } from './lane';
import { attrs, element } from './xml';
import type { XmlAttributes, XmlElement, XmlSerializable } from './xml';

export type LinkKind = LinkType | 'neighbor';

export interface LinkOptions {
  elementType?: ElementType;
  contactPoint?: ContactPoint;
  direction?: NeighborDirection;
}

/**
 * One predecessor, successor or neighbor record.
 * Lane links carry only the lane id, road links carry element type and contact point.
 */
export class Link implements XmlSerializable {
  readonly linkType: LinkKind;
  readonly elementId: number;
  readonly elementType?: ElementType;
  readonly contactPoint?: ContactPoint;
  readonly direction?: NeighborDirection;

  constructor(linkType: LinkKind, elementId: number, options: LinkOptions = {}) {
    if (linkType === 'neighbor' && options.direction === undefined) {
      throw new NotEnoughInputArguments('A neighbor link needs a direction');
    }
    this.linkType = linkType;
    this.elementId = elementId;
    this.elementType = options.elementType;
    this.contactPoint = options.contactPoint;
    this.direction = options.direction;
  }

  getAttributes(): XmlAttributes {
    const base =
      this.elementType === undefined
        ? attrs({ id: this.elementId })
        : attrs({ elementType: this.elementType, elementId: this.elementId });
    if (this.contactPoint !== undefined) {
      return { ...base, contactPoint: this.contactPoint };
    }
    if (this.linkType === 'neighbor' && this.direction !== undefined) {
      return { ...base, direction: this.direction };
    }
    return base;
  }

  equals(other: Link): boolean {
    if (this.linkType !== other.linkType) return false;
    const mine = this.getAttributes();
    const theirs = other.getAttributes();
    const keys = Object.keys(mine);
    return keys.length === Object.keys(theirs).length && keys.every((key) => mine[key] === theirs[key]);
  }

  getElement(): XmlElement {
    return element(this.linkType, this.getAttributes());
  }
}

/**
 * Link container of a lane or road.
 *
 * An identical link, or a second predecessor/successor, keeps the first one and
 * logs a warning. With `strictLinks` set it throws instead.
 */
export class Links implements XmlSerializable {
  private readonly entries: Link[] = [];

  get links(): readonly Link[] {
    return this.entries;
  }

  add(link: Link): this {
    const identical = this.entries.some((existing) => existing.equals(link));
    const sameKind =
      link.linkType !== 'neighbor' && this.entries.some((existing) => existing.linkType === link.linkType);

    if (identical || sameKind) {
      const message = identical
        ? `Identical ${link.linkType} link to ${link.elementId} added twice, keeping the first`
        : `A ${link.linkType} link already exists, ignoring the link to ${link.elementId}`;
      if (settings.get().strictLinks) {
        throw new GeneralIssueInputArguments(message);
      }
      logger.warn(message);
      return this;
    }

    this.entries.push(link);
    return this;
  }

  get(linkType: LinkKind): Link | undefined {
    return this.entries.find((link) => link.linkType === linkType);
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  getElement(): XmlElement {
    return element(
      'link',
      {},
      this.entries.map((link) => link.getElement())
    );
  }
}

interface PendingLaneLink {
  predecessor: Lane;
  successor: Lane;
  connectingRoad?: number;
}

/**
 * Pending lane-to-lane links between consecutive lane sections.
 * Links are applied once, when the section holding the successor lane is added.
 */
export class LaneLinker {
  private pending: PendingLaneLink[] = [];

  get size(): number {
    return this.pending.length;
  }

  addLink(predecessor: Lane, successor: Lane, connectingRoad?: number): this {
    this.pending.push(
      connectingRoad === undefined ? { predecessor, successor } : { predecessor, successor, connectingRoad }
    );
    return this;
  }

  /**
   * Apply and remove every pending link whose successor lane belongs to `section`
   */
  drainInto(section: LaneSection): number {
    const lanes = new Set<Lane>(section.allLanes);
    const remaining: PendingLaneLink[] = [];
    let applied = 0;

    for (const link of this.pending) {
      if (!lanes.has(link.successor)) {
        remaining.push(link);
        continue;
      }
      link.predecessor.addLink('successor', link.successor.requireId());
      link.successor.addLink('predecessor', link.predecessor.requireId());
      applied++;
    }

    this.pending = remaining;
    return applied;
  }
}
