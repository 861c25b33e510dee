import { NotEnoughInputArguments } from '../errors';
import type { ContactPoint, JunctionGroupType, JunctionType, Orientation } from './enums';
import { attrs, element } from './xml';
import type { XmlElement, XmlSerializable } from './xml';

export interface LaneLinkPair {
  from: number;
  to: number;
}

/**
 * Incoming road to connecting road (or linked road in a direct junction),
 * with the lane pairs it carries.
 */
export class Connection {
  private readonly laneLinks: LaneLinkPair[] = [];

  constructor(
    readonly incomingRoad: number,
    readonly connectingRoad: number,
    readonly contactPoint: ContactPoint,
    public id?: number
  ) {}

  get links(): readonly LaneLinkPair[] {
    return this.laneLinks;
  }

  addLaneLink(from: number, to: number): this {
    this.laneLinks.push({ from, to });
    return this;
  }

  getElement(junctionType: JunctionType = 'default'): XmlElement {
    const roadKey = junctionType === 'direct' ? 'linkedRoad' : 'connectingRoad';
    const attributes = {
      ...attrs({ incomingRoad: this.incomingRoad, id: this.id, contactPoint: this.contactPoint }),
      ...attrs({ [roadKey]: this.connectingRoad }),
    };
    const children = [...this.laneLinks]
      .sort((first, second) => second.from - first.from)
      .map((link) => element('laneLink', attrs({ from: link.from, to: link.to })));
    return element('connection', attributes, children);
  }
}

export interface VirtualJunctionOptions {
  sStart: number;
  sEnd: number;
  mainRoad: number;
  orientation: Orientation;
}

export class Junction implements XmlSerializable {
  readonly connections: Connection[] = [];
  private nextConnectionId = 0;

  constructor(
    readonly name: string,
    readonly id: number,
    readonly junctionType: JunctionType = 'default',
    readonly virtualOptions?: VirtualJunctionOptions
  ) {
    if (junctionType === 'virtual' && virtualOptions === undefined) {
      throw new NotEnoughInputArguments('A virtual junction needs sStart, sEnd, mainRoad and orientation');
    }
  }

  /** Connections without an id get the next free one */
  addConnection(connection: Connection): this {
    if (connection.id === undefined) {
      connection.id = this.nextConnectionId;
    }
    this.nextConnectionId++;
    this.connections.push(connection);
    return this;
  }

  getElement(): XmlElement {
    const virtual = this.junctionType === 'virtual' ? this.virtualOptions : undefined;
    const attributes = attrs({
      name: this.name,
      id: this.id,
      type: this.junctionType,
      orientation: virtual && virtual.orientation !== 'none' ? virtual.orientation : undefined,
      sEnd: virtual?.sEnd,
      sStart: virtual?.sStart,
      mainRoad: virtual?.mainRoad,
    });
    return element(
      'junction',
      attributes,
      this.connections.map((connection) => connection.getElement(this.junctionType))
    );
  }
}

/** Junctions that belong together, e.g. the entries of a roundabout */
export class JunctionGroup implements XmlSerializable {
  readonly junctionIds: number[] = [];

  constructor(
    readonly name: string,
    readonly id: number,
    readonly groupType: JunctionGroupType = 'roundabout'
  ) {}

  addJunction(junctionId: number): this {
    this.junctionIds.push(junctionId);
    return this;
  }

  getElement(): XmlElement {
    return element(
      'junctionGroup',
      attrs({ name: this.name, id: this.id, type: this.groupType }),
      this.junctionIds.map((junctionId) => element('junctionReference', attrs({ junction: junctionId })))
    );
  }
}
