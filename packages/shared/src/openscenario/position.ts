import { NotEnoughInputArguments, ToManyOptionalArguments } from '../errors';
import { attrs, element } from '../opendrive/xml';
import type { XmlElement, XmlSerializable } from '../opendrive/xml';

export type ReferenceContext = 'absolute' | 'relative';

/** Heading, pitch and roll; zero and missing values are left out */
export class Orientation {
  constructor(
    readonly h?: number,
    readonly p?: number,
    readonly r?: number,
    readonly reference?: ReferenceContext
  ) {}

  get isFilled(): boolean {
    return Boolean(this.h || this.p || this.r || this.reference);
  }

  getElement(): XmlElement {
    return element(
      'Orientation',
      attrs({
        h: this.h || undefined,
        p: this.p || undefined,
        r: this.r || undefined,
        type: this.reference,
      })
    );
  }
}

/**
 * Wraps one concrete position element in its container, `Position` unless the
 * caller needs another name.
 */
abstract class PositionBase implements XmlSerializable {
  protected abstract readonly kind: string;

  protected abstract attributes(): Record<string, string | number | undefined>;

  protected orientation(): Orientation | undefined {
    return undefined;
  }

  getElement(elementName = 'Position'): XmlElement {
    const orientation = this.orientation();
    const children = orientation?.isFilled ? [orientation.getElement()] : [];
    return element(elementName, {}, [element(this.kind, attrs(this.attributes()), children)]);
  }
}

export class WorldPosition extends PositionBase {
  protected readonly kind = 'WorldPosition';

  constructor(
    readonly x = 0,
    readonly y = 0,
    readonly z?: number,
    readonly h?: number,
    readonly p?: number,
    readonly r?: number
  ) {
    super();
  }

  protected attributes(): Record<string, string | number | undefined> {
    return { x: this.x, y: this.y, z: this.z, h: this.h, p: this.p, r: this.r };
  }
}

export class LanePosition extends PositionBase {
  protected readonly kind = 'LanePosition';

  constructor(
    readonly s: number,
    readonly offset: number,
    readonly laneId: number,
    readonly roadId: number,
    readonly orient = new Orientation()
  ) {
    super();
  }

  protected attributes(): Record<string, string | number | undefined> {
    return { roadId: this.roadId, laneId: this.laneId, s: this.s, offset: this.offset };
  }

  protected orientation(): Orientation {
    return this.orient;
  }
}

/** s along the reference line, t to the left of it */
export class RoadPosition extends PositionBase {
  protected readonly kind = 'RoadPosition';

  constructor(
    readonly s: number,
    readonly t: number,
    readonly roadId: number,
    readonly orient = new Orientation()
  ) {
    super();
  }

  protected attributes(): Record<string, string | number | undefined> {
    return { roadId: this.roadId, s: this.s, t: this.t };
  }

  protected orientation(): Orientation {
    return this.orient;
  }
}

export interface RelativeLanePositionOptions {
  ds?: number;
  dsLane?: number;
  offset?: number;
  orientation?: Orientation;
}

/**
 * Lane-relative position from an entity: dLane lanes over, and either ds along
 * the reference line or dsLane along the lane.
 */
export class RelativeLanePosition extends PositionBase {
  protected readonly kind = 'RelativeLanePosition';
  readonly ds?: number;
  readonly dsLane?: number;
  readonly offset: number;
  readonly orient: Orientation;

  constructor(
    readonly laneId: number,
    readonly entity: string,
    options: RelativeLanePositionOptions = {}
  ) {
    super();
    if (options.ds !== undefined && options.dsLane !== undefined) {
      throw new ToManyOptionalArguments('Only one of ds and dsLane can be set');
    }
    if (options.ds === undefined && options.dsLane === undefined) {
      throw new NotEnoughInputArguments('Either ds or dsLane is needed');
    }
    this.ds = options.ds;
    this.dsLane = options.dsLane;
    this.offset = options.offset ?? 0;
    this.orient = options.orientation ?? new Orientation();
  }

  protected attributes(): Record<string, string | number | undefined> {
    return { entityRef: this.entity, ds: this.ds, dsLane: this.dsLane, offset: this.offset, dLane: this.laneId };
  }

  protected orientation(): Orientation {
    return this.orient;
  }
}
