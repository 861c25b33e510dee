import { GeneralIssueInputArguments } from '../errors';
import { logger } from '../logger';
import type { Dynamic, ObjectType, Orientation } from './enums';
import { attrs, element } from './xml';
import type { XmlAttributes, XmlElement, XmlSerializable } from './xml';

export type IdKind = 'signal' | 'object';

/**
 * Hands out unique signal and object ids within one road network.
 * A requested id that is already taken is replaced by the lowest free counter value.
 */
export class IdAllocator {
  private readonly used = new Map<IdKind, Set<string>>();
  private readonly counters = new Map<IdKind, number>();

  assign(kind: IdKind, requested?: string): string {
    const used = this.used.get(kind) ?? new Set<string>();
    this.used.set(kind, used);

    if (requested !== undefined && !used.has(requested)) {
      used.add(requested);
      return requested;
    }
    if (requested !== undefined) {
      logger.warn(`${kind} id ${requested} is already used, generating a unique id`);
    }

    let counter = this.counters.get(kind) ?? 0;
    while (used.has(String(counter))) counter++;
    this.counters.set(kind, counter);
    const id = String(counter);
    used.add(id);
    return id;
  }

  reset(): void {
    this.used.clear();
    this.counters.clear();
  }
}

export class Validity implements XmlSerializable {
  constructor(
    readonly fromLane: number,
    readonly toLane: number
  ) {}

  getElement(): XmlElement {
    return element('validity', attrs({ fromLane: this.fromLane, toLane: this.toLane }));
  }
}

interface PlacementOptions {
  id?: string;
  name?: string;
  subtype?: string;
  dynamic?: Dynamic;
  zOffset?: number;
  orientation?: Orientation;
  pitch?: number;
  roll?: number;
  width?: number;
  height?: number;
}

/** Shared s/t placement of signals and objects */
abstract class RoadFeature implements XmlSerializable {
  id: string | undefined;
  protected validity: Validity | undefined;

  constructor(
    readonly s: number,
    readonly t: number,
    protected readonly options: PlacementOptions
  ) {
    this.id = options.id;
  }

  abstract readonly kind: IdKind;
  abstract getElement(): XmlElement;

  addValidity(fromLane: number, toLane: number): this {
    if (this.validity) {
      throw new GeneralIssueInputArguments(`Only one validity is allowed per ${this.kind}`);
    }
    this.validity = new Validity(fromLane, toLane);
    return this;
  }

  protected commonAttributes(type: string, defaultZOffset: number, defaultOrientation: Orientation): XmlAttributes {
    const o = this.options;
    return attrs({
      id: this.id,
      s: this.s,
      t: this.t,
      subtype: o.subtype,
      dynamic: o.dynamic ?? 'no',
      zOffset: o.zOffset ?? defaultZOffset,
      pitch: o.pitch,
      roll: o.roll,
      width: o.width,
      height: o.height,
      name: o.name,
      type,
      orientation: o.orientation ?? defaultOrientation,
    });
  }
}

export interface SignalOptions extends PlacementOptions {
  value?: number;
  unit?: string;
  hOffset?: number;
}

export class Signal extends RoadFeature {
  readonly kind = 'signal';

  constructor(
    s: number,
    t: number,
    readonly country: string,
    readonly signalType: string,
    private readonly signalOptions: SignalOptions = {}
  ) {
    super(s, t, { subtype: '-1', pitch: 0, roll: 0, ...signalOptions });
  }

  getElement(): XmlElement {
    const o = this.signalOptions;
    const attributes = {
      ...this.commonAttributes(this.signalType, 1.5, '+'),
      ...attrs({ country: this.country.toUpperCase(), hOffset: o.hOffset ?? 0 }),
      ...(o.value === undefined ? {} : attrs({ value: o.value, unit: o.unit ?? '' })),
    };
    return element('signal', attributes, this.validity ? [this.validity.getElement()] : []);
  }
}

export interface ObjectOptions extends PlacementOptions {
  hdg?: number;
  length?: number;
  radius?: number;
  validLength?: number;
}

export interface ObjectRepeat {
  length: number;
  distance: number;
  sStart?: number;
  tStart?: number;
  tEnd?: number;
  zOffsetStart?: number;
  zOffsetEnd?: number;
  heightStart?: number;
  heightEnd?: number;
  widthStart?: number;
  widthEnd?: number;
}

/**
 * Road object. Give either a radius or width and length; a missing one of
 * width/length becomes 0, and a radius overrides both.
 */
export class RoadObject extends RoadFeature {
  readonly kind = 'object';
  private readonly repeats: ObjectRepeat[] = [];
  private readonly size: { width?: number; length?: number; radius?: number };

  constructor(
    s: number,
    t: number,
    readonly objectType: ObjectType = 'none',
    private readonly objectOptions: ObjectOptions = {}
  ) {
    super(s, t, { pitch: 0, roll: 0, ...objectOptions, width: undefined });
    const { width, length, radius } = objectOptions;
    if (radius !== undefined) {
      if (width !== undefined || length !== undefined) {
        logger.warn(`Object ${objectOptions.id ?? ''} has a radius and width/length, using the radius`);
      }
      this.size = { radius };
    } else if (width !== undefined || length !== undefined) {
      this.size = { width: width ?? 0, length: length ?? 0 };
    } else {
      this.size = {};
    }
  }

  repeat(entry: ObjectRepeat): this {
    this.repeats.push(entry);
    return this;
  }

  private repeatElement(entry: ObjectRepeat): XmlElement {
    const height = this.objectOptions.height;
    const zOffset = this.objectOptions.zOffset ?? 0;
    return element(
      'repeat',
      attrs({
        s: entry.sStart ?? this.s,
        length: entry.length,
        distance: entry.distance,
        tStart: entry.tStart ?? this.t,
        tEnd: entry.tEnd ?? this.t,
        heightStart: entry.heightStart ?? height,
        heightEnd: entry.heightEnd ?? height,
        zOffsetStart: entry.zOffsetStart ?? zOffset,
        zOffsetEnd: entry.zOffsetEnd ?? zOffset,
        widthStart: entry.widthStart,
        widthEnd: entry.widthEnd,
      })
    );
  }

  getElement(): XmlElement {
    const o = this.objectOptions;
    const attributes = {
      ...this.commonAttributes(this.objectType, 0, 'none'),
      ...attrs({
        validLength: o.validLength,
        hdg: o.hdg ?? 0,
        radius: this.size.radius,
        length: this.size.length,
        width: this.size.width,
      }),
    };
    const children = this.repeats.map((entry) => this.repeatElement(entry));
    if (this.validity) children.push(this.validity.getElement());
    return element('object', attributes, children);
  }
}
