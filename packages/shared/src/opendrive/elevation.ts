import { GeneralIssueInputArguments } from '../errors';
import type { AdjustmentState } from './enums';
import { attrs, element } from './xml';
import type { XmlElement } from './xml';

export type ProfileKind = 'elevation' | 'superelevation' | 'shape';

/**
 * Cubic record a + b·ds + c·ds² + d·ds³ starting at s.
 * Shape records also carry the lateral position t.
 */
export class Poly3Profile {
  constructor(
    readonly s: number,
    readonly a: number,
    readonly b: number,
    readonly c: number,
    readonly d: number,
    readonly kind: ProfileKind = 'elevation',
    readonly t?: number
  ) {
    if (kind === 'shape' && t === undefined) {
      throw new GeneralIssueInputArguments('A shape profile needs a t value');
    }
    if (kind !== 'shape' && t !== undefined) {
      throw new GeneralIssueInputArguments(`A ${kind} profile takes no t value`);
    }
  }

  evalAt(s: number): number {
    if (s < this.s) {
      throw new GeneralIssueInputArguments(`Profile starting at s=${this.s} evaluated at s=${s}`);
    }
    const ds = s - this.s;
    return this.a + this.b * ds + this.c * ds ** 2 + this.d * ds ** 3;
  }

  evalDerivativeAt(s: number): number {
    if (s < this.s) {
      throw new GeneralIssueInputArguments(`Profile starting at s=${this.s} evaluated at s=${s}`);
    }
    const ds = s - this.s;
    return this.b + 2 * this.c * ds + 3 * this.d * ds ** 2;
  }

  getElement(): XmlElement {
    return element(this.kind, attrs({ s: this.s, t: this.t, a: this.a, b: this.b, c: this.c, d: this.d }));
  }
}

/** Record in effect at s: the last one starting at or before it */
function recordAt(records: readonly Poly3Profile[], s: number): Poly3Profile | undefined {
  let found: Poly3Profile | undefined;
  for (const record of records) {
    if (record.s <= s) found = record;
  }
  return found;
}

export class ElevationProfile {
  readonly elevations: Poly3Profile[] = [];
  state: AdjustmentState = 'unadjusted';

  addElevation(profile: Poly3Profile): this {
    this.elevations.push(profile);
    this.state = 'adjusted';
    return this;
  }

  evalAt(s: number): number {
    return recordAt(this.elevations, s)?.evalAt(s) ?? 0;
  }

  evalDerivativeAt(s: number): number {
    return recordAt(this.elevations, s)?.evalDerivativeAt(s) ?? 0;
  }

  /** Roads without elevation get one flat record */
  getElement(): XmlElement {
    const records = this.elevations.length > 0 ? this.elevations : [new Poly3Profile(0, 0, 0, 0, 0)];
    return element(
      'elevationProfile',
      {},
      records.map((record) => record.getElement())
    );
  }
}

export class LateralProfile {
  readonly superelevations: Poly3Profile[] = [];
  readonly shapes: Poly3Profile[] = [];
  superelevationState: AdjustmentState = 'unadjusted';
  shapeState: AdjustmentState = 'unadjusted';

  addSuperelevation(profile: Poly3Profile): this {
    this.superelevations.push(profile);
    this.superelevationState = 'adjusted';
    return this;
  }

  addShape(profile: Poly3Profile): this {
    this.shapes.push(profile);
    this.shapeState = 'adjusted';
    return this;
  }

  /** Superelevation angle at s, 0 where none is defined */
  superelevationAt(s: number): number {
    return recordAt(this.superelevations, s)?.evalAt(s) ?? 0;
  }

  superelevationDerivativeAt(s: number): number {
    return recordAt(this.superelevations, s)?.evalDerivativeAt(s) ?? 0;
  }

  getElement(): XmlElement {
    return element('lateralProfile', {}, [
      ...this.superelevations.map((record) => record.getElement()),
      ...this.shapes.map((record) => record.getElement()),
    ]);
  }
}
