import { GeneralIssueInputArguments, NotEnoughInputArguments, ToManyOptionalArguments } from '../errors';
import type { PoseWithLength } from '../types';
import { EulerSpiral } from './clothoid';
import type { ParamPoly3Range } from './enums';
import { integrate } from './numeric';
import { attrs, element } from './xml';
import type { XmlElement, XmlSerializable } from './xml';

/**
 * Shape of one plan view record.
 *
 * `getEndData` walks the shape forward from its start pose. `getStartData` walks it
 * backwards: it takes the end position with the reversed heading and returns the start
 * position, again with the reversed heading.
 */
export interface GeometryPrimitive extends XmlSerializable {
  readonly length: number;
  getEndData(x: number, y: number, h: number): PoseWithLength;
  getStartData(x: number, y: number, h: number): PoseWithLength;
}

function countDefined(...values: (number | undefined)[]): number {
  return values.filter((value) => value !== undefined).length;
}

export class Line implements GeometryPrimitive {
  constructor(readonly length: number) {}

  getEndData(x: number, y: number, h: number): PoseWithLength {
    return {
      x: x + this.length * Math.cos(h),
      y: y + this.length * Math.sin(h),
      h,
      length: this.length,
    };
  }

  getStartData(x: number, y: number, h: number): PoseWithLength {
    return this.getEndData(x, y, h);
  }

  getElement(): XmlElement {
    return element('line');
  }
}

export interface ArcOptions {
  length?: number;
  angle?: number;
}

export class Arc implements GeometryPrimitive {
  readonly curvature: number;
  readonly length: number;

  constructor(curvature: number, options: ArcOptions) {
    if (curvature === 0) {
      throw new GeneralIssueInputArguments('Arc curvature must not be 0, use a Line instead');
    }
    const given = countDefined(options.length, options.angle);
    if (given === 0) {
      throw new NotEnoughInputArguments('Arc needs either length or angle');
    }
    if (given > 1) {
      throw new ToManyOptionalArguments('Arc takes only one of length and angle');
    }
    this.curvature = curvature;
    this.length = options.length ?? Math.abs((options.angle ?? 0) / curvature);
  }

  get angle(): number {
    return this.curvature * this.length;
  }

  private walk(x: number, y: number, h: number, curvature: number): PoseWithLength {
    const radius = 1 / curvature;
    const cx = x - radius * Math.sin(h);
    const cy = y + radius * Math.cos(h);
    const endH = h + curvature * this.length;
    return {
      x: cx + radius * Math.sin(endH),
      y: cy - radius * Math.cos(endH),
      h: endH,
      length: this.length,
    };
  }

  getEndData(x: number, y: number, h: number): PoseWithLength {
    return this.walk(x, y, h, this.curvature);
  }

  getStartData(x: number, y: number, h: number): PoseWithLength {
    return this.walk(x, y, h, -this.curvature);
  }

  getElement(): XmlElement {
    return element('arc', attrs({ curvature: this.curvature }));
  }
}

export interface SpiralOptions {
  length?: number;
  angle?: number;
  /** Rate of curvature change along s */
  cdot?: number;
}

export class Spiral implements GeometryPrimitive {
  readonly curvStart: number;
  readonly curvEnd: number;
  readonly length: number;
  private readonly spiral: EulerSpiral;

  constructor(curvStart: number, curvEnd: number, options: SpiralOptions) {
    const given = countDefined(options.length, options.angle, options.cdot);
    if (given === 0) {
      throw new NotEnoughInputArguments('Spiral needs one of length, angle or cdot');
    }
    if (given > 1) {
      throw new ToManyOptionalArguments('Spiral takes only one of length, angle and cdot');
    }
    this.curvStart = curvStart;
    this.curvEnd = curvEnd;

    if (options.length !== undefined) {
      this.length = options.length;
    } else if (options.angle !== undefined) {
      const peak = Math.max(Math.abs(curvStart), Math.abs(curvEnd));
      if (peak === 0) {
        throw new GeneralIssueInputArguments('Spiral with zero curvature cannot turn an angle');
      }
      this.length = (2 * Math.abs(options.angle)) / peak;
    } else {
      const cdot = options.cdot ?? 0;
      if (cdot === 0) {
        throw new GeneralIssueInputArguments('Spiral cdot must not be 0');
      }
      this.length = (curvEnd - curvStart) / cdot;
    }

    if (!(this.length > 0)) {
      throw new GeneralIssueInputArguments(`Spiral length must be positive, got ${this.length}`);
    }
    this.spiral = new EulerSpiral((curvEnd - curvStart) / this.length);
  }

  getEndData(x: number, y: number, h: number): PoseWithLength {
    const pose = this.spiral.calc(this.length, x, y, this.curvStart, h);
    return { ...pose, length: this.length };
  }

  getStartData(x: number, y: number, h: number): PoseWithLength {
    const pose = this.spiral.calc(this.length, x, y, -this.curvEnd, h);
    return { ...pose, length: this.length };
  }

  getElement(): XmlElement {
    return element('spiral', attrs({ curvStart: this.curvStart, curvEnd: this.curvEnd }));
  }
}

export interface ParamPoly3Coefficients {
  aU: number;
  bU: number;
  cU: number;
  dU: number;
  aV: number;
  bV: number;
  cV: number;
  dV: number;
}

/**
 * Cubic curve in the local (u, v) frame of its start pose.
 * In `normalized` range p runs over [0, 1], in `arcLength` range over [0, length].
 */
export class ParamPoly3 implements GeometryPrimitive {
  readonly coefficients: ParamPoly3Coefficients;
  readonly pRange: ParamPoly3Range;
  readonly length: number;

  constructor(coefficients: ParamPoly3Coefficients, pRange: ParamPoly3Range = 'normalized', length?: number) {
    this.coefficients = { ...coefficients };
    this.pRange = pRange;

    if (pRange === 'arcLength') {
      if (length === undefined) {
        throw new NotEnoughInputArguments('ParamPoly3 with pRange arcLength needs a length');
      }
      this.length = length;
    } else {
      this.length = length ?? this.computeLength();
    }
  }

  private get pEnd(): number {
    return this.pRange === 'normalized' ? 1 : this.length;
  }

  private computeLength(): number {
    const [length] = integrate(
      (p) => {
        const { du, dv } = this.derivative(p);
        return [Math.hypot(du, dv)];
      },
      0,
      1,
      8
    );
    return length;
  }

  private local(p: number): { u: number; v: number } {
    const { aU, bU, cU, dU, aV, bV, cV, dV } = this.coefficients;
    return {
      u: aU + bU * p + cU * p ** 2 + dU * p ** 3,
      v: aV + bV * p + cV * p ** 2 + dV * p ** 3,
    };
  }

  private derivative(p: number): { du: number; dv: number } {
    const { bU, cU, dU, bV, cV, dV } = this.coefficients;
    return {
      du: bU + 2 * cU * p + 3 * dU * p ** 2,
      dv: bV + 2 * cV * p + 3 * dV * p ** 2,
    };
  }

  getEndData(x: number, y: number, h: number): PoseWithLength {
    const { u, v } = this.local(this.pEnd);
    const { du, dv } = this.derivative(this.pEnd);
    return {
      x: x + u * Math.cos(h) - v * Math.sin(h),
      y: y + u * Math.sin(h) + v * Math.cos(h),
      h: h + Math.atan2(dv, du),
      length: this.length,
    };
  }

  getStartData(x: number, y: number, h: number): PoseWithLength {
    const { u, v } = this.local(this.pEnd);
    const { du, dv } = this.derivative(this.pEnd);
    const startH = h - Math.PI - Math.atan2(dv, du);
    return {
      x: x - (u * Math.cos(startH) - v * Math.sin(startH)),
      y: y - (u * Math.sin(startH) + v * Math.cos(startH)),
      h: startH + Math.PI,
      length: this.length,
    };
  }

  getElement(): XmlElement {
    return element('paramPoly3', attrs({ ...this.coefficients, pRange: this.pRange }));
  }
}
