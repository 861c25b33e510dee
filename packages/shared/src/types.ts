/** Planar position and heading (radians, counter-clockwise from +x) */
export interface Pose {
  x: number;
  y: number;
  h: number;
}

/** Pose reached after travelling a geometry, with the distance travelled */
export interface PoseWithLength extends Pose {
  length: number;
}

export class Vector2 {
  readonly x: number;
  readonly y: number;

  constructor(x = 0, y = 0) {
    this.x = x;
    this.y = y;
  }

  minus(v: Vector2): Vector2 {
    return new Vector2(this.x - v.x, this.y - v.y);
  }

  scale(factor: number): Vector2 {
    return new Vector2(this.x * factor, this.y * factor);
  }

  /** Rotate counter-clockwise about the origin */
  rotate(angle: number): Vector2 {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    return new Vector2(c * this.x - s * this.y, s * this.x + c * this.y);
  }

  magnitude(): number {
    return Math.hypot(this.x, this.y);
  }
}

/** Wrap an angle into [0, 2π) */
export function wrapAngle(angle: number): number {
  const twoPi = 2 * Math.PI;
  const wrapped = angle % twoPi;
  return wrapped < 0 ? wrapped + twoPi : wrapped;
}

/** Normalize an angle into (-π, π] */
export function normalizeAngle(angle: number): number {
  let result = angle;
  while (result > Math.PI) result -= 2 * Math.PI;
  while (result <= -Math.PI) result += 2 * Math.PI;
  return result;
}
