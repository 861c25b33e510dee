import { settings } from '../config';
import { GeneralIssueInputArguments } from '../errors';
import { normalizeAngle, Vector2 } from '../types';
import type { Pose } from '../types';
import { fresnelIntegral, integrate, solveLinearSystem } from './numeric';

// Above this Fresnel argument the phase πt²/2 loses too many digits
const MAX_FRESNEL_ARGUMENT = 100;

/**
 * Curve whose curvature changes linearly with arc length: κ(s) = κ0 + γ·s.
 */
export class EulerSpiral {
  constructor(readonly gamma: number) {}

  curvature(s: number, kappa0: number): number {
    return kappa0 + this.gamma * s;
  }

  /** Pose after travelling `s` from (x0, y0, theta0) with start curvature kappa0 */
  calc(s: number, x0 = 0, y0 = 0, kappa0 = 0, theta0 = 0): Pose {
    const gamma = this.gamma;
    const h = theta0 + kappa0 * s + 0.5 * gamma * s * s;

    if (gamma === 0 && kappa0 === 0) {
      return { x: x0 + Math.cos(theta0) * s, y: y0 + Math.sin(theta0) * s, h };
    }

    if (gamma === 0) {
      const u = Math.sin(kappa0 * s) / kappa0;
      const v = (1 - Math.cos(kappa0 * s)) / kappa0;
      return {
        x: x0 + Math.cos(theta0) * u - Math.sin(theta0) * v,
        y: y0 + Math.sin(theta0) * u + Math.cos(theta0) * v,
        h,
      };
    }

    const root = Math.sqrt(Math.PI * Math.abs(gamma));
    const lower = kappa0 / root;
    const upper = (kappa0 + gamma * s) / root;

    if (Math.max(Math.abs(lower), Math.abs(upper)) > MAX_FRESNEL_ARGUMENT) {
      return this.integrateHeading(s, x0, y0, kappa0, theta0);
    }

    const { s: sinPart, c: cosPart } = fresnelIntegral(lower, upper);
    const scale = Math.sqrt(Math.PI / Math.abs(gamma));
    const phase = theta0 - (kappa0 * kappa0) / (2 * gamma);
    const re = Math.sign(gamma) * cosPart;
    const im = sinPart;
    return {
      x: x0 + scale * (Math.cos(phase) * re - Math.sin(phase) * im),
      y: y0 + scale * (Math.sin(phase) * re + Math.cos(phase) * im),
      h,
    };
  }

  // Nearly-circular spirals: integrate the heading polynomial directly
  private integrateHeading(s: number, x0: number, y0: number, kappa0: number, theta0: number): Pose {
    const turn = Math.abs(kappa0 * s) + Math.abs(0.5 * this.gamma * s * s);
    const [dx, dy] = integrate(
      (u) => {
        const heading = theta0 + kappa0 * u + 0.5 * this.gamma * u * u;
        return [Math.cos(heading), Math.sin(heading)];
      },
      0,
      s,
      Math.ceil(2 * turn) + 1
    );
    return { x: x0 + dx, y: y0 + dy, h: theta0 + kappa0 * s + 0.5 * this.gamma * s * s };
  }
}

export interface ClothoidSegment {
  curvatureStart: number;
  curvatureEnd: number;
  length: number;
}

export interface ClothoidEndpoint extends Pose {
  curvature: number;
}

/** Hermite G2 fit: position, heading and curvature matched at both ends */
export interface ClothoidG2Solver {
  solve(start: ClothoidEndpoint, end: ClothoidEndpoint): ClothoidSegment[];
}

/**
 * Fits three clothoids of equal length between two G2 endpoints.
 *
 * The heading condition fixes the sum of the two inner curvatures for a given
 * segment length, leaving segment length and curvature difference to a damped
 * Newton iteration on the end position.
 */
export class ThreeClothoidG2Solver implements ClothoidG2Solver {
  constructor(
    private readonly tolerance = settings.get().g2Tolerance,
    private readonly maxIterations = settings.get().g2MaxIterations
  ) {}

  solve(start: ClothoidEndpoint, end: ClothoidEndpoint): ClothoidSegment[] {
    const target = new Vector2(end.x - start.x, end.y - start.y).rotate(-start.h);
    const chord = target.magnitude();
    if (chord === 0) {
      throw new GeneralIssueInputArguments('G2 fit needs two distinct endpoints');
    }
    const turn = normalizeAngle(end.h - start.h);
    const k0 = start.curvature;
    const k1 = end.curvature;

    const segmentsFor = (segmentLength: number, delta: number): ClothoidSegment[] => {
      const sum = turn / segmentLength - 0.5 * (k0 + k1);
      const ka = 0.5 * (sum + delta);
      const kb = 0.5 * (sum - delta);
      return [
        { curvatureStart: k0, curvatureEnd: ka, length: segmentLength },
        { curvatureStart: ka, curvatureEnd: kb, length: segmentLength },
        { curvatureStart: kb, curvatureEnd: k1, length: segmentLength },
      ];
    };

    const residual = (segmentLength: number, delta: number): Vector2 => {
      let pose: Pose = { x: 0, y: 0, h: 0 };
      for (const segment of segmentsFor(segmentLength, delta)) {
        const spiral = new EulerSpiral((segment.curvatureEnd - segment.curvatureStart) / segment.length);
        pose = spiral.calc(segment.length, pose.x, pose.y, segment.curvatureStart, pose.h);
      }
      return new Vector2(pose.x, pose.y).minus(target);
    };

    const halfTurn = 0.5 * turn;
    const arcFactor = Math.abs(halfTurn) < 1e-9 ? 1 : halfTurn / Math.sin(halfTurn);
    let segmentLength = (chord * arcFactor) / 3;
    let delta = 0;
    let error = residual(segmentLength, delta);
    const limit = this.tolerance * Math.max(1, chord);

    for (let iteration = 0; iteration < this.maxIterations && error.magnitude() > limit; iteration++) {
      const stepL = 1e-7 * Math.max(1, segmentLength);
      const stepD = 1e-7 * Math.max(1e-3, Math.abs(delta), 1 / segmentLength);
      const dL = residual(segmentLength + stepL, delta).minus(error).scale(1 / stepL);
      const dD = residual(segmentLength, delta + stepD).minus(error).scale(1 / stepD);

      let update: number[];
      try {
        update = solveLinearSystem(
          [
            [dL.x, dD.x],
            [dL.y, dD.y],
          ],
          [-error.x, -error.y]
        );
      } catch (cause) {
        throw new GeneralIssueInputArguments(
          `G2 fit became singular after ${iteration} iterations: ${String(cause)}`
        );
      }

      let damping = 1;
      let accepted = false;
      while (damping > 1e-6) {
        const nextLength = segmentLength + damping * update[0];
        const nextDelta = delta + damping * update[1];
        if (nextLength > 0) {
          const nextError = residual(nextLength, nextDelta);
          if (nextError.magnitude() < error.magnitude()) {
            segmentLength = nextLength;
            delta = nextDelta;
            error = nextError;
            accepted = true;
            break;
          }
        }
        damping *= 0.5;
      }
      if (!accepted) break;
    }

    if (error.magnitude() > limit) {
      throw new GeneralIssueInputArguments(
        `G2 fit did not converge (residual ${error.magnitude().toExponential(3)})`
      );
    }
    return segmentsFor(segmentLength, delta);
  }
}
