import { EulerSpiral, ThreeClothoidG2Solver } from '../src/opendrive/clothoid';
import type { ClothoidEndpoint, ClothoidSegment } from '../src/opendrive/clothoid';
import { GeneralIssueInputArguments } from '../src/errors';
import { normalizeAngle } from '../src/types';
import type { Pose } from '../src/types';

function walk(start: ClothoidEndpoint, segments: ClothoidSegment[]): Pose {
  let pose: Pose = { x: start.x, y: start.y, h: start.h };
  for (const segment of segments) {
    const spiral = new EulerSpiral((segment.curvatureEnd - segment.curvatureStart) / segment.length);
    pose = spiral.calc(segment.length, pose.x, pose.y, segment.curvatureStart, pose.h);
  }
  return pose;
}

describe('EulerSpiral', () => {
  it('should move straight without curvature', () => {
    const pose = new EulerSpiral(0).calc(10, 1, 2, 0, Math.PI / 2);
    expect(pose.x).toBeCloseTo(1, 12);
    expect(pose.y).toBeCloseTo(12, 12);
    expect(pose.h).toBeCloseTo(Math.PI / 2, 12);
  });

  it('should follow a circle with constant curvature', () => {
    const pose = new EulerSpiral(0).calc(Math.PI / 2, 0, 0, 1, 0);
    expect(pose.x).toBeCloseTo(1, 12);
    expect(pose.y).toBeCloseTo(1, 12);
    expect(pose.h).toBeCloseTo(Math.PI / 2, 12);
  });

  it('should match the Fresnel integrals for a unit clothoid', () => {
    // gamma = pi makes the scaled Fresnel argument equal to s
    const pose = new EulerSpiral(Math.PI).calc(1);
    expect(pose.x).toBeCloseTo(0.7798934003768228, 10);
    expect(pose.y).toBeCloseTo(0.4382591473903548, 10);
    expect(pose.h).toBeCloseTo(Math.PI / 2, 12);
  });

  it('should mirror for negative gamma', () => {
    const pose = new EulerSpiral(-Math.PI).calc(1);
    expect(pose.x).toBeCloseTo(0.7798934003768228, 10);
    expect(pose.y).toBeCloseTo(-0.4382591473903548, 10);
  });

  it('should agree with direct integration for nearly circular spirals', () => {
    const spiral = new EulerSpiral(1e-9);
    const pose = spiral.calc(Math.PI, 0, 0, 1, 0);
    expect(pose.x).toBeCloseTo(0, 6);
    expect(pose.y).toBeCloseTo(2, 6);
  });
});

describe('ThreeClothoidG2Solver', () => {
  const solver = new ThreeClothoidG2Solver();

  it('should reach the end pose of a left turn', () => {
    const start = { x: 0, y: 0, h: 0, curvature: 1e-9 };
    const end = { x: 20, y: 10, h: Math.PI / 2, curvature: 1e-9 };
    const segments = solver.solve(start, end);
    const pose = walk(start, segments);

    expect(segments).toHaveLength(3);
    expect(pose.x).toBeCloseTo(20, 6);
    expect(pose.y).toBeCloseTo(10, 6);
    expect(normalizeAngle(pose.h - end.h)).toBeCloseTo(0, 9);
  });

  it('should keep the boundary curvatures', () => {
    const start = { x: 5, y: -3, h: 0.3, curvature: 0.01 };
    const end = { x: 30, y: 4, h: -0.2, curvature: -0.02 };
    const segments = solver.solve(start, end);
    const pose = walk(start, segments);

    expect(segments[0].curvatureStart).toBe(0.01);
    expect(segments[2].curvatureEnd).toBe(-0.02);
    expect(segments[0].curvatureEnd).toBe(segments[1].curvatureStart);
    expect(segments[1].curvatureEnd).toBe(segments[2].curvatureStart);
    expect(pose.x).toBeCloseTo(30, 6);
    expect(pose.y).toBeCloseTo(4, 6);
  });

  it('should solve a straight connection with straight segments', () => {
    const segments = solver.solve({ x: 0, y: 0, h: 0, curvature: 0 }, { x: 30, y: 0, h: 0, curvature: 0 });
    for (const segment of segments) {
      expect(segment.length).toBeCloseTo(10, 9);
      expect(segment.curvatureStart).toBeCloseTo(0, 12);
      expect(segment.curvatureEnd).toBeCloseTo(0, 12);
    }
  });

  it('should reject coinciding endpoints', () => {
    const pose = { x: 1, y: 1, h: 0, curvature: 0 };
    expect(() => solver.solve(pose, pose)).toThrow(GeneralIssueInputArguments);
  });
});
