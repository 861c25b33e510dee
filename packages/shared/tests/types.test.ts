import { Vector2, normalizeAngle, wrapAngle } from '../src/types';

describe('Vector2', () => {
  it('should create a vector with the correct components', () => {
    const v = new Vector2(1, 2);
    expect(v.x).toBe(1);
    expect(v.y).toBe(2);
  });

  it('should subtract without mutating', () => {
    const v1 = new Vector2(1, 2);
    const v2 = new Vector2(3, 4);
    expect(v2.minus(v1)).toEqual(new Vector2(2, 2));
    expect(v1.x).toBe(1);
    expect(v2.y).toBe(4);
  });

  it('should scale a vector', () => {
    const v = new Vector2(2, 3).scale(3);
    expect(v.x).toBe(6);
    expect(v.y).toBe(9);
  });

  it('should calculate the magnitude', () => {
    expect(new Vector2(3, 4).magnitude()).toBe(5);
  });

  it('should rotate a quarter turn', () => {
    const v = new Vector2(1, 0).rotate(Math.PI / 2);
    expect(v.x).toBeCloseTo(0, 12);
    expect(v.y).toBeCloseTo(1, 12);
  });
});

describe('angle helpers', () => {
  it('should wrap into [0, 2π)', () => {
    expect(wrapAngle(2 * Math.PI)).toBe(0);
    expect(wrapAngle(-Math.PI / 2)).toBeCloseTo(1.5 * Math.PI, 12);
  });

  it('should normalize into (-π, π]', () => {
    expect(normalizeAngle(-Math.PI)).toBeCloseTo(Math.PI, 12);
    expect(normalizeAngle(1.5 * Math.PI)).toBeCloseTo(-Math.PI / 2, 12);
    expect(normalizeAngle(0)).toBe(0);
  });
});
