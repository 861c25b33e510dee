import { Arc, Line, ParamPoly3, Spiral } from '../src/opendrive/geometry';
import { GeneralIssueInputArguments, NotEnoughInputArguments, ToManyOptionalArguments } from '../src/errors';

describe('Line', () => {
  it('should move along the heading', () => {
    const end = new Line(10).getEndData(1, 1, Math.PI / 2);
    expect(end.x).toBeCloseTo(1, 12);
    expect(end.y).toBeCloseTo(11, 12);
    expect(end.h).toBe(Math.PI / 2);
    expect(end.length).toBe(10);
  });

  it('should emit an empty line element', () => {
    expect(new Line(5).getElement()).toEqual({ tag: 'line', attributes: {}, children: [] });
  });
});

describe('Arc', () => {
  it('should derive the length from the angle', () => {
    const arc = new Arc(0.5, { angle: Math.PI });
    expect(arc.length).toBeCloseTo(2 * Math.PI, 12);
  });

  it('should turn a quarter circle to the left', () => {
    const end = new Arc(0.1, { angle: Math.PI / 2 }).getEndData(0, 0, 0);
    expect(end.x).toBeCloseTo(10, 10);
    expect(end.y).toBeCloseTo(10, 10);
    expect(end.h).toBeCloseTo(Math.PI / 2, 12);
  });

  it('should walk back from the end to the start', () => {
    const arc = new Arc(-0.1, { length: 7 });
    const end = arc.getEndData(2, 3, 0.4);
    const start = arc.getStartData(end.x, end.y, end.h + Math.PI);
    expect(start.x).toBeCloseTo(2, 10);
    expect(start.y).toBeCloseTo(3, 10);
    expect(start.h - Math.PI).toBeCloseTo(0.4, 10);
  });

  it('should validate its arguments', () => {
    expect(() => new Arc(0.1, {})).toThrow(NotEnoughInputArguments);
    expect(() => new Arc(0.1, { length: 1, angle: 1 })).toThrow(ToManyOptionalArguments);
    expect(() => new Arc(0, { length: 1 })).toThrow(GeneralIssueInputArguments);
  });
});

describe('Spiral', () => {
  it('should derive the length from angle or cdot', () => {
    expect(new Spiral(0, 0.1, { angle: 0.5 }).length).toBeCloseTo(10, 12);
    expect(new Spiral(0, 0.1, { cdot: 0.01 }).length).toBeCloseTo(10, 12);
  });

  it('should end with the heading from its mean curvature', () => {
    const end = new Spiral(0, 0.1, { length: 10 }).getEndData(0, 0, 0);
    expect(end.h).toBeCloseTo(0.5, 12);
    expect(end.x).toBeGreaterThan(9.5);
    expect(end.y).toBeGreaterThan(0);
  });

  it('should walk back from the end to the start', () => {
    const spiral = new Spiral(0.02, -0.05, { length: 15 });
    const end = spiral.getEndData(-4, 6, 1.2);
    const start = spiral.getStartData(end.x, end.y, end.h + Math.PI);
    expect(start.x).toBeCloseTo(-4, 9);
    expect(start.y).toBeCloseTo(6, 9);
    expect(start.h - Math.PI).toBeCloseTo(1.2, 9);
  });

  it('should validate its arguments', () => {
    expect(() => new Spiral(0, 0.1, {})).toThrow(NotEnoughInputArguments);
    expect(() => new Spiral(0, 0.1, { length: 1, cdot: 1 })).toThrow(ToManyOptionalArguments);
    expect(() => new Spiral(0, 0, { angle: 1 })).toThrow(GeneralIssueInputArguments);
    expect(() => new Spiral(0.1, 0, { cdot: 0.01 })).toThrow(GeneralIssueInputArguments);
  });

  it('should emit its curvatures', () => {
    expect(new Spiral(0.001, 0.1, { length: 5 }).getElement()).toEqual({
      tag: 'spiral',
      attributes: { curvStart: '0.001', curvEnd: '0.1' },
      children: [],
    });
  });
});

describe('ParamPoly3', () => {
  const straight = { aU: 0, bU: 10, cU: 0, dU: 0, aV: 0, bV: 0, cV: 0, dV: 0 };

  it('should compute the length of a straight curve', () => {
    expect(new ParamPoly3(straight).length).toBeCloseTo(10, 10);
  });

  it('should need a length in arcLength range', () => {
    expect(() => new ParamPoly3(straight, 'arcLength')).toThrow(NotEnoughInputArguments);
    expect(new ParamPoly3({ ...straight, bU: 1 }, 'arcLength', 10).length).toBe(10);
  });

  it('should place the end in the frame of the start pose', () => {
    const end = new ParamPoly3(straight).getEndData(1, 2, Math.PI / 2);
    expect(end.x).toBeCloseTo(1, 10);
    expect(end.y).toBeCloseTo(12, 10);
    expect(end.h).toBeCloseTo(Math.PI / 2, 12);
  });

  it('should walk back from the end to the start', () => {
    const curve = new ParamPoly3({ aU: 0, bU: 10, cU: -2, dU: 1, aV: 0, bV: 0, cV: 3, dV: -1 });
    const end = curve.getEndData(0, 0, 0.3);
    const start = curve.getStartData(end.x, end.y, end.h + Math.PI);
    expect(start.x).toBeCloseTo(0, 9);
    expect(start.y).toBeCloseTo(0, 9);
    expect(start.h - Math.PI).toBeCloseTo(0.3, 9);
  });
});
