import { GeneralIssueInputArguments, RoadsAndLanesNotAdjusted } from '../src/errors';
import { ElevationProfile, LateralProfile, Poly3Profile } from '../src/opendrive/elevation';
import { createRoad } from '../src/opendrive/generators';
import { Line } from '../src/opendrive/geometry';
import { DirectJunctionCreator } from '../src/opendrive/junction-creator';
import { OpenDrive } from '../src/opendrive/opendrive';

describe('Poly3Profile', () => {
  it('should evaluate the cubic and its slope from its own s', () => {
    const profile = new Poly3Profile(10, 1, 0.5, 0.25, 0.125);
    expect(profile.evalAt(12)).toBe(1 + 1 + 1 + 1);
    expect(profile.evalDerivativeAt(12)).toBe(0.5 + 1 + 1.5);
  });

  it('should refuse to evaluate before its start', () => {
    expect(() => new Poly3Profile(10, 1, 0, 0, 0).evalAt(5)).toThrow(GeneralIssueInputArguments);
  });

  it('should take a t value for shapes only', () => {
    expect(() => new Poly3Profile(0, 0, 0, 0, 0, 'shape')).toThrow(GeneralIssueInputArguments);
    expect(() => new Poly3Profile(0, 0, 0, 0, 0, 'elevation', 1)).toThrow(GeneralIssueInputArguments);
    expect(new Poly3Profile(0, 1, 0, 0, 0, 'shape', -2).getElement().attributes).toEqual({
      s: '0',
      t: '-2',
      a: '1',
      b: '0',
      c: '0',
      d: '0',
    });
  });
});

describe('ElevationProfile', () => {
  it('should use the last record starting at or before s', () => {
    const profile = new ElevationProfile()
      .addElevation(new Poly3Profile(0, 1, 0, 0, 0))
      .addElevation(new Poly3Profile(20, 5, 0.5, 0, 0));
    expect(profile.evalAt(10)).toBe(1);
    expect(profile.evalAt(22)).toBe(6);
    expect(profile.evalDerivativeAt(22)).toBe(0.5);
    expect(profile.state).toBe('adjusted');
  });

  it('should write a flat record when it has none', () => {
    const profile = new ElevationProfile();
    expect(profile.evalAt(3)).toBe(0);
    expect(profile.getElement().children.map((child) => child.attributes)).toEqual([
      { s: '0', a: '0', b: '0', c: '0', d: '0' },
    ]);
  });
});

describe('LateralProfile', () => {
  it('should evaluate superelevation and its slope', () => {
    const profile = new LateralProfile().addSuperelevation(new Poly3Profile(0, 0.1, 0.01, 0, 0, 'superelevation'));
    expect(profile.superelevationAt(2)).toBeCloseTo(0.12, 12);
    expect(profile.superelevationDerivativeAt(2)).toBe(0.01);
    expect(new LateralProfile().superelevationAt(2)).toBe(0);
  });
});

describe('OpenDrive.adjustElevations', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it('should blend a road between two elevated neighbours', () => {
    const first = createRoad(new Line(100), 1).addSuccessor('road', 2, 'start').addElevation(0, 10, 0.02, 0, 0);
    const middle = createRoad(new Line(50), 2).addPredecessor('road', 1, 'end').addSuccessor('road', 3, 'start');
    const last = createRoad(new Line(100), 3).addPredecessor('road', 2, 'end').addElevation(0, 20, 0, 0, 0);
    const network = new OpenDrive('test-net').addRoad(first).addRoad(middle).addRoad(last);
    network.adjustStartpoints();

    network.adjustElevations();

    const profile = middle.elevationProfile;
    expect(middle.isAdjusted('elevation')).toBe(true);
    expect(profile.evalAt(0)).toBeCloseTo(12, 10);
    expect(profile.evalDerivativeAt(0)).toBeCloseTo(0.02, 10);
    expect(profile.evalAt(50)).toBeCloseTo(20, 10);
    expect(profile.evalDerivativeAt(50)).toBeCloseTo(0, 10);
    expect(profile.elevations[0].c).toBeCloseTo(0.0088, 12);
    expect(profile.elevations[0].d).toBeCloseTo(-0.00012, 12);
  });

  it('should continue the slope of a single neighbour', () => {
    const first = createRoad(new Line(100), 1).addSuccessor('road', 2, 'start').addElevation(0, 5, 0.1, 0, 0);
    const second = createRoad(new Line(50), 2).addPredecessor('road', 1, 'end');
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustStartpoints();

    network.adjustElevations();

    expect(second.elevationProfile.evalAt(0)).toBeCloseTo(15, 10);
    expect(second.elevationProfile.evalAt(50)).toBeCloseTo(20, 10);
  });

  it('should flip slope and bank for a neighbour running the other way', () => {
    const first = createRoad(new Line(100), 1)
      .addPredecessor('road', 2, 'start')
      .addElevation(0, 5, 0.1, 0, 0)
      .addSuperelevation(0, 0.05, 0, 0, 0);
    const second = createRoad(new Line(50), 2).addPredecessor('road', 1, 'start');
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustStartpoints();

    network.adjustElevations();

    expect(second.elevationProfile.evalAt(0)).toBeCloseTo(5, 10);
    expect(second.elevationProfile.evalAt(50)).toBeCloseTo(0, 10);
    expect(second.lateralProfile.superelevationAt(25)).toBeCloseTo(-0.05, 12);
  });

  it('should start elevation at zero when only superelevation is given', () => {
    const first = createRoad(new Line(100), 1).addSuccessor('road', 2, 'start').addSuperelevation(0, 0.05, 0, 0, 0);
    const second = createRoad(new Line(50), 2).addPredecessor('road', 1, 'end');
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustStartpoints();

    network.adjustElevations();

    expect(first.isAdjusted('elevation')).toBe(true);
    expect(second.isAdjusted('elevation')).toBe(true);
    expect(second.elevationProfile.evalAt(50)).toBeCloseTo(0, 12);
    expect(second.lateralProfile.superelevationAt(0)).toBeCloseTo(0.05, 12);
  });

  it('should leave a network without any profile untouched', () => {
    const first = createRoad(new Line(100), 1).addSuccessor('road', 2, 'start');
    const second = createRoad(new Line(50), 2).addPredecessor('road', 1, 'end');
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustStartpoints();

    network.adjustElevations();

    expect(first.isAdjusted('elevation')).toBe(false);
    expect(second.isAdjusted('superelevation')).toBe(false);
  });

  it('should lift an exit that leaves a banked road off-centre', () => {
    const main = createRoad(new Line(100), 1, { rightLanes: 3 })
      .addSuccessor('junction', 2)
      .addElevation(0, 0, 0, 0, 0)
      .addSuperelevation(0, 0.1, 0, 0, 0);
    const through = createRoad(new Line(100), 2, { rightLanes: 2 }).addPredecessor('junction', 2);
    const exit = createRoad(new Line(50), 3, { rightLanes: 1 }).addPredecessor('junction', 2);
    const creator = new DirectJunctionCreator(2, 'exit')
      .addConnection(main, through, [-1, -2], [-1, -2])
      .addConnection(main, exit, -3, -1);
    const network = new OpenDrive('test-net').addRoad(main).addRoad(through).addRoad(exit).addJunctionCreator(creator);
    network.adjustStartpoints();

    network.adjustElevations();

    expect(through.lateralProfile.superelevationAt(0)).toBeCloseTo(0.1, 12);
    expect(exit.lateralProfile.superelevationAt(0)).toBeCloseTo(0.1, 12);
    expect(through.elevationProfile.evalAt(0)).toBeCloseTo(0, 10);
    // the exit starts 6 m right of the banked reference line
    expect(exit.elevationProfile.evalAt(0)).toBeCloseTo(-6 * Math.sin(0.1), 10);
  });

  it('should warn when a connecting road takes its elevation from its neighbours', () => {
    const incoming = createRoad(new Line(50), 1).addSuccessor('junction', 1).addElevation(0, 1, 0, 0, 0);
    const connector = createRoad(new Line(20), 100, { roadType: 1 })
      .addPredecessor('road', 1, 'end')
      .addSuccessor('road', 2, 'start');
    const outgoing = createRoad(new Line(50), 2).addPredecessor('junction', 1).addElevation(0, 3, 0, 0, 0);
    const network = new OpenDrive('test-net').addRoad(incoming).addRoad(connector).addRoad(outgoing);
    network.adjustStartpoints();

    network.adjustElevations();

    expect(connector.elevationProfile.evalAt(10)).toBeCloseTo(2, 10);
    const lines = consoleSpy.mock.calls.map((call) => String(call[0]));
    expect(
      lines.some((line) =>
        line.endsWith('[WARN] Connecting road 100 got its elevation from road 1 and 2, set it explicitly if the result looks off')
      )
    ).toBe(true);
  });

  it('should need positioned roads', () => {
    const network = new OpenDrive('test-net').addRoad(createRoad(new Line(10), 1));
    expect(() => network.adjustElevations()).toThrow(RoadsAndLanesNotAdjusted);
  });
});
