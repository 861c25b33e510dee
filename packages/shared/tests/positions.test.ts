import { NotEnoughInputArguments, ToManyOptionalArguments } from '../src/errors';
import {
  LanePosition,
  Orientation,
  RelativeLanePosition,
  RoadPosition,
  WorldPosition,
} from '../src/openscenario/position';

describe('Orientation', () => {
  it('should leave out zero angles', () => {
    const orientation = new Orientation(0, 0.1, undefined, 'relative');
    expect(orientation.isFilled).toBe(true);
    expect(orientation.getElement().attributes).toEqual({ p: '0.1', type: 'relative' });
  });

  it('should be empty without values', () => {
    expect(new Orientation().isFilled).toBe(false);
    expect(new Orientation(0, 0, 0).isFilled).toBe(false);
  });
});

describe('WorldPosition', () => {
  it('should write only the given coordinates', () => {
    expect(new WorldPosition(1, 2).getElement()).toEqual({
      tag: 'Position',
      attributes: {},
      children: [{ tag: 'WorldPosition', attributes: { x: '1', y: '2' }, children: [] }],
    });
    expect(new WorldPosition(1, 2, 0, 1.5).getElement().children[0].attributes).toEqual({
      x: '1',
      y: '2',
      z: '0',
      h: '1.5',
    });
  });
});

describe('LanePosition', () => {
  it('should carry a filled orientation', () => {
    const position = new LanePosition(10, 0.5, -1, 3, new Orientation(1.5));
    const [lane] = position.getElement().children;
    expect(lane.tag).toBe('LanePosition');
    expect(lane.attributes).toEqual({ roadId: '3', laneId: '-1', s: '10', offset: '0.5' });
    expect(lane.children).toEqual([{ tag: 'Orientation', attributes: { h: '1.5' }, children: [] }]);
  });

  it('should drop an empty orientation', () => {
    const [lane] = new LanePosition(10, 0, 1, 3).getElement().children;
    expect(lane.children).toHaveLength(0);
  });
});

describe('RoadPosition', () => {
  it('should use the requested container name', () => {
    const element = new RoadPosition(5, -2, 1).getElement('Target');
    expect(element.tag).toBe('Target');
    expect(element.children[0].attributes).toEqual({ roadId: '1', s: '5', t: '-2' });
  });
});

describe('RelativeLanePosition', () => {
  it('should write ds with a default offset', () => {
    const [relative] = new RelativeLanePosition(-1, 'Ego', { ds: 10 }).getElement().children;
    expect(relative.attributes).toEqual({ entityRef: 'Ego', ds: '10', offset: '0', dLane: '-1' });
  });

  it('should write dsLane', () => {
    const [relative] = new RelativeLanePosition(1, 'Target', { dsLane: 4, offset: 0.2 }).getElement().children;
    expect(relative.attributes).toEqual({ entityRef: 'Target', dsLane: '4', offset: '0.2', dLane: '1' });
  });

  it('should need exactly one of ds and dsLane', () => {
    expect(() => new RelativeLanePosition(1, 'Ego', { ds: 1, dsLane: 1 })).toThrow(ToManyOptionalArguments);
    expect(() => new RelativeLanePosition(1, 'Ego')).toThrow(NotEnoughInputArguments);
  });
});
