import { RoadsAndLanesNotAdjusted } from '../src/errors';
import { createRoad } from '../src/opendrive/generators';
import { Line } from '../src/opendrive/geometry';
import type { Lane } from '../src/opendrive/lane';
import { LaneDef } from '../src/opendrive/lane-def';
import { OpenDrive } from '../src/opendrive/opendrive';
import { brokenLongLineRoadMark, brokenRoadMark } from '../src/opendrive/road-marks';
import { findChild, findChildren } from '../src/opendrive/xml';

// brokenRoadMark paints 3 m dashes with 9 m gaps

function lineOffset(lane: Lane): number {
  return lane.roadMarks[0].roadLines[0].sOffset;
}

function explicitLines(lane: Lane): Record<string, string>[] {
  const explicit = findChild(lane.roadMarks[0].getElement(), 'explicit');
  return explicit ? findChildren(explicit, 'line').map((line) => line.attributes) : [];
}

describe('OpenDrive.adjustRoadmarks', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it('should carry the dash phase across lane sections', () => {
    const road = createRoad(new Line(100), 1, {
      rightLanes: [new LaneDef(13, 20, 2, 1, -2)],
      centerRoadMark: brokenRoadMark(),
    });
    const network = new OpenDrive('test-net').addRoad(road);
    network.adjustRoadsAndLanes();

    network.adjustRoadmarks();

    const [first, merge, last] = road.lanes.laneSections;
    expect(lineOffset(first.centerLane)).toBe(0);
    // a dash started at s=12 runs 1 m past the section border at s=13
    expect(lineOffset(merge.centerLane)).toBe(11);
    expect(explicitLines(merge.centerLane)).toEqual([{ length: '2', tOffset: '0', width: '0.15', sOffset: '0' }]);
    expect(lineOffset(last.centerLane)).toBe(4);
    expect(explicitLines(last.centerLane)).toEqual([]);
    expect(lineOffset(merge.rightLanes[0])).toBe(11);
  });

  it('should continue the dashes on the next road', () => {
    const first = createRoad(new Line(98), 1, { centerRoadMark: brokenRoadMark() }).addSuccessor('road', 2, 'start');
    const second = createRoad(new Line(50), 2, { centerRoadMark: brokenRoadMark() }).addPredecessor('road', 1, 'end');
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustRoadsAndLanes();

    network.adjustRoadmarks();

    const center = second.lanes.getSection(0).centerLane;
    expect(lineOffset(first.lanes.getSection(0).centerLane)).toBe(0);
    expect(lineOffset(center)).toBe(10);
    expect(explicitLines(center)).toEqual([{ length: '1', tOffset: '0', width: '0.15', sOffset: '0' }]);
  });

  it('should mirror the dash phase onto a road running the other way', () => {
    const first = createRoad(new Line(98), 1, { centerRoadMark: brokenRoadMark() }).addSuccessor('road', 2, 'end');
    const second = createRoad(new Line(50), 2, { centerRoadMark: brokenRoadMark() }).addSuccessor('road', 1, 'end');
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustStartpoints();

    network.adjustRoadmarks();

    // the last metre of the dash cut at s=98 on road 1 ends road 2
    const center = second.lanes.getSection(0).centerLane;
    expect(lineOffset(center)).toBe(1);
    expect(explicitLines(center)).toEqual([]);
  });

  it('should restart a differing pattern at the shared end', () => {
    const first = createRoad(new Line(98), 1, { centerRoadMark: brokenRoadMark() }).addSuccessor('road', 2, 'start');
    const second = createRoad(new Line(50), 2, { centerRoadMark: brokenLongLineRoadMark() }).addPredecessor(
      'road',
      1,
      'end'
    );
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustStartpoints();

    network.adjustRoadmarks();

    expect(lineOffset(second.lanes.getSection(0).centerLane)).toBe(0);
  });

  it('should align each road only once', () => {
    const first = createRoad(new Line(98), 1, { centerRoadMark: brokenRoadMark() }).addSuccessor('road', 2, 'start');
    const second = createRoad(new Line(50), 2, { centerRoadMark: brokenRoadMark() }).addPredecessor('road', 1, 'end');
    const network = new OpenDrive('test-net').addRoad(first).addRoad(second);
    network.adjustStartpoints();

    network.adjustRoadmarks();
    network.adjustRoadmarks();

    expect(explicitLines(second.lanes.getSection(0).centerLane)).toHaveLength(1);
    expect(second.lanes.roadMarksAdjusted).toBe(true);
  });

  it('should need positioned roads', () => {
    const network = new OpenDrive('test-net').addRoad(createRoad(new Line(10), 1));
    expect(() => network.adjustRoadmarks()).toThrow(RoadsAndLanesNotAdjusted);
  });
});
