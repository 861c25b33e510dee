import { settings } from '../src/config';
import { GeneralIssueInputArguments, NotEnoughInputArguments } from '../src/errors';
import { Lane, LaneSection } from '../src/opendrive/lane';
import { LaneLinker, Link, Links } from '../src/opendrive/links';

describe('Link', () => {
  it('should write road links with element type and contact point', () => {
    const link = new Link('successor', 5, { elementType: 'road', contactPoint: 'start' });
    expect(link.getElement()).toEqual({
      tag: 'successor',
      attributes: { elementType: 'road', elementId: '5', contactPoint: 'start' },
      children: [],
    });
  });

  it('should write lane links with the id only', () => {
    expect(new Link('predecessor', -2).getAttributes()).toEqual({ id: '-2' });
  });

  it('should require a direction for neighbors', () => {
    expect(() => new Link('neighbor', 3)).toThrow(NotEnoughInputArguments);
    expect(new Link('neighbor', 3, { elementType: 'road', direction: 'same' }).getAttributes()).toEqual({
      elementType: 'road',
      elementId: '3',
      direction: 'same',
    });
  });
});

describe('Links', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    settings.reset();
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    settings.reset();
  });

  it('should keep the first of two identical links and warn', () => {
    const links = new Links();
    links.add(new Link('successor', 2)).add(new Link('successor', 2));
    expect(links.links).toHaveLength(1);
    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy.mock.calls[0][0]).toMatch(/\[WARN\] Identical successor link to 2 added twice/);
  });

  it('should ignore a second successor to another element', () => {
    const links = new Links();
    links.add(new Link('successor', 2)).add(new Link('successor', 3));
    expect(links.get('successor')?.elementId).toBe(2);
    expect(consoleSpy.mock.calls[0][0]).toMatch(/A successor link already exists, ignoring the link to 3$/);
  });

  it('should throw on duplicates with strict links', () => {
    settings.update({ strictLinks: true });
    const links = new Links().add(new Link('predecessor', 1));
    expect(() => links.add(new Link('predecessor', 1))).toThrow(GeneralIssueInputArguments);
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it('should allow two neighbors', () => {
    const links = new Links();
    links.add(new Link('neighbor', 1, { direction: 'same' })).add(new Link('neighbor', 2, { direction: 'opposite' }));
    expect(links.links).toHaveLength(2);
    expect(links.getElement().children.map((child) => child.tag)).toEqual(['neighbor', 'neighbor']);
  });
});

describe('LaneLinker', () => {
  it('should apply links only when the successor section arrives', () => {
    const first = new LaneSection(0, new Lane()).addRightLane(new Lane('driving', 3));
    const second = new LaneSection(10, new Lane()).addRightLane(new Lane('driving', 3));
    const other = new LaneSection(20, new Lane());

    const linker = new LaneLinker().addLink(first.rightLanes[0], second.rightLanes[0]);
    expect(linker.drainInto(other)).toBe(0);
    expect(linker.size).toBe(1);

    expect(linker.drainInto(second)).toBe(1);
    expect(linker.size).toBe(0);
    expect(first.rightLanes[0].getLinkedLaneId('successor')).toBe(-1);
    expect(second.rightLanes[0].getLinkedLaneId('predecessor')).toBe(-1);
  });
});
