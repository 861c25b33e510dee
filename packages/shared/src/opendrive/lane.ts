import { GeneralIssueInputArguments } from '../errors';
import type { LaneChange, LaneType, LinkType, MarkRule, RoadMarkColor, RoadMarkType, RoadMarkWeight } from './enums';
import { Link, Links } from './links';
import type { LaneLinker } from './links';
import { evalPoly3 } from './numeric';
import type { Poly3Coefficients } from './numeric';
import { attrs, element } from './xml';
import type { XmlElement, XmlSerializable } from './xml';

/** Cubic width record starting at sOffset within its lane section */
export interface LaneWidth extends Poly3Coefficients {
  sOffset: number;
}

export interface LaneHeight {
  inner: number;
  outer: number;
  sOffset: number;
}

export interface LaneMaterial {
  friction: number;
  roughness?: number;
  surface?: string;
  sOffset: number;
}

export class RoadLine implements XmlSerializable {
  constructor(
    readonly width = 0,
    readonly length = 0,
    readonly space = 0,
    readonly tOffset = 0,
    readonly sOffset = 0,
    readonly rule?: MarkRule
  ) {}

  getElement(): XmlElement {
    return element(
      'line',
      attrs({
        length: this.length,
        space: this.space,
        tOffset: this.tOffset,
        width: this.width,
        sOffset: this.sOffset,
        rule: this.rule,
      })
    );
  }
}

export class ExplicitRoadLine implements XmlSerializable {
  constructor(
    readonly width = 0,
    readonly length = 0,
    readonly tOffset = 0,
    readonly sOffset = 0,
    readonly rule?: MarkRule
  ) {}

  getElement(): XmlElement {
    return element(
      'line',
      attrs({ length: this.length, tOffset: this.tOffset, width: this.width, sOffset: this.sOffset, rule: this.rule })
    );
  }
}

export interface RoadMarkOptions {
  width?: number;
  length?: number;
  space?: number;
  tOffset?: number;
  sOffset?: number;
  rule?: MarkRule;
  color?: RoadMarkColor;
  weight?: RoadMarkWeight;
  height?: number;
  laneChange?: LaneChange;
}

/**
 * Road marking of a lane edge.
 *
 * Passing any of length, space, tOffset or rule creates a first line record with
 * type-specific defaults.
 */
export class RoadMark implements XmlSerializable {
  readonly markingType: RoadMarkType;
  readonly width?: number;
  readonly sOffset: number;
  readonly color: RoadMarkColor;
  readonly weight: RoadMarkWeight;
  readonly height: number;
  readonly laneChange?: LaneChange;
  private readonly lines: RoadLine[] = [];
  private readonly explicitLines: ExplicitRoadLine[] = [];

  constructor(markingType: RoadMarkType, options: RoadMarkOptions = {}) {
    this.markingType = markingType;
    this.width = options.width;
    this.sOffset = options.sOffset ?? 0;
    this.color = options.color ?? 'standard';
    this.weight = options.weight ?? 'standard';
    this.height = options.height ?? 0.02;
    this.laneChange = options.laneChange;

    const wantsLine = [options.length, options.space, options.tOffset, options.rule].some(
      (value) => value !== undefined
    );
    if (wantsLine) {
      let length = options.length ?? 0;
      let space = options.space ?? 0;
      if (markingType === 'broken') {
        length = options.length || 3;
        space = options.space || 3;
      } else if (markingType === 'solid') {
        length = options.length || 3;
        space = options.space || 0;
      }
      this.width = options.width || 0.2;
      this.lines.push(new RoadLine(this.width, length, space, options.tOffset ?? 0, 0, options.rule ?? 'none'));
    }
  }

  get roadLines(): readonly RoadLine[] {
    return this.lines;
  }

  /** Copy with its own line lists, so one template can mark many lanes */
  clone(): RoadMark {
    const copy = new RoadMark(this.markingType, {
      width: this.width,
      sOffset: this.sOffset,
      color: this.color,
      weight: this.weight,
      height: this.height,
      laneChange: this.laneChange,
    });
    copy.lines.push(...this.lines);
    copy.explicitLines.push(...this.explicitLines);
    return copy;
  }

  addSpecificRoadLine(line: RoadLine): this {
    this.lines.push(line);
    return this;
  }

  /** Move line `index` to start its pattern at sOffset */
  shiftRoadLine(index: number, sOffset: number): this {
    const line = this.lines[index];
    if (line === undefined) {
      throw new GeneralIssueInputArguments(`Road mark has no line ${index}`);
    }
    this.lines[index] = new RoadLine(line.width, line.length, line.space, line.tOffset, sOffset, line.rule);
    return this;
  }

  addExplicitRoadLine(line: ExplicitRoadLine): this {
    this.explicitLines.push(line);
    return this;
  }

  /** Width of the type element: explicit width, else the spread of the lines */
  private typeWidth(): number {
    if (this.width !== undefined) return this.width;
    const offsets = this.lines.map((line) => line.tOffset);
    const max = Math.max(...offsets);
    const min = Math.min(...offsets);
    const edgeWidths = this.lines
      .filter((line) => line.tOffset === max || line.tOffset === min)
      .reduce((sum, line) => sum + line.width, 0);
    return max - min + edgeWidths;
  }

  getElement(): XmlElement {
    const children: XmlElement[] = [];
    if (this.lines.length > 0) {
      children.push(
        element(
          'type',
          attrs({ name: this.markingType, width: this.typeWidth() }),
          this.lines.map((line) => line.getElement())
        )
      );
    }
    if (this.explicitLines.length > 0) {
      children.push(
        element(
          'explicit',
          {},
          this.explicitLines.map((line) => line.getElement())
        )
      );
    }
    return element(
      'roadMark',
      attrs({
        sOffset: this.sOffset,
        type: this.markingType,
        weight: this.weight,
        color: this.color,
        height: this.height,
        width: this.width,
        laneChange: this.laneChange,
      }),
      children
    );
  }
}

/**
 * Single lane. The id is assigned by the lane section it is added to.
 */
export class Lane implements XmlSerializable {
  laneId: number | undefined;
  laneType: LaneType;
  readonly widths: LaneWidth[] = [];
  readonly roadMarks: RoadMark[] = [];
  readonly heights: LaneHeight[] = [];
  readonly materials: LaneMaterial[] = [];
  readonly links = new Links();

  constructor(laneType: LaneType = 'driving', a = 0, b = 0, c = 0, d = 0, sOffset = 0) {
    this.laneType = laneType;
    this.addLaneWidth(a, b, c, d, sOffset);
  }

  static fromCoefficients(coeffs: Poly3Coefficients, laneType: LaneType = 'driving'): Lane {
    return new Lane(laneType, coeffs.a, coeffs.b, coeffs.c, coeffs.d);
  }

  addLaneWidth(a = 0, b = 0, c = 0, d = 0, sOffset = 0): this {
    this.widths.push({ a, b, c, d, sOffset });
    return this;
  }

  /**
   * Width at section-local `s`, from the last width record starting at or before it
   */
  getWidth(s: number): number {
    let record = this.widths[0];
    for (const width of this.widths) {
      if (s >= width.sOffset) {
        record = width;
      } else {
        break;
      }
    }
    return evalPoly3(record, s - record.sOffset);
  }

  setLaneId(id: number): void {
    this.laneId = id;
    if (id === 0) this.laneType = 'none';
  }

  requireId(): number {
    if (this.laneId === undefined) {
      throw new GeneralIssueInputArguments('Lane has no id, add it to a lane section first');
    }
    return this.laneId;
  }

  addLink(linkType: LinkType, laneId: number): this {
    this.links.add(new Link(linkType, laneId));
    return this;
  }

  getLinkedLaneId(linkType: LinkType): number | undefined {
    return this.links.get(linkType)?.elementId;
  }

  addRoadMark(roadMark: RoadMark): this {
    this.roadMarks.push(roadMark);
    return this;
  }

  addHeight(inner: number, outer?: number, sOffset = 0): this {
    this.heights.push({ inner, outer: outer ?? inner, sOffset });
    return this;
  }

  addLaneMaterial(friction: number, roughness?: number, sOffset = 0, surface?: string): this {
    this.materials.push({ friction, roughness, sOffset, surface });
    return this;
  }

  getElement(): XmlElement {
    const id = this.requireId();
    const children: XmlElement[] = [];

    // Center lanes carry neither link nor width
    if (id !== 0) {
      children.push(this.links.getElement());
      const widths = [...this.widths].sort((w1, w2) => w1.sOffset - w2.sOffset);
      for (const w of widths) {
        children.push(element('width', attrs({ a: w.a, b: w.b, c: w.c, d: w.d, sOffset: w.sOffset })));
      }
    }

    const roadMarks = [...this.roadMarks].sort((m1, m2) => m1.sOffset - m2.sOffset);
    children.push(...roadMarks.map((mark) => mark.getElement()));

    for (const height of this.heights) {
      children.push(element('height', attrs({ inner: height.inner, outer: height.outer, sOffset: height.sOffset })));
    }

    const materials = [...this.materials].sort((m1, m2) => m1.sOffset - m2.sOffset);
    for (const material of materials) {
      children.push(
        element(
          'material',
          attrs({
            friction: material.friction,
            roughness: material.roughness,
            sOffset: material.sOffset,
            surface: material.surface,
          })
        )
      );
    }

    return element('lane', attrs({ id, type: this.laneType, level: 'false' }), children);
  }
}

/**
 * Lanes over one s-range of a road.
 * Ids: center 0, left 1..N and right -1..-N counted outward.
 */
export class LaneSection implements XmlSerializable {
  readonly leftLanes: Lane[] = [];
  readonly rightLanes: Lane[] = [];

  constructor(
    readonly s: number,
    readonly centerLane: Lane
  ) {
    centerLane.setLaneId(0);
  }

  get allLanes(): Lane[] {
    return [...this.leftLanes, this.centerLane, ...this.rightLanes];
  }

  addLeftLane(lane: Lane): this {
    lane.setLaneId(this.leftLanes.length + 1);
    this.leftLanes.push(lane);
    return this;
  }

  addRightLane(lane: Lane): this {
    lane.setLaneId(-(this.rightLanes.length + 1));
    this.rightLanes.push(lane);
    return this;
  }

  /** Lane by signed id */
  getLane(id: number): Lane | undefined {
    if (id === 0) return this.centerLane;
    return id > 0 ? this.leftLanes[id - 1] : this.rightLanes[-id - 1];
  }

  getElement(): XmlElement {
    const children: XmlElement[] = [];
    if (this.leftLanes.length > 0) {
      children.push(
        element(
          'left',
          {},
          [...this.leftLanes].reverse().map((lane) => lane.getElement())
        )
      );
    }
    children.push(element('center', {}, [this.centerLane.getElement()]));
    if (this.rightLanes.length > 0) {
      children.push(
        element(
          'right',
          {},
          this.rightLanes.map((lane) => lane.getElement())
        )
      );
    }
    return element('laneSection', attrs({ s: this.s }), children);
  }
}

export class LaneOffset implements XmlSerializable {
  constructor(
    readonly s = 0,
    readonly a = 0,
    readonly b = 0,
    readonly c = 0,
    readonly d = 0
  ) {}

  getElement(): XmlElement {
    return element('laneOffset', attrs({ s: this.s, a: this.a, b: this.b, c: this.c, d: this.d }));
  }
}

export class Lanes implements XmlSerializable {
  readonly laneSections: LaneSection[] = [];
  readonly laneOffsets: LaneOffset[] = [];
  /** Broken marks already aligned with the neighbouring sections */
  roadMarksAdjusted = false;

  /**
   * Append a section, applying links pending in `linkers` that end in it
   */
  addLaneSection(section: LaneSection, linkers?: LaneLinker | LaneLinker[]): this {
    if (linkers !== undefined) {
      for (const linker of Array.isArray(linkers) ? linkers : [linkers]) {
        linker.drainInto(section);
      }
    }
    this.laneSections.push(section);
    return this;
  }

  addLaneOffset(offset: LaneOffset): this {
    this.laneOffsets.push(offset);
    return this;
  }

  /** Section by index, negative indices counting from the end */
  getSection(index: number): LaneSection {
    const section = this.laneSections[index < 0 ? this.laneSections.length + index : index];
    if (section === undefined) {
      throw new GeneralIssueInputArguments(`Lane section ${index} does not exist`);
    }
    return section;
  }

  getElement(): XmlElement {
    return element('lanes', {}, [
      ...this.laneOffsets.map((offset) => offset.getElement()),
      ...this.laneSections.map((section) => section.getElement()),
    ]);
  }
}
