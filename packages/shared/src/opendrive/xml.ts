import { writeFileSync } from 'fs';
import { create } from 'xmlbuilder2';

export type XmlAttributes = Record<string, string>;

/**
 * Attribute map plus ordered children handed to the XML writer
 */
export interface XmlElement {
  tag: string;
  attributes: XmlAttributes;
  children: XmlElement[];
  text?: string;
}

export interface XmlSerializable {
  getElement(): XmlElement;
}

export function element(
  tag: string,
  attributes: XmlAttributes = {},
  children: XmlElement[] = [],
  text?: string
): XmlElement {
  return text === undefined ? { tag, attributes, children } : { tag, attributes, children, text };
}

/**
 * Build an attribute map, dropping undefined entries and stringifying the rest
 */
export function attrs(values: Record<string, string | number | boolean | undefined>): XmlAttributes {
  const result: XmlAttributes = {};
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) continue;
    result[key] = typeof value === 'string' ? value : String(value);
  }
  return result;
}

/** First direct child with the given tag */
export function findChild(parent: XmlElement, tag: string): XmlElement | undefined {
  return parent.children.find((child) => child.tag === tag);
}

export function findChildren(parent: XmlElement, tag: string): XmlElement[] {
  return parent.children.filter((child) => child.tag === tag);
}

type XmlBuilder = ReturnType<typeof create>;

function appendElement(parent: XmlBuilder, node: XmlElement): void {
  const child = parent.ele(node.tag, node.attributes);
  if (node.text !== undefined) child.txt(node.text);
  for (const grandChild of node.children) {
    appendElement(child, grandChild);
  }
}

export function toXmlString(root: XmlElement, prettyPrint = true): string {
  const doc = create({ version: '1.0', encoding: 'utf-8' });
  appendElement(doc, root);
  return doc.end({ prettyPrint });
}

export function writeXml(root: XmlElement, file: string, prettyPrint = true): void {
  writeFileSync(file, toXmlString(root, prettyPrint), 'utf-8');
}
