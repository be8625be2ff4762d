import { DOMParser } from "@xmldom/xmldom";

// Simple XML to object parser for Timetables API responses.
// Attributes become string properties, repeated child tags become arrays,
// leaf text is kept under `_text`.

export type XmlValue = string | XmlObject | XmlValue[];
export type XmlObject = { [key: string]: XmlValue };

const ELEMENT_NODE = 1;

const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

const parseElement = (element: Element): XmlObject | string => {
  const obj: XmlObject = {};

  for (let i = 0; i < element.attributes.length; i += 1) {
    const attr = element.attributes.item(i);
    if (attr) obj[attr.name] = attr.value;
  }

  const children: Element[] = [];
  for (let i = 0; i < element.childNodes.length; i += 1) {
    const child = element.childNodes.item(i);
    if (child && isElement(child)) children.push(child);
  }

  if (children.length === 0) {
    const text = element.textContent?.trim();
    if (Object.keys(obj).length === 0 && text) {
      return text;
    }
    if (text) {
      obj._text = text;
    }
    return obj;
  }

  for (const child of children) {
    const childName = child.tagName;
    const childValue = parseElement(child);
    const existing = obj[childName];

    if (existing === undefined) {
      obj[childName] = childValue;
    } else if (Array.isArray(existing)) {
      existing.push(childValue);
    } else {
      obj[childName] = [existing, childValue];
    }
  }

  return obj;
};

/**
 * Parse an XML document into `{ [rootTag]: content }`.
 * Throws on malformed input.
 */
export const parseXmlToObject = (xmlString: string): XmlObject => {
  const parser = new DOMParser({
    errorHandler: {
      error: (msg: string) => {
        throw new Error(`Malformed XML: ${msg}`);
      },
      fatalError: (msg: string) => {
        throw new Error(`Malformed XML: ${msg}`);
      },
    },
  });
  const doc = parser.parseFromString(xmlString, "text/xml");

  const root = doc.documentElement;
  if (!root) {
    throw new Error("Malformed XML: no root element");
  }
  return { [root.tagName]: parseElement(root) };
};

/**
 * Child elements of a parsed node under `tag`, always as an array.
 */
export const childList = (node: XmlValue | undefined, tag: string): XmlObject[] => {
  if (!node || typeof node === "string" || Array.isArray(node)) return [];
  const value = node[tag];
  if (value === undefined) return [];
  const values = Array.isArray(value) ? value : [value];
  return values.filter((v): v is XmlObject => typeof v === "object" && !Array.isArray(v));
};

/**
 * First child element under `tag`, if any.
 */
export const child = (node: XmlValue | undefined, tag: string): XmlObject | undefined =>
  childList(node, tag)[0];

/**
 * String attribute of a parsed element.
 */
export const attr = (node: XmlObject | undefined, name: string): string | undefined => {
  const value = node?.[name];
  return typeof value === "string" ? value : undefined;
};
