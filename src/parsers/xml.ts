import { XMLParser } from "fast-xml-parser";

export type XmlElement = Record<string, unknown>;

const ATTR_PREFIX = "@_";
const TEXT_KEY = "#text";

/**
 * Attributes are kept as raw strings and namespace prefixes are dropped, so
 * `<t:UnitTestResult>` and `<UnitTestResult>` read the same.
 */
export function createXmlParser(arrayTags: ReadonlySet<string>): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: TEXT_KEY,
    parseAttributeValue: false,
    parseTagValue: false,
    removeNSPrefix: true,
    isArray: (name: string, _jpath: string, _isLeaf: boolean, isAttribute: boolean) =>
      !isAttribute && arrayTags.has(name),
  });
}

/** Parse, or null when the parser rejects the input. */
export function parseXml(parser: XMLParser, text: string): unknown {
  try {
    const parsed: unknown = parser.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * fast-xml-parser collapses attribute-less elements to their text. Bring
 * those back to element shape.
 */
export function toElement(value: unknown): XmlElement {
  if (isRecord(value)) return value;
  if (typeof value === "string") return value === "" ? {} : { [TEXT_KEY]: value };
  return {};
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

export function attr(el: XmlElement, name: string): string | undefined {
  const v = el[ATTR_PREFIX + name];
  return typeof v === "string" ? v : typeof v === "number" ? String(v) : undefined;
}

export function text(el: XmlElement): string {
  const v = el[TEXT_KEY];
  return typeof v === "string" ? v : typeof v === "number" ? String(v) : "";
}

export function children(el: XmlElement, tag: string): XmlElement[] {
  return asArray(el[tag]).map(toElement);
}

export function hasChild(el: XmlElement, tag: string): boolean {
  return tag in el;
}

/** Every element named `tag`, in document order, at any depth. */
export function collectElements(node: unknown, tag: string): XmlElement[] {
  const found: XmlElement[] = [];
  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      for (const item of value) walk(item);
      return;
    }
    if (!isRecord(value)) return;
    for (const [key, child] of Object.entries(value)) {
      if (key.startsWith(ATTR_PREFIX) || key === TEXT_KEY) continue;
      if (key === tag) {
        for (const item of asArray(child)) found.push(toElement(item));
        continue;
      }
      walk(child);
    }
  };
  walk(node);
  return found;
}

/** `"{message}\n{body}"`, or whichever of the two exists, or `""`. */
export function composeFailureMessage(message: string, body: string): string {
  const m = message;
  const b = body.trim();
  if (m && b) return `${m}\n${b}`;
  return m || b;
}
