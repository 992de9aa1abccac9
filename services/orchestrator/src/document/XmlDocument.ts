import { XMLParser, XMLValidator } from "fast-xml-parser";

import { DocumentError, type DocumentNode } from "./DocumentNode.js";

const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE_NAME = "#text";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE_NAME,
  parseTagValue: false,
  parseAttributeValue: false,
  // Leaf text is kept as written; formatting whitespace is dropped in `text()`.
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // Every element is an array so repeated and single children read the same way.
  isArray: (_tagName: string, _jPath: string, _isLeafNode: boolean, isAttribute: boolean) => !isAttribute,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

function hasChildElements(raw: Record<string, unknown>): boolean {
  return Object.keys(raw).some((key) => key !== TEXT_NODE_NAME && !key.startsWith(ATTRIBUTE_PREFIX));
}

class XmlElement implements DocumentNode {
  constructor(
    readonly name: string,
    private readonly raw: unknown,
    readonly source?: string,
  ) {}

  getAttribute(name: string): string | undefined {
    if (!isRecord(this.raw)) {
      return undefined;
    }
    return scalarText(this.raw[`${ATTRIBUTE_PREFIX}${name}`]);
  }

  getChildren(name: string): DocumentNode[] {
    if (!isRecord(this.raw) || name.startsWith(ATTRIBUTE_PREFIX) || name === TEXT_NODE_NAME) {
      return [];
    }
    const entries = this.raw[name];
    if (!Array.isArray(entries)) {
      return [];
    }
    return entries.map((entry: unknown) => new XmlElement(name, entry, this.source));
  }

  text(): string {
    if (!isRecord(this.raw)) {
      return scalarText(this.raw) ?? "";
    }
    const text = scalarText(this.raw[TEXT_NODE_NAME]) ?? "";
    if (hasChildElements(this.raw) && text.trim() === "") {
      return "";
    }
    return text;
  }
}

/**
 * Parses XML text and returns its root element.
 *
 * @throws DocumentError when the text is not well-formed or has no single root
 */
export function parseXmlDocument(text: string, source?: string): DocumentNode {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new DocumentError(`Malformed XML document: ${validation.err.msg}`, source, {
      code: validation.err.code,
      line: validation.err.line,
      column: validation.err.col,
    });
  }

  const parsed: unknown = parser.parse(text);
  const roots = isRecord(parsed) ? Object.entries(parsed).filter(([name]) => name !== TEXT_NODE_NAME) : [];
  if (roots.length !== 1) {
    throw new DocumentError("XML document must have exactly one root element", source, {
      roots: roots.map(([name]) => name),
    });
  }
  const [rootName, rootEntries] = roots[0];
  const elements = Array.isArray(rootEntries) ? rootEntries : [rootEntries];
  if (elements.length !== 1) {
    throw new DocumentError("XML document must have exactly one root element", source, {
      roots: elements.map(() => rootName),
    });
  }
  return new XmlElement(rootName, elements[0], source);
}
