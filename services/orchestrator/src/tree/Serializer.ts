import { XMLBuilder } from "fast-xml-parser";

import { isListValue } from "../values/ListValue.js";
import { isObjectValue } from "../values/ObjectValue.js";
import type { ReadonlyValue } from "../values/Value.js";
import type { ReadonlyConfigNode } from "./ConfigNode.js";

export type DefaultsPolicy = "include_defaults" | "omit_defaults";

export type RenderOptions = {
  /** Defaults to `include_defaults`. */
  defaults?: DefaultsPolicy;
  /** Nesting level of the outermost line. */
  indent?: number;
  indentUnit?: string;
  appendNewLine?: boolean;
};

type RenderState = {
  defaults: DefaultsPolicy;
  unit: string;
};

type XmlContent = string | XmlObject | XmlContent[];
type XmlObject = { [name: string]: XmlContent };

function resolveState(options: RenderOptions): RenderState {
  return {
    defaults: options.defaults ?? "include_defaults",
    unit: options.indentUnit ?? "  ",
  };
}

function skipped(value: ReadonlyValue<unknown>, state: RenderState): boolean {
  return state.defaults === "omit_defaults" && !value.isParsed();
}

function writeNode(
  lines: string[],
  name: string,
  node: ReadonlyConfigNode,
  depth: number,
  state: RenderState,
): void {
  const pad = state.unit.repeat(depth);
  lines.push(`${pad}${name} {`);
  for (const [field, value] of node.fields()) {
    if (!skipped(value, state)) {
      writeValue(lines, field, value, depth + 1, state);
    }
  }
  lines.push(`${pad}}`);
}

function writeValue(
  lines: string[],
  name: string,
  value: ReadonlyValue<unknown>,
  depth: number,
  state: RenderState,
): void {
  if (isObjectValue(value)) {
    writeNode(lines, name, value.node, depth, state);
    return;
  }
  if (isListValue(value)) {
    if (value.inline) {
      for (const item of value.items) {
        writeValue(lines, value.itemName, item, depth, state);
      }
      return;
    }
    const pad = state.unit.repeat(depth);
    lines.push(`${pad}${name} [`);
    for (const item of value.items) {
      writeValue(lines, value.itemName, item, depth + 1, state);
    }
    lines.push(`${pad}]`);
    return;
  }
  lines.push(`${state.unit.repeat(depth)}${name} = ${value.toString()}`);
}

/**
 * Human-readable dump of a configuration tree, one field per line. Used for
 * diagnostics; it is not read back.
 */
export function renderText(node: ReadonlyConfigNode, options: RenderOptions = {}): string {
  const state = resolveState(options);
  const lines: string[] = [];
  writeNode(lines, node.tag, node, options.indent ?? 0, state);
  const text = lines.join("\n");
  return options.appendNewLine ? `${text}\n` : text;
}

function toXmlContent(value: ReadonlyValue<unknown>, state: RenderState): XmlContent {
  if (isObjectValue(value)) {
    return toXmlObject(value.node, state);
  }
  if (isListValue(value)) {
    const items = value.items.map((item) => toXmlContent(item, state));
    return items.length > 0 ? { [value.itemName]: items } : "";
  }
  return value.toString();
}

function toXmlObject(node: ReadonlyConfigNode, state: RenderState): XmlObject {
  const element: XmlObject = {};
  for (const [field, value] of node.fields()) {
    if (skipped(value, state)) {
      continue;
    }
    if (isListValue(value) && value.inline) {
      if (value.items.length > 0) {
        element[value.itemName] = value.items.map((item) => toXmlContent(item, state));
      }
      continue;
    }
    element[field] = toXmlContent(value, state);
  }
  return element;
}

/**
 * Renders the tree as an XML document that the binder reads back into an
 * equivalent tree.
 */
export function renderXml(node: ReadonlyConfigNode, options: RenderOptions = {}): string {
  const state = resolveState(options);
  const builder = new XMLBuilder({
    format: true,
    indentBy: state.unit,
    suppressEmptyNode: false,
  });
  const document: string = builder.build({ [node.tag]: toXmlObject(node, state) });
  return document;
}
