import type { DocumentNode } from "./DocumentNode.js";

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

/** JSON payloads use camelCase keys; documents use element names. */
function lookup(record: Record<string, unknown>, name: string): unknown {
  if (name in record) {
    return record[name];
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(record)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

class JsonElement implements DocumentNode {
  constructor(
    readonly name: string,
    private readonly raw: unknown,
  ) {}

  getAttribute(name: string): string | undefined {
    if (!isRecord(this.raw)) {
      return undefined;
    }
    return scalarText(lookup(this.raw, name));
  }

  getChildren(name: string): DocumentNode[] {
    if (Array.isArray(this.raw)) {
      // An array stands for a list container: every entry is an item.
      return this.raw.map((entry: unknown) => new JsonElement(name, entry));
    }
    if (!isRecord(this.raw)) {
      return [];
    }
    const entry = lookup(this.raw, name);
    if (isRecord(entry) || Array.isArray(entry)) {
      return [new JsonElement(name, entry)];
    }
    return [];
  }

  text(): string {
    return scalarText(this.raw) ?? "";
  }
}

export function jsonDocument(value: unknown, rootName: string): DocumentNode {
  return new JsonElement(rootName, value);
}
