import { describe, expect, it } from "vitest";

import { LlhlsConfig } from "../schemas/ApplicationConfig.js";
import { BooleanValue } from "./BooleanValue.js";
import { EnumValue } from "./EnumValue.js";
import { ListValue } from "./ListValue.js";
import { FloatValue, IntegerValue } from "./NumericValues.js";
import { ObjectValue } from "./ObjectValue.js";
import { StringValue } from "./StringValue.js";
import { FrozenMutationError, ValueKind } from "./Value.js";

describe("Value defaults", () => {
  it.each([
    { name: "boolean", create: () => new BooleanValue(), text: "false" },
    { name: "integer", create: () => new IntegerValue(), text: "0" },
    { name: "float", create: () => new FloatValue(), text: "0" },
    { name: "string", create: () => new StringValue(), text: "" },
    { name: "enum", create: () => new EnumValue(["live", "vod"] as const), text: "live" },
    { name: "list", create: () => new ListValue("Name", () => new StringValue()), text: "" },
  ])("starts unparsed with the $name default", ({ create, text }) => {
    const value = create();

    expect(value.isParsed()).toBe(false);
    expect(value.toString()).toBe(text);
  });

  it("returns to the default on reset, and reset is idempotent", () => {
    const value = new IntegerValue();
    value.parseFromAttribute("42");

    value.reset();
    expect(value.value).toBe(0);
    expect(value.isParsed()).toBe(false);

    value.reset();
    expect(value.value).toBe(0);
    expect(value.isParsed()).toBe(false);
  });

  it("starts an object value with an unbound node of its schema", () => {
    const value = new ObjectValue(() => new LlhlsConfig());

    expect(value.kind).toBe(ValueKind.Object);
    expect(value.node.tag).toBe("LLHLS");
    expect(value.node.isParsed()).toBe(false);
    expect(value.node.segmentCount.value).toBe(0);
  });
});

describe("parseFromAttribute", () => {
  it.each([
    ["true", true],
    ["TRUE", true],
    [" yes ", true],
    ["On", true],
    ["1", true],
    ["false", false],
    ["no", false],
    ["off", false],
    ["0", false],
    ["maybe", false],
    ["", false],
  ])("reads boolean %j as %s", (text, expected) => {
    const value = new BooleanValue();
    value.parseFromAttribute(text);

    expect(value.value).toBe(expected);
    expect(value.isParsed()).toBe(true);
  });

  it.each([
    [" 42 ", 42],
    ["-7", -7],
    ["+3", 3],
    ["12abc", 0],
    ["1.5", 0],
    ["9007199254740993", 0],
    ["", 0],
  ])("reads integer %j as %d", (text, expected) => {
    const value = new IntegerValue();
    value.parseFromAttribute(text);

    expect(value.value).toBe(expected);
    expect(value.isParsed()).toBe(true);
  });

  it.each([
    ["0.5", 0.5],
    ["6", 6],
    ["1e3", 1000],
    [".25", 0.25],
    ["abc", 0],
    ["Infinity", 0],
  ])("reads float %j as %d", (text, expected) => {
    const value = new FloatValue();
    value.parseFromAttribute(text);

    expect(value.value).toBe(expected);
  });

  it("matches enum choices case-insensitively and keeps the declared spelling", () => {
    const value = new EnumValue(["live", "vod"] as const);

    value.parseFromAttribute("VOD");
    expect(value.value).toBe("vod");

    value.parseFromAttribute("archive");
    expect(value.value).toBe("live");
    expect(value.isParsed()).toBe(true);
  });

  it("keeps strings verbatim", () => {
    const value = new StringValue();
    value.parseFromAttribute("  spaced  ");

    expect(value.value).toBe("  spaced  ");
  });

  it("splits list attributes on commas and skips empty segments", () => {
    const value = new ListValue("Name", () => new StringValue());
    value.parseFromAttribute("a.example.com, b.example.com,,");

    expect(value.items.map((item) => item.value)).toEqual(["a.example.com", "b.example.com"]);
    expect(value.toString()).toBe("a.example.com, b.example.com");
  });

  it("gives an object a fresh default node from an attribute", () => {
    const value = new ObjectValue(() => new LlhlsConfig());
    value.node.segmentCount.assign(4);

    value.parseFromAttribute("ignored");

    expect(value.isParsed()).toBe(true);
    expect(value.node.segmentCount.value).toBe(0);
    expect(value.node.segmentCount.isParsed()).toBe(false);
  });
});

describe("parseFromValue", () => {
  it("copies a value of the same kind", () => {
    const source = new FloatValue();
    source.parseFromAttribute("1.5");
    const target = new FloatValue();

    expect(target.parseFromValue(source)).toEqual({ ok: true });
    expect(target.value).toBe(1.5);
    expect(target.isParsed()).toBe(true);
  });

  it("rejects another kind and leaves both sides unchanged", () => {
    const target = new IntegerValue();
    target.assign(5);
    const source = new StringValue();
    source.parseFromAttribute("x");

    const result = target.parseFromValue(source);

    expect(result).toEqual({
      ok: false,
      reason: "kind_mismatch",
      expected: "integer",
      actual: "string",
    });
    expect(target.value).toBe(5);
    expect(target.isParsed()).toBe(true);
    expect(source.value).toBe("x");
  });

  it("rejects an unparsed target's mismatch without marking it parsed", () => {
    const target = new BooleanValue();
    const source = new FloatValue();

    expect(target.parseFromValue(source).ok).toBe(false);
    expect(target.isParsed()).toBe(false);
    expect(target.value).toBe(false);
  });

  it("rejects enums with different choice sets", () => {
    const target = new EnumValue(["live", "vod"] as const);
    const source = new EnumValue(["origin", "edge"] as const);

    expect(target.parseFromValue(source)).toEqual({
      ok: false,
      reason: "kind_mismatch",
      expected: "enum(live|vod)",
      actual: "enum(origin|edge)",
    });
    expect(target.value).toBe("live");
  });

  it("rejects lists with different item kinds", () => {
    const target = new ListValue("Port", () => new IntegerValue());
    const source = new ListValue("Name", () => new StringValue());
    source.parseFromAttribute("a");

    expect(target.parseFromValue(source)).toEqual({
      ok: false,
      reason: "kind_mismatch",
      expected: "list(integer)",
      actual: "list(string)",
    });
    expect(target.items).toHaveLength(0);
  });

  it("deep-copies list items", () => {
    const source = new ListValue("Name", () => new StringValue());
    source.parseFromAttribute("a, b");
    const target = new ListValue("Name", () => new StringValue());

    expect(target.parseFromValue(source).ok).toBe(true);
    source.items[0]?.assign("z");

    expect(target.items.map((item) => item.value)).toEqual(["a", "b"]);
  });

  it("deep-copies object nodes", () => {
    const source = new ObjectValue(() => new LlhlsConfig());
    source.node.chunkDuration.parseFromAttribute("0.5");
    const target = new ObjectValue(() => new LlhlsConfig());

    expect(target.parseFromValue(source).ok).toBe(true);
    source.node.chunkDuration.assign(2);

    expect(target.node.chunkDuration.value).toBe(0.5);
    expect(target.node.chunkDuration.isParsed()).toBe(true);
    expect(target.node.segmentDuration.isParsed()).toBe(false);
  });
});

describe("orElse", () => {
  it("returns the fallback until the value is set", () => {
    const value = new IntegerValue();
    expect(value.orElse(8080)).toBe(8080);

    value.parseFromAttribute("0");
    expect(value.orElse(8080)).toBe(0);
  });
});

describe("toString", () => {
  it("appends a newline only when asked", () => {
    const value = new BooleanValue();
    value.assign(true);

    expect(value.toString()).toBe("true");
    expect(value.toString(0, true)).toBe("true\n");
    expect(value.toString(3)).toBe("true");
  });

  it("renders object values as a nested block", () => {
    const value = new ObjectValue(() => new LlhlsConfig());
    value.node.segmentCount.assign(3);

    expect(value.toString()).toBe(
      ["LLHLS {", "  ChunkDuration = 0", "  SegmentDuration = 0", "  SegmentCount = 3", "}"].join("\n"),
    );
  });
});

describe("freeze", () => {
  it("rejects every mutator once frozen", () => {
    const value = new StringValue();
    value.parseFromAttribute("kept");
    value.freeze();

    expect(value.isReadOnly()).toBe(true);
    expect(() => value.reset()).toThrow(FrozenMutationError);
    expect(() => value.assign("changed")).toThrow(FrozenMutationError);
    expect(() => value.parseFromAttribute("changed")).toThrow(FrozenMutationError);
    expect(() => value.parseFromValue(new StringValue())).toThrow(FrozenMutationError);
    expect(value.value).toBe("kept");
  });

  it("freezes list items and object nodes with their container", () => {
    const list = new ListValue("Name", () => new StringValue());
    list.parseFromAttribute("a");
    const object = new ObjectValue(() => new LlhlsConfig());

    list.freeze();
    object.freeze();

    expect(list.items[0]?.isReadOnly()).toBe(true);
    expect(() => list.add()).toThrow(FrozenMutationError);
    expect(object.node.isReadOnly()).toBe(true);
    expect(() => object.node.segmentCount.assign(1)).toThrow(FrozenMutationError);
  });
});
