import { describe, expect, it } from "vitest";

import { parseXmlDocument } from "../src/tmx/document.js";
import { DocumentError } from "../src/tmx/errors.js";
import { resolveRelativePath } from "../src/tmx/paths.js";
import type { Properties } from "../src/tmx/properties.js";
import { getNumberProperty, loadChildProperties, loadProperties } from "../src/tmx/properties.js";

function load(xml: string): Properties {
  const props: Properties = new Map();
  loadProperties(props, parseXmlDocument(xml, "props.xml"));
  return props;
}

describe("properties", () => {
  it("types values by their type attribute", () => {
    const props = load(`<properties>
      <property name="count" type="int" value="42"/>
      <property name="speed" type="float" value="1.5"/>
      <property name="on" type="bool" value="true"/>
      <property name="off" type="bool" value="yes"/>
      <property name="tint" type="color" value="#ff00ff00"/>
      <property name="label" value="hello"/>
      <property name="note">multi word</property>
      <property value="unnamed"/>
    </properties>`);

    expect([...props]).toEqual([
      ["count", 42],
      ["speed", 1.5],
      ["on", true],
      ["off", false],
      ["tint", "#ff00ff00"],
      ["label", "hello"],
      ["note", "multi word"],
    ]);
  });

  it("later entries overwrite earlier ones", () => {
    const props: Properties = new Map([["a", 1]]);
    loadProperties(props, parseXmlDocument(`<properties><property name="a" value="two"/></properties>`, "p.xml"));
    expect(props.get("a")).toBe("two");
  });

  it("ignores elements that are not <properties>", () => {
    expect(load(`<tile><property name="a" value="1"/></tile>`).size).toBe(0);
  });

  it("loads the <properties> child of an owner element", () => {
    const props: Properties = new Map();
    loadChildProperties(
      props,
      parseXmlDocument(`<layer><properties><property name="z" type="int" value="3"/></properties></layer>`, "l.xml"),
    );
    expect(props.get("z")).toBe(3);
  });

  it("rejects unparsable numbers", () => {
    expect(() => load(`<properties><property name="n" type="int" value="many"/></properties>`)).toThrow(
      new DocumentError("props.xml", `property 'n' (int) has value "many"`),
    );
  });

  it("getNumberProperty accepts numbers and numeric strings", () => {
    const props: Properties = new Map<string, string | number | boolean>([
      ["n", 2],
      ["s", " 3.5 "],
      ["word", "abc"],
      ["flag", true],
    ]);
    expect(getNumberProperty(props, "n", -1)).toBe(2);
    expect(getNumberProperty(props, "s", -1)).toBe(3.5);
    expect(getNumberProperty(props, "word", -1)).toBe(-1);
    expect(getNumberProperty(props, "flag", -1)).toBe(-1);
    expect(getNumberProperty(props, "missing", 7)).toBe(7);
  });
});

describe("resolveRelativePath", () => {
  it("resolves against the directory of the base file", () => {
    expect(resolveRelativePath("maps/level.tmx", "tiles.png")).toBe("maps/tiles.png");
    expect(resolveRelativePath("level.tmx", "./tiles.png")).toBe("tiles.png");
  });

  it("handles parent segments and both separator styles", () => {
    expect(resolveRelativePath("maps/level.tmx", "..\\img\\a.png")).toBe("img/a.png");
    expect(resolveRelativePath("a\\b\\c.tmx", "d/e.png")).toBe("a/b/d/e.png");
    expect(resolveRelativePath("/abs/maps/m.tmx", "../x.png")).toBe("/abs/x.png");
  });
});

describe("document elements", () => {
  const el = parseXmlDocument(`<map width="10" height=" 3 " scale="1.25" bad="1x">text<a/><b/><a/></map>`, "m.tmx");

  it("reads typed attributes with defaults", () => {
    expect(el.intAttr("width", 0)).toBe(10);
    expect(el.intAttr("height", 0)).toBe(3);
    expect(el.intAttr("missing", 5)).toBe(5);
    expect(el.floatAttr("scale", 0)).toBe(1.25);
    expect(el.stringAttr("missing", "dflt")).toBe("dflt");
    expect(el.attr("missing")).toBeUndefined();
  });

  it("rejects malformed integers", () => {
    expect(() => el.intAttr("bad", 0)).toThrow(`m.tmx: <map> bad="1x" is not an integer`);
    expect(() => el.intAttr("scale", 0)).toThrow(DocumentError);
  });

  it("keeps element children in order", () => {
    expect(el.children.map((c) => c.name)).toEqual(["a", "b", "a"]);
    expect(el.childrenNamed("a")).toHaveLength(2);
    expect(el.child("b")?.path).toBe("m.tmx");
    expect(el.child("c")).toBeUndefined();
  });
});
