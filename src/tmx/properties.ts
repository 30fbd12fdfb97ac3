// src/tmx/properties.ts
import type { DocElement } from "./document.js";
import { DocumentError } from "./errors.js";

export type PropertyValue = string | number | boolean;
export type Properties = Map<string, PropertyValue>;

function typedValue(property: DocElement, name: string, raw: string): PropertyValue {
  const type = property.attr("type");
  if (type === "int" || type === "float") {
    const v = raw.trim() === "" ? Number.NaN : Number(raw);
    if (!Number.isFinite(v)) {
      throw new DocumentError(property.path, `property '${name}' (${type}) has value "${raw}"`);
    }
    return v;
  }
  if (type === "bool") return raw.trim() === "true";
  return raw;
}

/**
 * Copy every `<property>` of a `<properties>` element into `target`,
 * overwriting keys that are already present.
 */
export function loadProperties(target: Properties, element: DocElement): void {
  if (element.name !== "properties") return;

  for (const property of element.childrenNamed("property")) {
    const name = property.attr("name");
    if (name === undefined) continue;
    const raw = property.attr("value") ?? property.text;
    target.set(name, typedValue(property, name, raw));
  }
}

/** Load the `<properties>` child of `owner`, if it has one. */
export function loadChildProperties(target: Properties, owner: DocElement): void {
  const element = owner.child("properties");
  if (element) loadProperties(target, element);
}

export function getNumberProperty(bag: Properties, key: string, fallback: number): number {
  const v = bag.get(key);
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}
