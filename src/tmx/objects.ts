// src/tmx/objects.ts
import type { DocElement } from "./document.js";
import { DocumentError } from "./errors.js";
import { maskGid } from "./gid.js";
import type { MapObject, ObjectLayer, Point, TileStampObject, TiledMap } from "./model.js";
import type { ResolvedLoadOptions } from "./options.js";
import type { Properties } from "./properties.js";
import { getNumberProperty, loadChildProperties } from "./properties.js";

const DEG_TO_RAD = Math.PI / 180;

export function parsePoints(element: DocElement, negateY: boolean): Point[] {
  const raw = element.stringAttr("points", "").trim();
  if (raw === "") return [];

  return raw.split(/\s+/).map((pair) => {
    const parts = pair.split(",");
    const x = parts.length === 2 ? Number(parts[0]) : Number.NaN;
    const y = parts.length === 2 ? Number(parts[1]) : Number.NaN;
    if (!Number.isFinite(x) || !Number.isFinite(y) || parts[0] === "" || parts[1] === "") {
      throw new DocumentError(element.path, `<${element.name}> has malformed point "${pair}"`);
    }
    // 0 - y, not -y: a zero stays +0
    return { x, y: negateY ? 0 - y : y };
  });
}

/**
 * Apply the transform properties a level designer can set on a tile stamp
 * (rotation or rotationDeg, scaleX/scaleY, width/height) and centre the
 * origin on the final size.
 */
export function applyTileStampProperties(object: TileStampObject, naturalWidth: number, naturalHeight: number): void {
  const props = object.properties;

  if (props.has("rotation")) object.rotation = getNumberProperty(props, "rotation", 0);
  else if (props.has("rotationDeg")) object.rotation = getNumberProperty(props, "rotationDeg", 0) * DEG_TO_RAD;

  object.scaleX = getNumberProperty(props, "scaleX", 1);
  object.scaleY = getNumberProperty(props, "scaleY", 1);
  object.width = naturalWidth * object.scaleX;
  object.height = naturalHeight * object.scaleY;

  const width = getNumberProperty(props, "width", -1);
  if (width >= 0) {
    object.width = width;
    if (naturalWidth !== 0) object.scaleX = width / naturalWidth;
  }
  const height = getNumberProperty(props, "height", -1);
  if (height >= 0) {
    object.height = height;
    if (naturalHeight !== 0) object.scaleY = height / naturalHeight;
  }

  object.originX = object.width / 2;
  object.originY = object.height / 2;
}

/**
 * Decode one `<object>`. Shape children win in the order polygon, polyline,
 * ellipse; otherwise a `gid` makes a tile stamp, and anything else is a
 * rectangle. Returns null when the object hook drops it.
 */
export function loadObject(
  map: TiledMap,
  layer: ObjectLayer,
  element: DocElement,
  options: ResolvedLoadOptions,
): MapObject | null {
  const { yUp } = options;
  const x = element.floatAttr("x", 0);
  const rawY = element.floatAttr("y", 0);
  const y = yUp ? map.pixelHeight - rawY : rawY;
  const width = element.floatAttr("width", 0);
  const height = element.floatAttr("height", 0);
  const cornerY = yUp ? y - height : y;

  const properties: Properties = new Map();
  const base = {
    name: element.stringAttr("name", ""),
    type: element.stringAttr("type", ""),
    visible: element.intAttr("visible", 1) === 1,
    properties,
  };

  let object: MapObject;
  let natural: Readonly<{ width: number; height: number }> | undefined;
  const polygon = element.child("polygon");
  const polyline = element.child("polyline");
  const gidAttr = element.attr("gid");

  if (polygon) {
    object = { ...base, shape: "polygon", x, y, points: parsePoints(polygon, yUp) };
  } else if (polyline) {
    object = { ...base, shape: "polyline", x, y, points: parsePoints(polyline, yUp) };
  } else if (element.child("ellipse")) {
    object = { ...base, shape: "ellipse", x, y: cornerY, width, height };
  } else if (gidAttr !== undefined) {
    const gid = maskGid(element.intAttr("gid", 0));
    const tile = map.tilesets.getTile(gid);
    natural = { width: tile?.region.width ?? 0, height: tile?.region.height ?? 0 };
    object = {
      ...base,
      shape: "tile",
      x,
      y,
      gid,
      tileId: tile?.id ?? null,
      width: natural.width,
      height: natural.height,
      originX: 0,
      originY: 0,
      rotation: 0,
      scaleX: 1,
      scaleY: 1,
    };
  } else {
    object = { ...base, shape: "rectangle", x, y: cornerY, width, height };
  }

  properties.set("name", base.name);
  properties.set("type", base.type);
  properties.set("x", x);
  properties.set("y", object.y);
  if (object.shape === "tile") properties.set("gid", object.gid);
  loadChildProperties(properties, element);

  if (object.shape === "tile" && natural) {
    applyTileStampProperties(object, natural.width, natural.height);
  }

  return options.onObject ? options.onObject(object, { map, layer }) : object;
}

/** Decode an `<objectgroup>` element into an object layer. */
export function loadObjectLayer(
  map: TiledMap,
  element: DocElement,
  options: ResolvedLoadOptions,
): ObjectLayer {
  const layer: ObjectLayer = {
    kind: "object",
    name: element.stringAttr("name", ""),
    visible: element.intAttr("visible", 1) === 1,
    opacity: Math.max(0, Math.min(1, element.floatAttr("opacity", 1))),
    properties: new Map(),
    objects: [],
  };
  loadChildProperties(layer.properties, element);

  for (const objectElement of element.childrenNamed("object")) {
    const object = loadObject(map, layer, objectElement, options);
    if (object) layer.objects.push(object);
  }
  return layer;
}
