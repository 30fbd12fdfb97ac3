// src/tmx/errors.ts

export class TmxError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The map or an external tileset document cannot be read or parsed. */
export class DocumentError extends TmxError {
  public constructor(
    public readonly path: string,
    public readonly detail: string,
    options?: ErrorOptions,
  ) {
    super(`${path}: ${detail}`, options);
  }
}

export class UnsupportedEncodingError extends TmxError {
  public constructor(
    public readonly layer: string,
    public readonly encoding: string,
    public readonly compression?: string,
  ) {
    super(
      compression === undefined
        ? `Layer '${layer}': unsupported encoding (${encoding})`
        : `Layer '${layer}': unsupported compression (${compression}) for encoding ${encoding}`,
    );
  }
}

export class MalformedCellDataError extends TmxError {
  public constructor(
    public readonly layer: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Layer '${layer}': malformed cell data: ${detail}`, options);
  }
}

export class MissingImageError extends TmxError {
  public constructor(
    public readonly tileset: string,
    public readonly imagePath: string,
  ) {
    super(`Tileset '${tileset}': image not available: ${imagePath}`);
  }
}
