export class ConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
  }
}

/** Malformed or schema-violating input. */
export class FormatError extends ConversionError {
  constructor(
    public source: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${detail}`, options);
    this.name = "FormatError";
  }
}

/** An annotation points at an image or category id that does not exist. */
export class DanglingReferenceError extends ConversionError {
  constructor(
    public kind: "image" | "category",
    public id: number,
    context?: string,
  ) {
    super(`Unknown ${kind} id ${id}${context ? ` (${context})` : ""}`);
    this.name = "DanglingReferenceError";
  }
}

export class MissingResourceError extends ConversionError {
  constructor(
    public resource: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${detail}: ${resource}`, options);
    this.name = "MissingResourceError";
  }
}

export class DuplicateCategoryError extends ConversionError {
  constructor(public id: number) {
    super(`Category id ${id} is already defined`);
    this.name = "DuplicateCategoryError";
  }
}

export class CategoryNotFoundError extends ConversionError {
  constructor(public key: number | string) {
    super(
      typeof key === "number"
        ? `No category with id ${key}`
        : `No category named "${key}"`,
    );
    this.name = "CategoryNotFoundError";
  }
}

export class UnsupportedFormatError extends ConversionError {
  constructor(
    public format: string,
    supported: readonly string[],
  ) {
    super(`Unsupported format: ${format}. Supported formats: ${supported.join(", ")}`);
    this.name = "UnsupportedFormatError";
  }
}

/** The operation needs data the dataset does not carry yet. */
export class InvalidStateError extends ConversionError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}
