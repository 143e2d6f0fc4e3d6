import { ConversionError } from "./errors";

export const VERSION = "0.1.0";

export const DEFAULT_IMAGE_EXT = ".jpg";

/** Tried in order when `<stem><imageExt>` is not in the images directory. */
export const FALLBACK_IMAGE_EXTS = [
  ".jpg",
  ".jpeg",
  ".png",
  ".bmp",
  ".JPG",
  ".JPEG",
  ".PNG",
];

/** Decimal places used for normalized YOLO coordinates. */
export const DEFAULT_PRECISION = 6;
const MAX_PRECISION = 12;

export const CLASSES_FILE_NAME = "classes.txt";

export interface ConvertOptions {
  /** Images directory: needed to read YOLO, used elsewhere to fill in unknown sizes. */
  imagesDir?: string;
  /** Classes file read for a YOLO source and written for a YOLO target. */
  classesFile?: string;
  imageExt?: string;
  precision?: number;
}

export type ResolvedOptions = ConvertOptions & {
  imageExt: string;
  precision: number;
};

export function normalizeExt(ext: string): string {
  return ext.startsWith(".") ? ext : `.${ext}`;
}

export function resolveOptions(options: ConvertOptions = {}): ResolvedOptions {
  const precision = options.precision ?? DEFAULT_PRECISION;
  if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
    throw new ConversionError(
      `precision must be an integer between 0 and ${MAX_PRECISION}, got ${precision}`,
    );
  }
  return {
    ...options,
    imageExt: normalizeExt(options.imageExt ?? DEFAULT_IMAGE_EXT),
    precision,
  };
}
