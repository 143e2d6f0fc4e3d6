import fs from "node:fs";
import path from "node:path";
import { imageSize } from "image-size";

import { FALLBACK_IMAGE_EXTS } from "../config";
import { MissingResourceError } from "../errors";

export interface ImageDimensions {
  width: number;
  height: number;
}

/** Locate `<stem><ext>` in `imagesDir`, falling back to the common image extensions. */
export function findImageFile(imagesDir: string, stem: string, ext: string): string | null {
  for (const candidate of [ext, ...FALLBACK_IMAGE_EXTS]) {
    const filePath = path.join(imagesDir, stem + candidate);
    if (fs.existsSync(filePath)) return filePath;
  }
  return null;
}

/** Pixel size from the image header; the pixel data is never decoded. */
export function readImageDimensions(filePath: string): ImageDimensions {
  let width: number | undefined;
  let height: number | undefined;
  try {
    ({ width, height } = imageSize(filePath));
  } catch (err) {
    throw new MissingResourceError(filePath, "Cannot determine image size", { cause: err });
  }
  if (!width || !height) {
    throw new MissingResourceError(filePath, "Cannot determine image size");
  }
  return { width, height };
}

/** A stored size of 0 or less means "unknown". */
export function knownDimension(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}
