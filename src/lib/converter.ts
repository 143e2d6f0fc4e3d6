import fs from "node:fs";
import path from "node:path";

import { type ConvertOptions, type ResolvedOptions, resolveOptions } from "./config";
import { DanglingReferenceError, UnsupportedFormatError } from "./errors";
import { cocoFormat } from "./formats/coco";
import { FORMAT_IDS, type FormatAdapter, type FormatId, isFormatId } from "./formats/types";
import { vocFormat } from "./formats/voc";
import { yoloFormat } from "./formats/yolo";
import type { Dataset } from "./models/dataset";
import { requireDirectory } from "./utils/files";
import { readImageDimensions } from "./utils/images";

const ADAPTERS: Record<FormatId, FormatAdapter> = {
  coco: cocoFormat,
  yolo: yoloFormat,
  voc: vocFormat,
};

export function getAdapter(format: string): FormatAdapter {
  if (!isFormatId(format)) throw new UnsupportedFormatError(format, FORMAT_IDS);
  return ADAPTERS[format];
}

export function readDataset(format: string, sourcePath: string, options: ConvertOptions = {}): Dataset {
  return getAdapter(format).read(sourcePath, resolveOptions(options));
}

export function writeDataset(
  format: string,
  dataset: Dataset,
  targetPath: string,
  options: ConvertOptions = {},
): void {
  getAdapter(format).write(dataset, targetPath, resolveOptions(options));
}

/**
 * Fill unknown image sizes from the files in `imagesDir`, trying the stored
 * file name first and then its base name. Returns how many images were filled.
 */
export function inferImageDimensions(dataset: Dataset, imagesDir: string): number {
  let filled = 0;
  for (const image of dataset.images) {
    if (image.hasDimensions) continue;
    const candidates = [
      path.join(imagesDir, image.fileName),
      path.join(imagesDir, path.basename(image.fileName)),
    ];
    const found = candidates.find((candidate) => fs.existsSync(candidate));
    if (!found) continue;
    const { width, height } = readImageDimensions(found);
    image.width = width;
    image.height = height;
    filled++;
  }
  return filled;
}

/**
 * Make a freshly read dataset safe to hand to the target writer. The
 * category list is authoritative: every annotation must resolve against it
 * and takes its name from it.
 */
export function reconcile(dataset: Dataset, target: FormatId, options: ConvertOptions = {}): void {
  if (options.imagesDir) {
    requireDirectory(options.imagesDir, "Images directory");
    inferImageDimensions(dataset, options.imagesDir);
  }

  for (const image of dataset.images) {
    for (const ann of image.annotations) {
      const category = dataset.findCategoryById(ann.categoryId);
      if (!category) {
        throw new DanglingReferenceError("category", ann.categoryId, image.fileName);
      }
      ann.categoryName = category.name;
    }
  }

  // class index == id in the dataset we hand back
  if (ADAPTERS[target].indexedCategories) {
    dataset.renumberCategories(0);
  }
}

/** Read `sourcePath` as one format and write it to `targetPath` as another. */
export function convert(
  sourceFormat: string,
  targetFormat: string,
  sourcePath: string,
  targetPath: string,
  options: ConvertOptions = {},
): Dataset {
  const reader = getAdapter(sourceFormat);
  const writer = getAdapter(targetFormat);
  const resolved: ResolvedOptions = resolveOptions(options);

  const dataset = reader.read(sourcePath, resolved);
  reconcile(dataset, writer.id, resolved);
  writer.write(dataset, targetPath, resolved);

  return dataset;
}
