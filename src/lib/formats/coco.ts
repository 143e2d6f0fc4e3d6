import { DanglingReferenceError, FormatError } from "../errors";
import { BBox } from "../models/bbox";
import { type Category, Dataset, DatasetImage } from "../models/dataset";
import type { COCOAnnotation, COCOCategory, COCOImage, COCOJson } from "../types/coco";
import { readText, writeText } from "../utils/files";
import { knownDimension } from "../utils/images";
import type { FormatAdapter } from "./types";

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── field readers: `where` names the offending entry in error messages ──

function requireArray(doc: JsonRecord, key: string, file: string): unknown[] {
  const value = doc[key];
  if (!Array.isArray(value)) {
    throw new FormatError(file, `missing "${key}" array`);
  }
  return value;
}

function requireEntry(value: unknown, where: string, file: string): JsonRecord {
  if (!isRecord(value)) throw new FormatError(file, `${where} is not an object`);
  return value;
}

function requireNumber(entry: JsonRecord, key: string, where: string, file: string): number {
  const value = entry[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new FormatError(file, `${where}: "${key}" must be a number`);
  }
  return value;
}

function requireString(entry: JsonRecord, key: string, where: string, file: string): string {
  const value = entry[key];
  if (typeof value !== "string") {
    throw new FormatError(file, `${where}: "${key}" must be a string`);
  }
  return value;
}

function optionalNumber(entry: JsonRecord, key: string, where: string, file: string): number | undefined {
  return entry[key] === undefined || entry[key] === null
    ? undefined
    : requireNumber(entry, key, where, file);
}

function isXywh(value: unknown): value is [number, number, number, number] {
  return (
    Array.isArray(value) &&
    value.length === 4 &&
    value.every((v) => typeof v === "number" && Number.isFinite(v))
  );
}

function requireBox(entry: JsonRecord, where: string, file: string): BBox {
  const value = entry.bbox;
  if (!isXywh(value)) {
    throw new FormatError(file, `${where}: "bbox" must be [x, y, width, height]`);
  }
  const [x, y, w, h] = value;
  return BBox.fromXywh(x, y, w, h);
}

/**
 * Read a COCO detection file. Category ids are kept as written; every
 * annotation must point at a listed image and category.
 */
export function readCoco(filePath: string): Dataset {
  const raw = readText(filePath, "COCO file");
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new FormatError(filePath, "invalid JSON", { cause: err });
  }
  if (!isRecord(doc)) throw new FormatError(filePath, "top level must be an object");

  const rawCategories = requireArray(doc, "categories", filePath);
  const rawImages = requireArray(doc, "images", filePath);
  const rawAnnotations = requireArray(doc, "annotations", filePath);

  const dataset = new Dataset();
  if (isRecord(doc.info)) dataset.info = { ...doc.info };

  rawCategories.forEach((value, idx) => {
    const where = `categories[${idx}]`;
    const entry = requireEntry(value, where, filePath);
    const category: Category = {
      id: requireNumber(entry, "id", where, filePath),
      name: requireString(entry, "name", where, filePath),
    };
    if (typeof entry.supercategory === "string" && entry.supercategory !== "") {
      category.supercategory = entry.supercategory;
    }
    dataset.addCategory(category);
  });

  const imageById = new Map<number, DatasetImage>();
  rawImages.forEach((value, idx) => {
    const where = `images[${idx}]`;
    const entry = requireEntry(value, where, filePath);
    const id = requireNumber(entry, "id", where, filePath);
    if (imageById.has(id)) {
      throw new FormatError(filePath, `${where}: duplicate image id ${id}`);
    }
    const image = new DatasetImage({
      id,
      fileName: requireString(entry, "file_name", where, filePath),
      width: knownDimension(optionalNumber(entry, "width", where, filePath)),
      height: knownDimension(optionalNumber(entry, "height", where, filePath)),
    });
    dataset.addImage(image);
    imageById.set(id, image);
  });

  rawAnnotations.forEach((value, idx) => {
    const where = `annotations[${idx}]`;
    const entry = requireEntry(value, where, filePath);
    const imageId = requireNumber(entry, "image_id", where, filePath);
    const categoryId = requireNumber(entry, "category_id", where, filePath);
    const bbox = requireBox(entry, where, filePath);

    const image = imageById.get(imageId);
    if (!image) throw new DanglingReferenceError("image", imageId, where);
    const category = dataset.findCategoryById(categoryId);
    if (!category) throw new DanglingReferenceError("category", categoryId, where);

    image.addAnnotation({
      bbox,
      categoryId,
      categoryName: category.name,
      area: optionalNumber(entry, "area", where, filePath),
      iscrowd: optionalNumber(entry, "iscrowd", where, filePath),
    });
  });

  return dataset;
}

/** Build the COCO document; image and annotation ids are renumbered from 1. */
export function toCocoJson(dataset: Dataset): COCOJson {
  const categories: COCOCategory[] = dataset.categories.map((c) =>
    c.supercategory
      ? { id: c.id, name: c.name, supercategory: c.supercategory }
      : { id: c.id, name: c.name },
  );
  const images: COCOImage[] = [];
  const annotations: COCOAnnotation[] = [];

  dataset.images.forEach((image, idx) => {
    const imageId = idx + 1;
    images.push({
      id: imageId,
      file_name: image.fileName,
      width: image.width ?? 0,
      height: image.height ?? 0,
    });
    for (const ann of image.annotations) {
      annotations.push({
        id: annotations.length + 1,
        image_id: imageId,
        category_id: ann.categoryId,
        segmentation: [],
        bbox: ann.bbox.toXywh(),
        area: ann.area ?? ann.bbox.area,
        iscrowd: ann.iscrowd ?? 0,
      });
    }
  });

  return { info: dataset.info, licenses: [], categories, images, annotations };
}

export function writeCoco(dataset: Dataset, filePath: string): void {
  writeText(filePath, `${JSON.stringify(toCocoJson(dataset), null, 2)}\n`);
}

export const cocoFormat: FormatAdapter = {
  id: "coco",
  indexedCategories: false,
  read: (sourcePath) => readCoco(sourcePath),
  write: (dataset, targetPath) => writeCoco(dataset, targetPath),
};
