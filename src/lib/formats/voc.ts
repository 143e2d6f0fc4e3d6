import path from "node:path";

import { FormatError } from "../errors";
import { BBox } from "../models/bbox";
import { type Annotation, Dataset, DatasetImage } from "../models/dataset";
import { ensureDir, listFiles, readText, requireDirectory, stem, writeText } from "../utils/files";
import { knownDimension } from "../utils/images";
import { element, isNode, parseXml, type XmlNode } from "../utils/xml";
import type { FormatAdapter } from "./types";

const DEFAULT_DEPTH = 3;
const DEFAULT_POSE = "Unspecified";
const DEFAULT_FOLDER = "images";

// ── reading ──

function child(node: XmlNode, key: string, where: string, file: string): XmlNode {
  const value = node[key];
  if (!isNode(value)) throw new FormatError(file, `${where}: missing <${key}>`);
  return value;
}

function optionalText(node: XmlNode, key: string, where: string, file: string): string | undefined {
  const value = node[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new FormatError(file, `${where}: <${key}> must contain text`);
  }
  return value;
}

function text(node: XmlNode, key: string, where: string, file: string): string {
  const value = optionalText(node, key, where, file);
  if (value === undefined || value === "") {
    throw new FormatError(file, `${where}: missing <${key}>`);
  }
  return value;
}

function numberOf(node: XmlNode, key: string, where: string, file: string): number {
  const raw = text(node, key, where, file);
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new FormatError(file, `${where}: <${key}> is not a number: "${raw}"`);
  }
  return value;
}

/** `0`/`1` (any non-zero integer counts), or `true`/`false`; absent means false. */
function flag(node: XmlNode, key: string, where: string, file: string): boolean {
  const raw = optionalText(node, key, where, file);
  if (raw === undefined || raw === "") return false;
  const lowered = raw.toLowerCase();
  if (lowered === "true" || lowered === "false") return lowered === "true";
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new FormatError(file, `${where}: <${key}> is not an integer: "${raw}"`);
  }
  return value !== 0;
}

function parseObject(
  obj: unknown,
  where: string,
  file: string,
  categoryIdFor: (name: string) => number,
): Annotation {
  if (!isNode(obj)) throw new FormatError(file, `${where} is empty`);
  const name = text(obj, "name", where, file);
  const box = child(obj, "bndbox", where, file);
  const ann: Annotation = {
    bbox: BBox.fromCorners(
      numberOf(box, "xmin", where, file),
      numberOf(box, "ymin", where, file),
      numberOf(box, "xmax", where, file),
      numberOf(box, "ymax", where, file),
    ),
    categoryId: categoryIdFor(name),
    categoryName: name,
    difficult: flag(obj, "difficult", where, file),
    truncated: flag(obj, "truncated", where, file),
  };
  const pose = optionalText(obj, "pose", where, file);
  if (pose) ann.pose = pose;
  return ann;
}

/**
 * Read a directory of VOC XML files. VOC names classes but never numbers
 * them, so each new name gets the next id in file order, then object order.
 */
export function readVoc(dir: string): Dataset {
  requireDirectory(dir, "Annotations directory");
  const dataset = new Dataset();
  const idByName = new Map<string, number>();

  const categoryIdFor = (name: string): number => {
    let id = idByName.get(name);
    if (id === undefined) {
      id = dataset.categories.length;
      idByName.set(name, id);
      dataset.addCategory({ id, name });
    }
    return id;
  };

  for (const file of listFiles(dir, ".xml")) {
    const parsed = parseXml(readText(file, "Annotation file"));
    if (!parsed.ok) throw new FormatError(file, `malformed XML: ${parsed.message}`);

    const root = child(parsed.doc, "annotation", "document", file);
    const size = child(root, "size", "annotation", file);
    const depth = optionalText(size, "depth", "size", file);
    const image = new DatasetImage({
      fileName: text(root, "filename", "annotation", file),
      width: knownDimension(numberOf(size, "width", "size", file)),
      height: knownDimension(numberOf(size, "height", "size", file)),
      depth: depth ? knownDimension(Number(depth)) : undefined,
    });

    const objects: unknown[] = Array.isArray(root.object) ? root.object : [];
    objects.forEach((obj, idx) => {
      image.addAnnotation(parseObject(obj, `object[${idx}]`, file, categoryIdFor));
    });

    dataset.addImage(image);
  }

  return dataset;
}

// ── writing ──

/**
 * Render one image as a VOC annotation document. Coordinates are rounded to
 * whole pixels; missing flags are written as 0.
 */
export function toVocXml(image: DatasetImage): string {
  const lines: string[] = [];

  lines.push(`<?xml version="1.0" encoding="UTF-8"?>`);
  lines.push(`<annotation>`);
  lines.push(element(1, "folder", DEFAULT_FOLDER));
  lines.push(element(1, "filename", image.fileName));
  lines.push(element(1, "path", image.fileName));
  lines.push(`  <source>`);
  lines.push(element(2, "database", "Unknown"));
  lines.push(`  </source>`);
  lines.push(`  <size>`);
  lines.push(element(2, "width", image.width ?? 0));
  lines.push(element(2, "height", image.height ?? 0));
  lines.push(element(2, "depth", image.depth ?? DEFAULT_DEPTH));
  lines.push(`  </size>`);
  lines.push(element(1, "segmented", 0));

  for (const ann of image.annotations) {
    const { xmin, ymin, xmax, ymax } = ann.bbox;
    lines.push(`  <object>`);
    lines.push(element(2, "name", ann.categoryName));
    lines.push(element(2, "pose", ann.pose ?? DEFAULT_POSE));
    lines.push(element(2, "truncated", ann.truncated ? 1 : 0));
    lines.push(element(2, "difficult", ann.difficult ? 1 : 0));
    lines.push(`    <bndbox>`);
    lines.push(element(3, "xmin", Math.round(xmin)));
    lines.push(element(3, "ymin", Math.round(ymin)));
    lines.push(element(3, "xmax", Math.round(xmax)));
    lines.push(element(3, "ymax", Math.round(ymax)));
    lines.push(`    </bndbox>`);
    lines.push(`  </object>`);
  }

  lines.push(`</annotation>`);

  return `${lines.join("\n")}\n`;
}

export function writeVoc(dataset: Dataset, dir: string): void {
  ensureDir(dir);
  for (const image of dataset.images) {
    writeText(path.join(dir, `${stem(image.fileName)}.xml`), toVocXml(image));
  }
}

export const vocFormat: FormatAdapter = {
  id: "voc",
  indexedCategories: false,
  read: (sourcePath) => readVoc(sourcePath),
  write: (dataset, targetPath) => writeVoc(dataset, targetPath),
};
