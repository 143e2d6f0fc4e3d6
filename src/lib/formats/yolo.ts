import path from "node:path";

import { CLASSES_FILE_NAME, DEFAULT_IMAGE_EXT, DEFAULT_PRECISION, normalizeExt } from "../config";
import {
  DanglingReferenceError,
  FormatError,
  InvalidStateError,
  MissingResourceError,
} from "../errors";
import { BBox } from "../models/bbox";
import { type Annotation, type Category, Dataset, DatasetImage } from "../models/dataset";
import { ensureDir, listFiles, readText, requireDirectory, stem, writeText } from "../utils/files";
import { findImageFile, type ImageDimensions, readImageDimensions } from "../utils/images";
import type { FormatAdapter } from "./types";

export interface YoloReadOptions {
  imagesDir?: string;
  classesFile?: string;
  imageExt?: string;
}

export interface YoloWriteOptions {
  /** Defaults to `classes.txt` next to the labels directory. */
  classesFile?: string;
  precision?: number;
}

export function parseClassNames(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

function parseLabelLine(
  line: string,
  lineNo: number,
  categories: Category[],
  size: ImageDimensions,
  file: string,
): Annotation {
  const where = `line ${lineNo}`;
  const parts = line.split(/\s+/);
  if (parts.length !== 5) {
    throw new FormatError(file, `${where}: expected 5 fields, got ${parts.length}`);
  }
  const [classField, ...coordFields] = parts;
  const classId = Number(classField);
  if (!Number.isInteger(classId)) {
    throw new FormatError(file, `${where}: class id "${classField}" is not an integer`);
  }
  if (classId < 0 || classId >= categories.length) {
    throw new FormatError(
      file,
      `${where}: class id ${classId} outside [0, ${categories.length - 1}]`,
    );
  }
  const [xCenter, yCenter, width, height] = coordFields.map(Number);
  if (![xCenter, yCenter, width, height].every(Number.isFinite)) {
    throw new FormatError(file, `${where}: coordinates must be numbers`);
  }
  return {
    bbox: BBox.denormalize({ xCenter, yCenter, width, height }, size.width, size.height),
    categoryId: classId,
    categoryName: categories[classId].name,
  };
}

/**
 * Read a YOLO label directory. Boxes are normalized, so every label file needs
 * its image in `imagesDir` to recover pixel coordinates.
 */
export function readYolo(labelsDir: string, options: YoloReadOptions): Dataset {
  const { imagesDir, classesFile } = options;
  if (!imagesDir) throw new MissingResourceError("imagesDir", "YOLO input needs an images directory");
  if (!classesFile) throw new MissingResourceError("classesFile", "YOLO input needs a classes file");
  requireDirectory(labelsDir, "Labels directory");
  requireDirectory(imagesDir, "Images directory");
  const imageExt = normalizeExt(options.imageExt ?? DEFAULT_IMAGE_EXT);

  const dataset = new Dataset();
  parseClassNames(readText(classesFile, "Classes file")).forEach((name, id) =>
    dataset.addCategory({ id, name }),
  );

  // the classes file often sits among the labels
  const classesPath = path.resolve(classesFile);
  const labelFiles = listFiles(labelsDir, ".txt").filter(
    (file) => path.resolve(file) !== classesPath && path.basename(file) !== CLASSES_FILE_NAME,
  );

  for (const labelFile of labelFiles) {
    const base = stem(labelFile);
    const imagePath = findImageFile(imagesDir, base, imageExt);
    if (!imagePath) {
      throw new MissingResourceError(
        path.join(imagesDir, base + imageExt),
        `No image found for ${path.basename(labelFile)}`,
      );
    }
    const size = readImageDimensions(imagePath);
    const image = new DatasetImage({ fileName: path.basename(imagePath), ...size });

    readText(labelFile, "Label file")
      .split(/\r?\n/)
      .forEach((raw, idx) => {
        const line = raw.trim();
        if (!line) return;
        image.addAnnotation(
          parseLabelLine(line, idx + 1, dataset.categories, size, labelFile),
        );
      });

    dataset.addImage(image);
  }

  return dataset;
}

/**
 * Write one `<stem>.txt` per image plus the classes file. Class indices are
 * positions in the id-sorted category list, which is also the order of the
 * classes file.
 */
export function writeYolo(dataset: Dataset, labelsDir: string, options: YoloWriteOptions = {}): void {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const classesFile = options.classesFile ?? path.join(path.dirname(labelsDir), CLASSES_FILE_NAME);

  const ordered = [...dataset.categories].sort((a, b) => a.id - b.id);
  const indexById = new Map(ordered.map((c, index) => [c.id, index]));

  ensureDir(labelsDir);
  writeText(classesFile, ordered.map((c) => `${c.name}\n`).join(""));

  for (const image of dataset.images) {
    const { width, height } = image;
    if (width === undefined || height === undefined) {
      throw new InvalidStateError(
        `Cannot normalize boxes for ${image.fileName}: image size is unknown`,
      );
    }
    const lines = image.annotations.map((ann) => {
      const index = indexById.get(ann.categoryId);
      if (index === undefined) {
        throw new DanglingReferenceError("category", ann.categoryId, image.fileName);
      }
      const n = ann.bbox.normalize(width, height);
      const coords = [n.xCenter, n.yCenter, n.width, n.height].map((v) => v.toFixed(precision));
      return `${index} ${coords.join(" ")}`;
    });
    writeText(
      path.join(labelsDir, `${stem(image.fileName)}.txt`),
      lines.map((line) => `${line}\n`).join(""),
    );
  }
}

export const yoloFormat: FormatAdapter = {
  id: "yolo",
  indexedCategories: true,
  read: (sourcePath, options) => readYolo(sourcePath, options),
  write: (dataset, targetPath, options) =>
    writeYolo(dataset, targetPath, { classesFile: options.classesFile, precision: options.precision }),
};
