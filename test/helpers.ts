import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "annoconv-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(filePath: string, content: string | Buffer): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function readFile(filePath: string): string {
  return fs.readFileSync(filePath, "utf-8");
}

/** Signature plus IHDR chunk: enough for a header-only size probe. */
export function pngHeader(width: number, height: number): Buffer {
  const buf = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buf, 0);
  buf.writeUInt32BE(13, 8);
  buf.write("IHDR", 12, "ascii");
  buf.writeUInt32BE(width, 16);
  buf.writeUInt32BE(height, 20);
  buf[24] = 8;
  buf[25] = 2;
  return buf;
}

export function writePng(filePath: string, width: number, height: number): string {
  return writeFile(filePath, pngHeader(width, height));
}

export const SAMPLE_COCO = {
  info: { description: "test set" },
  categories: [
    { id: 1, name: "cat", supercategory: "animal" },
    { id: 3, name: "dog" },
  ],
  images: [
    { id: 10, file_name: "a.jpg", width: 640, height: 480 },
    { id: 11, file_name: "b.jpg", width: 320, height: 240 },
  ],
  annotations: [
    { id: 1, image_id: 10, category_id: 3, bbox: [10, 20, 30, 40] },
    { id: 2, image_id: 10, category_id: 1, bbox: [0, 0, 5, 5], area: 20, iscrowd: 0 },
    { id: 3, image_id: 11, category_id: 1, bbox: [1.5, 2.5, 10, 10] },
  ],
};

export function vocXml(
  fileName: string,
  width: number,
  height: number,
  objects: string[],
): string {
  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<annotation>`,
    `  <folder>images</folder>`,
    `  <filename>${fileName}</filename>`,
    `  <size><width>${width}</width><height>${height}</height><depth>3</depth></size>`,
    ...objects,
    `</annotation>`,
  ].join("\n");
}

export function vocObject(
  name: string,
  [xmin, ymin, xmax, ymax]: [number, number, number, number],
  extra = "",
): string {
  return (
    `  <object><name>${name}</name>${extra}` +
    `<bndbox><xmin>${xmin}</xmin><ymin>${ymin}</ymin><xmax>${xmax}</xmax><ymax>${ymax}</ymax></bndbox>` +
    `</object>`
  );
}
