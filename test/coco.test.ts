import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DanglingReferenceError,
  DuplicateCategoryError,
  FormatError,
  MissingResourceError,
} from "../src/lib/errors";
import { readCoco, toCocoJson, writeCoco } from "../src/lib/formats/coco";
import { BBox } from "../src/lib/models/bbox";
import { Dataset, DatasetImage } from "../src/lib/models/dataset";
import { makeTempDir, readFile, removeDir, SAMPLE_COCO, writeFile } from "./helpers";

describe("COCO", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function writeJson(doc: unknown): string {
    return writeFile(path.join(dir, "annotations.json"), JSON.stringify(doc));
  }

  describe("readCoco", () => {
    it("builds categories, images and corner boxes", () => {
      const dataset = readCoco(writeJson(SAMPLE_COCO));

      expect(dataset.categories).toEqual([
        { id: 1, name: "cat", supercategory: "animal" },
        { id: 3, name: "dog" },
      ]);
      expect(dataset.info).toEqual({ description: "test set" });
      expect(dataset.images.map((i) => i.fileName)).toEqual(["a.jpg", "b.jpg"]);

      const [a, b] = dataset.images;
      expect(a.width).toBe(640);
      expect(a.height).toBe(480);
      expect(a.id).toBe(10);
      expect(a.annotations).toHaveLength(2);
      expect(b.annotations).toHaveLength(1);

      const first = a.annotations[0];
      expect([first.bbox.xmin, first.bbox.ymin, first.bbox.xmax, first.bbox.ymax]).toEqual([10, 20, 40, 60]);
      expect(first.categoryId).toBe(3);
      expect(first.categoryName).toBe("dog");
      expect(a.annotations[1].area).toBe(20);
    });

    it("treats missing or zero image sizes as unknown", () => {
      const dataset = readCoco(
        writeJson({
          ...SAMPLE_COCO,
          images: [
            { id: 10, file_name: "a.jpg" },
            { id: 11, file_name: "b.jpg", width: 0, height: 0 },
          ],
        }),
      );
      expect(dataset.images[0].hasDimensions).toBe(false);
      expect(dataset.images[1].width).toBeUndefined();
    });

    it("fails on an annotation with an unknown category", () => {
      const file = writeJson({
        ...SAMPLE_COCO,
        annotations: [{ id: 1, image_id: 10, category_id: 7, bbox: [0, 0, 1, 1] }],
      });
      expect(() => readCoco(file)).toThrow(DanglingReferenceError);
      expect(() => readCoco(file)).toThrow("Unknown category id 7 (annotations[0])");
    });

    it("fails on an annotation with an unknown image", () => {
      const file = writeJson({
        ...SAMPLE_COCO,
        annotations: [{ id: 1, image_id: 99, category_id: 1, bbox: [0, 0, 1, 1] }],
      });
      expect(() => readCoco(file)).toThrow(DanglingReferenceError);
    });

    it("fails on malformed JSON and missing keys", () => {
      const broken = writeFile(path.join(dir, "broken.json"), "{not json");
      expect(() => readCoco(broken)).toThrow(FormatError);

      const { annotations: _dropped, ...withoutAnnotations } = SAMPLE_COCO;
      expect(() => readCoco(writeJson(withoutAnnotations))).toThrow('missing "annotations" array');
    });

    it("fails on a repeated image id instead of moving its annotations", () => {
      const file = writeJson({
        ...SAMPLE_COCO,
        images: [
          { id: 1, file_name: "a.jpg", width: 10, height: 10 },
          { id: 1, file_name: "b.jpg", width: 10, height: 10 },
        ],
        annotations: [{ id: 1, image_id: 1, category_id: 1, bbox: [0, 0, 1, 1] }],
      });
      expect(() => readCoco(file)).toThrow(FormatError);
      expect(() => readCoco(file)).toThrow(`${file}: images[1]: duplicate image id 1`);
    });

    it("fails on a bbox that is not four numbers", () => {
      const file = writeJson({
        ...SAMPLE_COCO,
        annotations: [{ id: 1, image_id: 10, category_id: 1, bbox: [0, 0, 1] }],
      });
      expect(() => readCoco(file)).toThrow(FormatError);
    });

    it("fails on duplicate category ids", () => {
      const file = writeJson({
        ...SAMPLE_COCO,
        categories: [
          { id: 1, name: "cat" },
          { id: 1, name: "dog" },
        ],
      });
      expect(() => readCoco(file)).toThrow(DuplicateCategoryError);
    });

    it("fails when the file does not exist", () => {
      expect(() => readCoco(path.join(dir, "missing.json"))).toThrow(MissingResourceError);
    });
  });

  describe("toCocoJson", () => {
    it("renumbers images and annotations from 1 and emits xywh boxes", () => {
      const json = toCocoJson(readCoco(writeJson(SAMPLE_COCO)));

      expect(json.images.map((i) => i.id)).toEqual([1, 2]);
      expect(json.annotations.map((a) => a.id)).toEqual([1, 2, 3]);
      expect(json.annotations[0]).toEqual({
        id: 1,
        image_id: 1,
        category_id: 3,
        segmentation: [],
        bbox: [10, 20, 30, 40],
        area: 1200,
        iscrowd: 0,
      });
      expect(json.annotations[1].area).toBe(20);
      expect(json.annotations[2].image_id).toBe(2);
      expect(json.annotations[2].bbox).toEqual([1.5, 2.5, 10, 10]);
      expect(json.categories).toEqual([
        { id: 1, name: "cat", supercategory: "animal" },
        { id: 3, name: "dog" },
      ]);
      expect(json.licenses).toEqual([]);
      expect(json.info).toEqual({ description: "test set" });
    });

    it("drops VOC-only flags and writes unknown sizes as 0", () => {
      const dataset = new Dataset();
      dataset.addCategory({ id: 0, name: "person" });
      const image = new DatasetImage({ fileName: "x.jpg" });
      image.addAnnotation({
        bbox: new BBox(1, 2, 3, 4),
        categoryId: 0,
        categoryName: "person",
        difficult: true,
        truncated: true,
      });
      dataset.addImage(image);

      const json = toCocoJson(dataset);
      expect(json.images[0]).toEqual({ id: 1, file_name: "x.jpg", width: 0, height: 0 });
      expect(json.annotations[0]).not.toHaveProperty("difficult");
      expect(json.annotations[0]).not.toHaveProperty("truncated");
    });
  });

  it("reads back what it writes", () => {
    const original = readCoco(writeJson(SAMPLE_COCO));
    const out = path.join(dir, "nested", "out.json");
    writeCoco(original, out);

    expect(readFile(out).endsWith("}\n")).toBe(true);
    const again = readCoco(out);
    expect(again.images.map((i) => i.annotations.length)).toEqual([2, 1]);
    expect(again.categories).toEqual(original.categories);
    const box = again.images[1].annotations[0].bbox;
    expect([box.xmin, box.ymin, box.xmax, box.ymax]).toEqual([1.5, 2.5, 11.5, 12.5]);
  });
});
