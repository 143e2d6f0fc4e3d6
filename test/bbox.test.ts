import { describe, expect, it } from "vitest";

import { BBox } from "../src/lib/models/bbox";

describe("BBox", () => {
  it("converts between COCO xywh and corners", () => {
    const box = BBox.fromXywh(10, 20, 30, 40);
    expect([box.xmin, box.ymin, box.xmax, box.ymax]).toEqual([10, 20, 40, 60]);
    expect(box.toXywh()).toEqual([10, 20, 30, 40]);
    expect(box.width).toBe(30);
    expect(box.height).toBe(40);
    expect(box.area).toBe(1200);
  });

  it("normalizes a 1920x1080 box to center form", () => {
    const n = new BBox(100, 200, 300, 400).normalize(1920, 1080);
    expect(n.xCenter.toFixed(5)).toBe("0.10417");
    expect(n.yCenter.toFixed(5)).toBe("0.27778");
    expect(n.width.toFixed(5)).toBe("0.10417");
    expect(n.height.toFixed(5)).toBe("0.18519");
  });

  it("recovers the corners within a pixel from 5-decimal center form", () => {
    const back = BBox.denormalize(
      { xCenter: 0.10417, yCenter: 0.27778, width: 0.10417, height: 0.18519 },
      1920,
      1080,
    );
    const expected = [100, 200, 300, 400];
    [back.xmin, back.ymin, back.xmax, back.ymax].forEach((v, i) => {
      expect(Math.abs(v - expected[i])).toBeLessThanOrEqual(1);
    });
  });

  it("round-trips through normalized form without rounding", () => {
    const box = new BBox(13.25, 7.5, 401.75, 299);
    const back = BBox.denormalize(box.normalize(640, 480), 640, 480);
    expect(back.xmin).toBeCloseTo(13.25, 9);
    expect(back.ymin).toBeCloseTo(7.5, 9);
    expect(back.xmax).toBeCloseTo(401.75, 9);
    expect(back.ymax).toBeCloseTo(299, 9);
  });

  it("passes inverted and out-of-image boxes through", () => {
    const inverted = new BBox(50, 50, 10, 10);
    const n = inverted.normalize(100, 100);
    expect(n.width).toBeCloseTo(-0.4, 12);
    const back = BBox.denormalize(n, 100, 100);
    expect(back.xmin).toBeCloseTo(50, 9);
    expect(back.xmax).toBeCloseTo(10, 9);

    const outside = new BBox(-10, -5, 120, 90).normalize(100, 100);
    expect(outside.xCenter).toBeCloseTo(0.55, 12);
    expect(outside.width).toBeCloseTo(1.3, 12);
  });
});
