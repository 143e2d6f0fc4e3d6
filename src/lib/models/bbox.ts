/** Normalized center form: fractions of the image width/height. */
export interface NormalizedBox {
  xCenter: number;
  yCenter: number;
  width: number;
  height: number;
}

/** COCO box: top-left corner plus size, in pixels. */
export type XywhBox = [number, number, number, number];

/**
 * Axis-aligned box stored as absolute pixel corners.
 *
 * Nothing here validates or clips: inverted, empty and out-of-image boxes are
 * carried through every conversion unchanged.
 */
export class BBox {
  constructor(
    public xmin: number,
    public ymin: number,
    public xmax: number,
    public ymax: number,
  ) {}

  static fromCorners(xmin: number, ymin: number, xmax: number, ymax: number): BBox {
    return new BBox(xmin, ymin, xmax, ymax);
  }

  static fromXywh(x: number, y: number, w: number, h: number): BBox {
    return new BBox(x, y, x + w, y + h);
  }

  static denormalize(box: NormalizedBox, imageWidth: number, imageHeight: number): BBox {
    const w = box.width * imageWidth;
    const h = box.height * imageHeight;
    const xmin = box.xCenter * imageWidth - w / 2;
    const ymin = box.yCenter * imageHeight - h / 2;
    return new BBox(xmin, ymin, xmin + w, ymin + h);
  }

  get width(): number {
    return this.xmax - this.xmin;
  }

  get height(): number {
    return this.ymax - this.ymin;
  }

  get area(): number {
    return this.width * this.height;
  }

  toXywh(): XywhBox {
    return [this.xmin, this.ymin, this.width, this.height];
  }

  normalize(imageWidth: number, imageHeight: number): NormalizedBox {
    return {
      xCenter: (this.xmin + this.width / 2) / imageWidth,
      yCenter: (this.ymin + this.height / 2) / imageHeight,
      width: this.width / imageWidth,
      height: this.height / imageHeight,
    };
  }
}
