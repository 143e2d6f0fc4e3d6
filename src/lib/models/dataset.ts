import { CategoryNotFoundError, DuplicateCategoryError } from "../errors";
import { BBox } from "./bbox";

export interface Category {
  id: number;
  name: string;
  supercategory?: string;
}

export interface Annotation {
  bbox: BBox;
  categoryId: number;
  /** Copy of the category name for formats that key classes by name. */
  categoryName: string;
  /** VOC: excluded from standard evaluation. */
  difficult?: boolean;
  /** VOC: the object extends past the image border. */
  truncated?: boolean;
  pose?: string;
  area?: number;
  iscrowd?: number;
}

export interface DatasetImageInit {
  fileName: string;
  width?: number;
  height?: number;
  depth?: number;
  id?: number;
}

export class DatasetImage {
  fileName: string;
  /** Pixel size; undefined until read from a source or inferred. */
  width?: number;
  height?: number;
  depth?: number;
  /**
   * Id the image had in its source file, if any. Informational only: writers
   * number images themselves and annotations are attached by reference.
   */
  id?: number;
  readonly annotations: Annotation[] = [];

  constructor(init: DatasetImageInit) {
    this.fileName = init.fileName;
    this.width = init.width;
    this.height = init.height;
    this.depth = init.depth;
    this.id = init.id;
  }

  get hasDimensions(): boolean {
    return this.width !== undefined && this.height !== undefined;
  }

  addAnnotation(annotation: Annotation): void {
    this.annotations.push(annotation);
  }
}

export class Dataset {
  readonly images: DatasetImage[] = [];
  readonly categories: Category[] = [];
  info: Record<string, unknown> = {};

  addCategory(category: Category): void {
    if (this.findCategoryById(category.id)) {
      throw new DuplicateCategoryError(category.id);
    }
    this.categories.push(category);
  }

  addImage(image: DatasetImage): void {
    this.images.push(image);
  }

  findCategoryById(id: number): Category | undefined {
    return this.categories.find((c) => c.id === id);
  }

  findCategoryByName(name: string): Category | undefined {
    return this.categories.find((c) => c.name === name);
  }

  getCategoryById(id: number): Category {
    const category = this.findCategoryById(id);
    if (!category) throw new CategoryNotFoundError(id);
    return category;
  }

  getCategoryByName(name: string): Category {
    const category = this.findCategoryByName(name);
    if (!category) throw new CategoryNotFoundError(name);
    return category;
  }

  get annotationCount(): number {
    return this.images.reduce((sum, image) => sum + image.annotations.length, 0);
  }

  /**
   * Reassign category ids to `startAt, startAt + 1, …` in ascending old-id
   * order and rewrite every annotation that points at them.
   * Returns the old id → new id map.
   */
  renumberCategories(startAt = 0): Map<number, number> {
    const ordered = [...this.categories].sort((a, b) => a.id - b.id);
    const idMap = new Map<number, number>();
    ordered.forEach((category, index) => idMap.set(category.id, startAt + index));

    for (const category of this.categories) {
      category.id = idMap.get(category.id) ?? category.id;
    }
    this.categories.sort((a, b) => a.id - b.id);

    for (const image of this.images) {
      for (const ann of image.annotations) {
        ann.categoryId = idMap.get(ann.categoryId) ?? ann.categoryId;
      }
    }
    return idMap;
  }
}
