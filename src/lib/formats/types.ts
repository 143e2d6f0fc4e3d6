import type { ResolvedOptions } from "../config";
import type { Dataset } from "../models/dataset";

export const FORMAT_IDS = ["coco", "yolo", "voc"] as const;

export type FormatId = (typeof FORMAT_IDS)[number];

export function isFormatId(value: string): value is FormatId {
  return FORMAT_IDS.some((id) => id === value);
}

export interface FormatAdapter {
  id: FormatId;
  /** Whether the format identifies classes by position (YOLO) rather than by stored id or name. */
  indexedCategories: boolean;
  read(sourcePath: string, options: ResolvedOptions): Dataset;
  write(dataset: Dataset, targetPath: string, options: ResolvedOptions): void;
}
