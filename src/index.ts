export { BBox } from "./lib/models/bbox";
export type { NormalizedBox, XywhBox } from "./lib/models/bbox";
export { Dataset, DatasetImage } from "./lib/models/dataset";
export type { Annotation, Category, DatasetImageInit } from "./lib/models/dataset";
export * from "./lib/errors";
export {
  CLASSES_FILE_NAME,
  DEFAULT_IMAGE_EXT,
  DEFAULT_PRECISION,
  resolveOptions,
  VERSION,
} from "./lib/config";
export type { ConvertOptions } from "./lib/config";
export {
  convert,
  getAdapter,
  inferImageDimensions,
  readDataset,
  reconcile,
  writeDataset,
} from "./lib/converter";
export { FORMAT_IDS, isFormatId } from "./lib/formats/types";
export type { FormatAdapter, FormatId } from "./lib/formats/types";
export { cocoFormat, readCoco, toCocoJson, writeCoco } from "./lib/formats/coco";
export { readYolo, writeYolo, yoloFormat } from "./lib/formats/yolo";
export { readVoc, toVocXml, vocFormat, writeVoc } from "./lib/formats/voc";
export type { COCOJson } from "./lib/types/coco";
