import path from "node:path";
import { Argument, Command, InvalidArgumentError, Option } from "commander";

import {
  CLASSES_FILE_NAME,
  type ConvertOptions,
  DEFAULT_IMAGE_EXT,
  DEFAULT_PRECISION,
  VERSION,
} from "./lib/config";
import { convert } from "./lib/converter";
import { FORMAT_IDS, type FormatId } from "./lib/formats/types";

interface CliOptions {
  input: string;
  output: string;
  images?: string;
  classes?: string;
  imageExt: string;
  precision: number;
  quiet?: boolean;
}

const EXAMPLES = `
Examples:
  # COCO to YOLO
  $ annoconv coco yolo -i annotations.json -o labels/ --classes classes.txt

  # YOLO to Pascal VOC
  $ annoconv yolo voc -i labels/ -o voc/ --images images/ --classes classes.txt

  # Pascal VOC to COCO
  $ annoconv voc coco -i voc/ -o annotations.json`;

function parsePrecision(value: string): number {
  const digits = Number(value);
  if (!Number.isInteger(digits) || digits < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return digits;
}

/** Map parsed flags onto engine options, applying the YOLO-specific defaults. */
export function toConvertOptions(target: FormatId, options: CliOptions): ConvertOptions {
  const classesFile =
    options.classes ??
    (target === "yolo" ? path.join(path.dirname(options.output), CLASSES_FILE_NAME) : undefined);
  return {
    imagesDir: options.images,
    classesFile,
    imageExt: options.imageExt,
    precision: options.precision,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("annoconv")
    .description("Convert object-detection annotations between COCO, YOLO and Pascal VOC")
    .version(VERSION, "-v, --version")
    .addArgument(new Argument("<source>", "source annotation format").choices(FORMAT_IDS))
    .addArgument(new Argument("<target>", "target annotation format").choices(FORMAT_IDS))
    .requiredOption("-i, --input <path>", "input path (file for COCO, directory for YOLO/VOC)")
    .requiredOption("-o, --output <path>", "output path (file for COCO, directory for YOLO/VOC)")
    .option("--images <dir>", "images directory (required for YOLO input)")
    .option("--classes <file>", "classes file (required for YOLO input, written for YOLO output)")
    .option("--image-ext <ext>", "image file extension for YOLO input", DEFAULT_IMAGE_EXT)
    .addOption(
      new Option("--precision <digits>", "decimal places for YOLO coordinates")
        .default(DEFAULT_PRECISION)
        .argParser(parsePrecision),
    )
    .option("-q, --quiet", "only print errors")
    .addHelpText("after", EXAMPLES)
    .action((source: FormatId, target: FormatId, options: CliOptions) => {
      if (source === "yolo" && (!options.images || !options.classes)) {
        program.error("error: YOLO input requires --images and --classes");
      }
      const log = (message: string): void => {
        if (!options.quiet) console.log(message);
      };

      try {
        log(`Converting ${source.toUpperCase()} -> ${target.toUpperCase()}...`);
        log(`Input: ${options.input}`);
        log(`Output: ${options.output}`);

        const dataset = convert(
          source,
          target,
          options.input,
          options.output,
          toConvertOptions(target, options),
        );

        log("");
        log("Conversion completed successfully!");
        log(`Images: ${dataset.images.length}`);
        log(`Categories: ${dataset.categories.length}`);
        log(`Total annotations: ${dataset.annotationCount}`);
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
