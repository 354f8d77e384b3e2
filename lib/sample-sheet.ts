import { readFile, writeFile } from "fs/promises";
import {
  SAMPLE_ID_COLUMN,
  SAMPLE_SHEET_DATA_MARKER,
  SAMPLE_SHEET_EXPERIMENT_KEY,
  SAMPLE_SHEET_LIBPREP_KEY,
} from "./bfq-constants";
import { joinLines, splitFields, splitLines } from "./csv-fields";
import { SampleSheetFormatError } from "./errors";

export type SampleSheetHeader = {
  // the ExperimentName value - names the FASTQ folder and the per-run manifest
  experimentId?: string;

  // the Libprep value (the first one found - the scan stops there)
  libprep?: string;
};

/**
 * Pull the experiment name and library prep out of the metadata region of a
 * sample sheet. The scan stops at the first Libprep line so any
 * ExperimentName after it is not seen.
 *
 * @param text the sample sheet content
 */
export function readSampleSheetHeader(text: string): SampleSheetHeader {
  const result: SampleSheetHeader = {};

  for (const line of splitLines(text)) {
    if (line.startsWith(SAMPLE_SHEET_EXPERIMENT_KEY)) {
      result.experimentId = splitFields(line)[1];
    }
    if (line.startsWith(SAMPLE_SHEET_LIBPREP_KEY)) {
      result.libprep = splitFields(line)[1];
      break;
    }
  }

  return result;
}

/**
 * Locate the [Data] region of a sample sheet.
 *
 * @param lines the sample sheet lines
 * @param path the sheet location (for error messages only)
 * @return the index of the column header row and the index of the Sample_ID column within it
 */
export function findDataRegion(
  lines: readonly string[],
  path?: string
): { headerLine: number; sampleIdIndex: number } {
  // "[Data]" on its own or padded out with commas by a spreadsheet ("[Data],,,,")
  const markerLine = lines.findIndex((l) =>
    l.trim().startsWith(SAMPLE_SHEET_DATA_MARKER)
  );

  if (markerLine < 0)
    throw new SampleSheetFormatError(
      `Sample sheet has no ${SAMPLE_SHEET_DATA_MARKER} section`,
      path
    );

  const headerLine = markerLine + 1;

  if (headerLine >= lines.length)
    throw new SampleSheetFormatError(
      `Sample sheet ${SAMPLE_SHEET_DATA_MARKER} section has no column header row`,
      path
    );

  const sampleIdIndex = splitFields(lines[headerLine]).indexOf(SAMPLE_ID_COLUMN);

  if (sampleIdIndex < 0)
    throw new SampleSheetFormatError(
      `Sample sheet ${SAMPLE_SHEET_DATA_MARKER} header row has no ${SAMPLE_ID_COLUMN} column`,
      path
    );

  return { headerLine, sampleIdIndex };
}

/**
 * Subset a sample sheet to the given samples. Every line up to and including
 * the [Data] column header row is kept verbatim - after that only rows whose
 * Sample_ID is one of the samples survive (in their original order).
 *
 * @param text the sample sheet content
 * @param samples the sample ids to keep (duplicates are fine)
 * @param path the sheet location (for error messages only)
 */
export function filterSampleSheet(
  text: string,
  samples: Iterable<string>,
  path?: string
): string {
  const keep = new Set(samples);
  const lines = splitLines(text);
  const { headerLine, sampleIdIndex } = findDataRegion(lines, path);

  const output = lines.filter((line, i) => {
    if (i <= headerLine) return true;

    const sampleId = splitFields(line)[sampleIdIndex];

    return sampleId !== undefined && keep.has(sampleId);
  });

  return joinLines(output);
}

/**
 * Read a sample sheet, subset it to the samples and write it out.
 *
 * @param inputPath the source SampleSheet.csv
 * @param outputPath where to write the subset sheet
 * @param samples the sample ids to keep
 */
export async function subsetSampleSheet(
  inputPath: string,
  outputPath: string,
  samples: Iterable<string>
) {
  const text = await readFile(inputPath, "utf8");

  await writeFile(outputPath, filterSampleSheet(text, samples, inputPath));
}
