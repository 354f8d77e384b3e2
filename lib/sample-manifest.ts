import { parse } from "csv/sync";
import { readFile, writeFile } from "fs/promises";
import { SAMPLE_ID_COLUMN } from "./bfq-constants";
import { joinLines, splitFields, splitLines } from "./csv-fields";
import { SampleSheetFormatError } from "./errors";

/**
 * Get the sample ids (in file order, without duplicates) from the content of a
 * per-run sample manifest (a TSV with a header row that includes Sample_ID).
 *
 * @param tsv the manifest content including the header row
 * @param path the manifest location (for error messages only)
 */
export function parseSampleManifest(tsv: string, path?: string): string[] {
  const records: unknown = parse(tsv, {
    delimiter: "\t",
    bom: true,
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });

  if (!Array.isArray(records))
    throw new SampleSheetFormatError("Sample manifest could not be parsed", path);

  const rows: unknown[] = records;
  const sampleIds: string[] = [];

  for (const r of rows) {
    if (typeof r !== "object" || r === null || !(SAMPLE_ID_COLUMN in r))
      throw new SampleSheetFormatError(
        `Sample manifest has no ${SAMPLE_ID_COLUMN} column`,
        path
      );

    const sampleId = String(r[SAMPLE_ID_COLUMN]).trim();

    if (sampleId.length > 0 && !sampleIds.includes(sampleId))
      sampleIds.push(sampleId);
  }

  return sampleIds;
}

/**
 * Subset a per-run sample manifest to the given samples, keeping the
 * header row and the surviving rows verbatim.
 *
 * @param tsv the manifest content including the header row
 * @param samples the sample ids to keep
 * @param path the manifest location (for error messages only)
 */
export function filterSampleManifest(
  tsv: string,
  samples: Iterable<string>,
  path?: string
): string {
  const keep = new Set(samples);
  const lines = splitLines(tsv);

  if (lines.length === 0) return "";

  const sampleIdIndex = splitFields(lines[0], "\t").indexOf(SAMPLE_ID_COLUMN);

  if (sampleIdIndex < 0)
    throw new SampleSheetFormatError(
      `Sample manifest has no ${SAMPLE_ID_COLUMN} column`,
      path
    );

  return joinLines(
    lines.filter((line, i) => {
      if (i === 0) return true;

      const sampleId = splitFields(line, "\t")[sampleIdIndex];

      return sampleId !== undefined && keep.has(sampleId.trim());
    })
  );
}

/**
 * Read a per-run sample manifest, subset it to the samples and write it out.
 */
export async function subsetSampleManifest(
  inputPath: string,
  outputPath: string,
  samples: Iterable<string>
) {
  const text = await readFile(inputPath, "utf8");

  await writeFile(outputPath, filterSampleManifest(text, samples, inputPath));
}
