// the names of things inside a bfq output directory - these are fixed by the
// bfq pipeline itself and are not configurable

export const SAMPLE_SHEET_NAME = "SampleSheet.csv";

export const SAMPLE_SHEET_DATA_MARKER = "[Data]";
export const SAMPLE_SHEET_EXPERIMENT_KEY = "ExperimentName";
export const SAMPLE_SHEET_LIBPREP_KEY = "Libprep";

export const SAMPLE_ID_COLUMN = "Sample_ID";

// directories copied recursively into the test data
export const AUXILIARY_DIRECTORIES = ["Stats", "InterOp"];

// files copied verbatim into the test data
export const AUXILIARY_FILES = ["bcl.done", "Sample-Submission-Form.xlsx"];

export const FASTQ_GZ_SUFFIX = ".fastq.gz";

/**
 * The per-run sample manifest written by bfq alongside the sample sheet.
 *
 * @param experimentId the experiment name from the sample sheet
 */
export function sampleManifestName(experimentId: string): string {
  return `${experimentId}_samplesheet.tsv`;
}
