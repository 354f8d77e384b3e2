/**
 * Errors raised while inspecting a bfq output directory or generating
 * test data from it. All of these abort the run - there is no retry or
 * resumption.
 */

/**
 * Base class for all test data generation errors
 */
export class TestdataError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TestdataError";
  }
}

export class MissingDirectoryError extends TestdataError {
  constructor(public readonly path: string) {
    super(`BFQ output dir ${path} does not exist`, "MISSING_DIRECTORY");
    this.name = "MissingDirectoryError";
  }
}

export class MissingFastqDirectoryError extends TestdataError {
  constructor(public readonly path: string) {
    super(`Missing fastq dir. Expected ${path}`, "MISSING_FASTQ_DIRECTORY");
    this.name = "MissingFastqDirectoryError";
  }
}

/**
 * A manifest (sample sheet or per-run sample manifest) that the directory
 * layout says must be present is not.
 */
export class MissingManifestError extends TestdataError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`Missing manifest file ${path}`, "MISSING_MANIFEST", { cause });
    this.name = "MissingManifestError";
  }
}

export class SampleSheetFormatError extends TestdataError {
  constructor(message: string, public readonly path?: string) {
    super(path ? `${message} (in ${path})` : message, "SAMPLE_SHEET_FORMAT");
    this.name = "SampleSheetFormatError";
  }
}

export class InvalidSampleError extends TestdataError {
  constructor(
    public readonly sampleId: string,
    public readonly validSampleIds: readonly string[]
  ) {
    super(
      `Sample '${sampleId}' is not a valid sample id. Valid samples: ${validSampleIds.join(", ")}`,
      "INVALID_SAMPLE"
    );
    this.name = "InvalidSampleError";
  }
}

export class OutputExistsError extends TestdataError {
  constructor(public readonly path: string) {
    super(
      `Output dir ${path} already exists (and overwriting was not requested)`,
      "OUTPUT_EXISTS"
    );
    this.name = "OutputExistsError";
  }
}

export class MissingAuxiliaryError extends TestdataError {
  constructor(public readonly path: string, cause?: unknown) {
    super(
      `Auxiliary item ${path} is missing from the bfq output`,
      "MISSING_AUXILIARY",
      { cause }
    );
    this.name = "MissingAuxiliaryError";
  }
}

export class ExternalToolError extends TestdataError {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string = "",
    cause?: unknown
  ) {
    const detail = exitCode === null ? "could not be run" : `exited with code ${exitCode}`;
    const trimmed = stderr.trim();

    super(
      `External command '${[command, ...args].join(" ")}' ${detail}${trimmed ? `: ${trimmed}` : ""}`,
      "EXTERNAL_TOOL",
      { cause }
    );
    this.name = "ExternalToolError";
  }
}

/**
 * True if the error is a node filesystem error for a path that does not exist.
 * Node core errors can come from another realm (as under Jest), so this
 * checks the shape rather than the prototype.
 */
export function isNotFoundError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
