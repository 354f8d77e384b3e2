import { join } from "path";
import { readdir, readFile, stat } from "fs/promises";
import { SAMPLE_SHEET_NAME, sampleManifestName } from "./bfq-constants";
import {
  isNotFoundError,
  MissingDirectoryError,
  MissingFastqDirectoryError,
  MissingManifestError,
  SampleSheetFormatError,
} from "./errors";
import { isSampleFastq } from "./fastq-names";
import {
  KnownPipelineKind,
  PIPELINE_MAP,
  PipelineKind,
  pipelineKindForLibprep,
} from "./pipeline-map";
import { Reporter, silentReporter } from "./reporter";
import { readSampleSheetHeader } from "./sample-sheet";
import { parseSampleManifest } from "./sample-manifest";

/**
 * What we learn about a bfq output directory by inspecting it.
 */
export type PipelineOutputDirectory = {
  // the bfq output directory itself
  readonly path: string;

  // which family of pipeline produced the directory
  readonly pipelineKind: PipelineKind;

  // the library prep value from the sample sheet (if there was one)
  readonly libprep?: string;

  // the ExperimentName from the sample sheet
  readonly experimentId: string;

  // the folder holding the raw FASTQ files
  readonly fastqRoot: string;

  // the per-run sample manifest the samples were read from
  readonly sampleManifestPath: string;

  // sample id to the (sorted) FASTQ basenames in fastqRoot belonging to it - possibly empty
  readonly sampleToFiles: ReadonlyMap<string, readonly string[]>;
};

/**
 * The folder name for raw FASTQ in a bfq output - microbiome runs use
 * their own naming.
 *
 * @param pipelineKind the kind of pipeline
 * @param experimentId the experiment name
 */
export function fastqFolderName(
  pipelineKind: PipelineKind,
  experimentId: string
): string {
  return pipelineKind === "microbiome"
    ? `raw_fastq_${experimentId}`
    : experimentId;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (e) {
    if (isNotFoundError(e)) return false;
    throw e;
  }
}

/**
 * The sorted names of the regular files in a folder, including symlinks that
 * resolve to a regular file. Dangling links are left out.
 */
async function listFiles(folder: string): Promise<string[]> {
  const names: string[] = [];

  for (const d of await readdir(folder, { withFileTypes: true })) {
    if (d.isFile()) names.push(d.name);
    else if (d.isSymbolicLink()) {
      try {
        if ((await stat(join(folder, d.name))).isFile()) names.push(d.name);
      } catch (e) {
        if (!isNotFoundError(e)) throw e;
      }
    }
  }

  return names.sort();
}

async function readManifest(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (e) {
    if (isNotFoundError(e)) throw new MissingManifestError(path, e);
    throw e;
  }
}

/**
 * Works out what is inside a bfq output directory - which pipeline produced it,
 * where its FASTQ live and which FASTQ belong to which sample. Never writes
 * to the directory.
 */
export class DirectoryInspector {
  constructor(
    private readonly reporter: Reporter = silentReporter,
    private readonly pipelineMap: ReadonlyMap<
      string,
      KnownPipelineKind
    > = PIPELINE_MAP
  ) {}

  /**
   * Inspect a bfq output directory.
   *
   * @param dirname the bfq output directory
   * @throws MissingDirectoryError if the directory does not exist
   * @throws MissingFastqDirectoryError if the FASTQ folder is not where the sample sheet says
   */
  async inspect(dirname: string): Promise<PipelineOutputDirectory> {
    if (!(await isDirectory(dirname))) throw new MissingDirectoryError(dirname);

    const sampleSheetPath = join(dirname, SAMPLE_SHEET_NAME);
    const { experimentId, libprep } = readSampleSheetHeader(
      await readManifest(sampleSheetPath)
    );

    if (!experimentId)
      throw new SampleSheetFormatError(
        "Sample sheet has no ExperimentName (before any Libprep line)",
        sampleSheetPath
      );

    this.reporter.info(
      `identified experiment name from samplesheet: ${experimentId}`
    );

    const pipelineKind = this.classify(libprep);

    const fastqRoot = join(dirname, fastqFolderName(pipelineKind, experimentId));

    if (!(await isDirectory(fastqRoot)))
      throw new MissingFastqDirectoryError(fastqRoot);

    const sampleManifestPath = join(dirname, sampleManifestName(experimentId));
    const sampleIds = parseSampleManifest(
      await readManifest(sampleManifestPath),
      sampleManifestPath
    );

    const fastqNames = await listFiles(fastqRoot);

    const sampleToFiles = new Map<string, readonly string[]>();

    for (const sampleId of sampleIds) {
      const files = fastqNames.filter((n) => isSampleFastq(sampleId, n));

      if (files.length === 0)
        this.reporter.warn(`no fastq files found for sample ${sampleId}`);

      sampleToFiles.set(sampleId, files);
    }

    return {
      path: dirname,
      pipelineKind,
      libprep,
      experimentId,
      fastqRoot,
      sampleManifestPath,
      sampleToFiles,
    };
  }

  private classify(libprep: string | undefined): PipelineKind {
    if (libprep === undefined) {
      this.reporter.warn(
        "no Libprep in samplesheet, failed to identify pipeline - using `unknown`"
      );
      return "unknown";
    }

    this.reporter.info(
      `identified library prep kit from samplesheet: ${libprep}`
    );

    const kind = pipelineKindForLibprep(libprep, this.pipelineMap);

    if (!kind) {
      this.reporter.warn(
        `failed to identify pipeline from libprep name '${libprep}' - using \`unknown\``
      );
      return "unknown";
    }

    this.reporter.info(`pipeline: ${kind}`);

    return kind;
  }
}
