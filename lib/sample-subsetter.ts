import { basename, join } from "path";
import { copyFile, cp, mkdir, readdir, rm, stat } from "fs/promises";
import {
  AUXILIARY_DIRECTORIES,
  AUXILIARY_FILES,
  SAMPLE_SHEET_NAME,
} from "./bfq-constants";
import { PipelineOutputDirectory } from "./directory-inspector";
import { subsampleSeed } from "./env";
import {
  InvalidSampleError,
  isNotFoundError,
  MissingAuxiliaryError,
  OutputExistsError,
} from "./errors";
import { ExternalCommandRunner } from "./external-command";
import { subsampledFastqName } from "./fastq-names";
import {
  choicesWithReplacement,
  RandomSource,
  sampleWithoutReplacement,
} from "./random";
import { Reporter, silentReporter } from "./reporter";
import { gzipFolder, seqkitSample } from "./seqkit";
import { subsetSampleManifest } from "./sample-manifest";
import { subsetSampleSheet } from "./sample-sheet";

export const DEFAULT_READS_PER_FILE = 1000;
export const DEFAULT_SAMPLE_COUNT = 3;

export type SampleSelectionOptions = {
  // number of samples to draw at random - ignored if explicitSamples is given
  sampleCount?: number;

  // comma separated string (or list) of the sample ids to use
  explicitSamples?: string | readonly string[];

  // if true, random draws never repeat a sample (and are capped at the number of samples)
  unique?: boolean;
};

export type GenerateOptions = SampleSelectionOptions & {
  // the test data directory to create
  outputDir: string;

  // if true (the default) an existing output directory is deleted first
  overwrite?: boolean;

  // number of reads seqkit samples from each FASTQ
  readsPerFile?: number;

  // the seqkit random seed
  seed?: number;
};

export type GenerateResult = {
  // the samples used - in selection order and possibly with repeats
  samples: string[];

  // the FASTQ folder inside the output directory
  fastqOutputDir: string;

  // the files in the FASTQ folder once generation finished (sorted)
  fastqFiles: string[];
};

export type SampleSubsetterDependencies = {
  runner: ExternalCommandRunner;
  reporter?: Reporter;
  rng?: RandomSource;
};

/**
 * Split an explicit sample list given as a comma separated string. Empty
 * entries are kept (and then rejected as invalid sample ids).
 *
 * @param value the list as a string (or already split)
 */
export function parseSampleList(value: string | readonly string[]): string[] {
  const items = typeof value === "string" ? value.split(",") : value;

  return items.map((s) => s.trim());
}

/**
 * Decide which samples go into the test data.
 *
 * @param inspected the inspected bfq output
 * @param options how to select
 * @param rng the random source for count based selection
 * @throws InvalidSampleError if an explicit sample is not in the bfq output
 */
export function resolveSampleSelection(
  inspected: PipelineOutputDirectory,
  options: SampleSelectionOptions,
  rng: RandomSource
): string[] {
  const validSamples = [...inspected.sampleToFiles.keys()];

  if (options.explicitSamples !== undefined) {
    const samples = parseSampleList(options.explicitSamples);

    if (samples.length === 0) throw new InvalidSampleError("", validSamples);

    for (const s of samples) {
      if (!inspected.sampleToFiles.has(s))
        throw new InvalidSampleError(s, validSamples);
    }

    return samples;
  }

  const count = options.sampleCount ?? DEFAULT_SAMPLE_COUNT;

  if (!Number.isInteger(count) || count < 0)
    throw new Error(`Sample count must be a non-negative integer, not ${count}`);

  return options.unique
    ? sampleWithoutReplacement(validSamples, count, rng)
    : choicesWithReplacement(validSamples, count, rng);
}

/**
 * Builds a (much smaller) test data directory out of a bfq output - a subset of the
 * samples, each with subsampled FASTQ, plus the run metadata needed for the
 * downstream pipelines to treat it as a real run.
 */
export class SampleSubsetter {
  private readonly runner: ExternalCommandRunner;
  private readonly reporter: Reporter;
  private readonly rng: RandomSource;

  constructor(dependencies: SampleSubsetterDependencies) {
    this.runner = dependencies.runner;
    this.reporter = dependencies.reporter ?? silentReporter;
    this.rng = dependencies.rng ?? Math.random;
  }

  /**
   * Main subsampling routine - writes the complete test data directory.
   *
   * NOTE there is no rollback. If anything fails part way through, whatever
   * has been written to the output directory stays there.
   *
   * @param inspected the inspected bfq output
   * @param options where to write and what to select
   */
  async generate(
    inspected: PipelineOutputDirectory,
    options: GenerateOptions
  ): Promise<GenerateResult> {
    const readsPerFile = options.readsPerFile ?? DEFAULT_READS_PER_FILE;
    const seed = options.seed ?? subsampleSeed;

    if (!Number.isInteger(readsPerFile) || readsPerFile <= 0)
      throw new Error(
        `Reads per file must be a positive integer, not ${readsPerFile}`
      );

    // decided before anything is written so a bad sample id leaves no trace
    const samples = resolveSampleSelection(inspected, options, this.rng);

    this.reporter.info(`selected samples: ${samples.join(", ")}`);

    await this.prepareOutputDir(options.outputDir, options.overwrite ?? true);
    await this.copyAuxiliary(inspected.path, options.outputDir);

    const fastqOutputDir = join(options.outputDir, basename(inspected.fastqRoot));

    await mkdir(fastqOutputDir, { recursive: true });

    for (const sample of samples) {
      for (const fastq of inspected.sampleToFiles.get(sample) ?? []) {
        const src = join(inspected.fastqRoot, fastq);

        if (inspected.pipelineKind === "single-cell") {
          // single cell FASTQ are passed through whole and under their own name
          const dst = join(fastqOutputDir, fastq);
          this.reporter.info(`copy file: ${src} -> ${dst}`);
          await copyFile(src, dst);
        } else {
          const dst = join(fastqOutputDir, subsampledFastqName(sample, fastq));
          await seqkitSample(
            this.runner,
            this.reporter,
            src,
            dst,
            readsPerFile,
            seed
          );
        }
      }
    }

    await gzipFolder(this.runner, this.reporter, fastqOutputDir);

    this.reporter.info(`subsampling ${SAMPLE_SHEET_NAME} ... `);

    await subsetSampleSheet(
      join(inspected.path, SAMPLE_SHEET_NAME),
      join(options.outputDir, SAMPLE_SHEET_NAME),
      samples
    );

    // keep the per-run manifest in step so the output is itself a valid bfq output
    await subsetSampleManifest(
      inspected.sampleManifestPath,
      join(options.outputDir, basename(inspected.sampleManifestPath)),
      samples
    );

    return {
      samples,
      fastqOutputDir,
      fastqFiles: (await readdir(fastqOutputDir)).sort(),
    };
  }

  private async prepareOutputDir(outputDir: string, overwrite: boolean) {
    this.reporter.info(`start copy of files from bfq output to: ${outputDir}`);

    if (await exists(outputDir)) {
      if (!overwrite) throw new OutputExistsError(outputDir);

      this.reporter.info(`removing existing output dir ${outputDir}`);
      await rm(outputDir, { recursive: true, force: true });
    }

    await mkdir(outputDir, { recursive: true });
  }

  private async copyAuxiliary(sourceDir: string, outputDir: string) {
    for (const d of AUXILIARY_DIRECTORIES) {
      const src = join(sourceDir, d);
      const dst = join(outputDir, d);

      await assertAuxiliaryPresent(src);

      this.reporter.info(`copy tree: ${src} -> ${dst}`);
      await cp(src, dst, { recursive: true, dereference: true });
    }

    for (const f of AUXILIARY_FILES) {
      const src = join(sourceDir, f);
      const dst = join(outputDir, f);

      await assertAuxiliaryPresent(src);

      this.reporter.info(`copy file: ${src} -> ${dst}`);
      await copyFile(src, dst);
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (e) {
    if (isNotFoundError(e)) return false;
    throw e;
  }
}

async function assertAuxiliaryPresent(path: string) {
  try {
    await stat(path);
  } catch (e) {
    if (isNotFoundError(e)) throw new MissingAuxiliaryError(path, e);
    throw e;
  }
}
