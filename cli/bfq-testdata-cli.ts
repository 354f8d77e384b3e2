#!/usr/bin/env node

import { InvalidArgumentError, program } from "commander";
import { DirectoryInspector } from "../lib/directory-inspector";
import { parseSeed, subsampleSeed } from "../lib/env";
import { TestdataError } from "../lib/errors";
import { ExecFileCommandRunner } from "../lib/external-command";
import { createSeededRandom } from "../lib/random";
import { reportInspect } from "../lib/report-inspect";
import { consoleReporter } from "../lib/reporter";
import {
  DEFAULT_READS_PER_FILE,
  DEFAULT_SAMPLE_COUNT,
  SampleSubsetter,
} from "../lib/sample-subsetter";
import { subsetFastqFiles } from "../lib/seqkit";

type CreateOptions = {
  output: string;
  nReads: number;
  nSamples: number;
  samples?: string;
  overwrite: boolean;
  seed: number;
  selectionSeed?: number;
  unique?: boolean;
  verbose?: boolean;
};

type InspectOptions = {
  verbose?: boolean;
};

type SubsetFastqOptions = {
  output: string;
  nReads: number;
  seed: number;
  verbose?: boolean;
};

function parsePositiveInt(value: string): number {
  const n = Number(value);

  if (!Number.isInteger(n) || n <= 0)
    throw new InvalidArgumentError("Must be a positive integer.");

  return n;
}

function parseInteger(value: string): number {
  try {
    return parseSeed(value, 0);
  } catch (e) {
    throw new InvalidArgumentError("Must be an integer.");
  }
}

/**
 * Wrap a command action so our own errors end the process with a readable
 * message rather than a stack trace.
 */
function reportErrors<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (e) {
      if (!(e instanceof TestdataError)) throw e;

      console.error(`${e.name}: ${e.message}`);
      process.exitCode = 1;
    }
  };
}

program
  .name("bfq-testdata")
  .description(
    "Create testdata suitable to run bfq pipelines by subsampling an existing bfq output folder"
  )
  .version("1.0.0");

program
  .command("create", { isDefault: true })
  .description("Subsample a bfq output folder into a new test data folder")
  .argument("<runfolder>", "path to the bfq output (flowcell) dir")
  .requiredOption("--output <dir>", "output dir")
  .option(
    "--n-reads <n>",
    "number of reads (random subset) per fastq file",
    parsePositiveInt,
    DEFAULT_READS_PER_FILE
  )
  .option(
    "--n-samples <n>",
    "number of samples (random subset)",
    parsePositiveInt,
    DEFAULT_SAMPLE_COUNT
  )
  .option(
    "--samples <ids>",
    "comma separated list of sample ids to subset - this will override --n-samples"
  )
  .option("--no-overwrite", "fail if the output dir already exists")
  .option("--seed <n>", "seqkit random seed", parseInteger, subsampleSeed)
  .option(
    "--selection-seed <n>",
    "random seed for choosing samples (default is unseeded)",
    parseInteger
  )
  .option("--unique", "never choose the same sample twice")
  .option("--verbose", "print progress")
  .action(
    reportErrors(async (runfolder: string, options: CreateOptions) => {
      const reporter = consoleReporter(options.verbose ?? false);

      const inspected = await new DirectoryInspector(reporter).inspect(
        runfolder
      );

      const subsetter = new SampleSubsetter({
        runner: new ExecFileCommandRunner(),
        reporter,
        rng:
          options.selectionSeed === undefined
            ? Math.random
            : createSeededRandom(options.selectionSeed),
      });

      const result = await subsetter.generate(inspected, {
        outputDir: options.output,
        overwrite: options.overwrite,
        readsPerFile: options.nReads,
        sampleCount: options.nSamples,
        explicitSamples: options.samples,
        unique: options.unique,
        seed: options.seed,
      });

      console.log(
        `Wrote ${result.fastqFiles.length} fastq files for samples ${result.samples.join(", ")} to ${options.output}`
      );
    })
  );

program
  .command("inspect")
  .description("Show what would be subsampled from a bfq output folder")
  .argument("<runfolder>", "path to the bfq output (flowcell) dir")
  .option("--verbose", "print progress")
  .action(
    reportErrors(async (runfolder: string, options: InspectOptions) => {
      const inspected = await new DirectoryInspector(
        consoleReporter(options.verbose ?? false)
      ).inspect(runfolder);

      console.log(reportInspect(inspected));
    })
  );

program
  .command("subset-fastq")
  .description("Sample random reads from fastq files using seqkit")
  .argument("<fastq...>", "fastq files to sample from")
  .requiredOption("--output <dir>", "output dir")
  .option(
    "--n-reads <n>",
    "number of reads (random subset) per fastq file",
    parsePositiveInt,
    DEFAULT_READS_PER_FILE
  )
  .option("--seed <n>", "seqkit random seed", parseInteger, subsampleSeed)
  .option("--verbose", "print progress")
  .action(
    reportErrors(async (fastqs: string[], options: SubsetFastqOptions) => {
      const written = await subsetFastqFiles(
        new ExecFileCommandRunner(),
        consoleReporter(options.verbose ?? false),
        fastqs,
        options.output,
        options.nReads,
        options.seed
      );

      for (const w of written) console.log(w);
    })
  );

program.parseAsync().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
