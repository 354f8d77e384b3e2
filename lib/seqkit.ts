import { basename, join } from "path";
import { mkdir, readdir } from "fs/promises";
import { gzipBinary, seqkitBinary } from "./env";
import { ExternalCommandRunner, runChecked } from "./external-command";
import { decompressedFastqName } from "./fastq-names";
import { Reporter, reportToolOutput } from "./reporter";

/**
 * The arguments for a seqkit sample of an exact number of reads. seqkit reads the
 * gzipped FASTQ itself and writes uncompressed output because the destination has
 * no .gz extension.
 *
 * @param sourcePath the FASTQ to sample from
 * @param destinationPath where the sampled reads are written
 * @param readCount the number of reads wanted
 * @param seed the random seed for seqkit
 */
export function seqkitSampleArgs(
  sourcePath: string,
  destinationPath: string,
  readCount: number,
  seed: number
): string[] {
  return [
    "sample",
    "--number",
    readCount.toString(),
    "--rand-seed",
    seed.toString(),
    "--two-pass",
    "--out-file",
    destinationPath,
    sourcePath,
  ];
}

/**
 * Subsample a single FASTQ with seqkit.
 */
export async function seqkitSample(
  runner: ExternalCommandRunner,
  reporter: Reporter,
  sourcePath: string,
  destinationPath: string,
  readCount: number,
  seed: number
) {
  const args = seqkitSampleArgs(sourcePath, destinationPath, readCount, seed);

  reporter.info(`${seqkitBinary} ${args.join(" ")}`);

  const { stdout, stderr } = await runChecked(runner, seqkitBinary, args);

  reportToolOutput(reporter, stdout, stderr);
}

/**
 * Compress every file in a folder that is not already gzipped - in a single
 * invocation of gzip.
 *
 * @param runner the runner to use
 * @param reporter where progress goes
 * @param folder the folder of FASTQ files
 * @return the (uncompressed) names that were handed to gzip
 */
export async function gzipFolder(
  runner: ExternalCommandRunner,
  reporter: Reporter,
  folder: string
): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true });

  const toCompress = entries
    .filter((d) => d.isFile() && !d.name.endsWith(".gz"))
    .map((d) => d.name)
    .sort();

  if (toCompress.length === 0) {
    reporter.info(`nothing to compress in ${folder}`);
    return [];
  }

  const args = toCompress.map((n) => join(folder, n));

  reporter.info("compressing fastq files ....");
  reporter.info(`${gzipBinary} ${args.join(" ")}`);

  const { stdout, stderr } = await runChecked(runner, gzipBinary, args);

  reportToolOutput(reporter, stdout, stderr);

  return toCompress;
}

/**
 * Sample random reads from a set of FASTQ files into a folder, keeping each
 * file's own (decompressed) name.
 *
 * @param runner the runner to use
 * @param reporter where progress goes
 * @param fastqFiles paths of the FASTQ files
 * @param outputDir the folder to write to (created if needed)
 * @param readCount the number of reads wanted per file
 * @param seed the random seed for seqkit
 * @return the paths of the files written
 */
export async function subsetFastqFiles(
  runner: ExternalCommandRunner,
  reporter: Reporter,
  fastqFiles: readonly string[],
  outputDir: string,
  readCount: number,
  seed: number
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const written: string[] = [];

  for (const fastq of fastqFiles) {
    const destination = join(outputDir, decompressedFastqName(basename(fastq)));

    reporter.info("sampling fastq using seqkit ...");

    await seqkitSample(runner, reporter, fastq, destination, readCount, seed);

    written.push(destination);
  }

  return written;
}
