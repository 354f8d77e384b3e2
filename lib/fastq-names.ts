import { FASTQ_GZ_SUFFIX } from "./bfq-constants";

export type ReadNumber = "R1" | "R2";

// the read marker is either the last thing before the extension (S1_R1.fastq.gz)
// or followed by the illumina chunk number (S1_S1_L001_R1_001.fastq.gz)
const READ_MARKER_REGEX = /_R([12])(_\d{3})?\.fastq(\.gz)?$/;

/**
 * Does the given file (basename) belong to the given sample? bfq names every
 * FASTQ by prefixing it with the sample id, so this is a plain prefix match
 * on gzipped FASTQ names.
 *
 * NOTE a sample id that is a prefix of another (S1 and S10) will also claim the
 * other sample's files - this matches how bfq output has always been read.
 *
 * @param sampleId the sample identifier
 * @param basename a file name from the FASTQ directory
 */
export function isSampleFastq(sampleId: string, basename: string): boolean {
  if (basename.startsWith(".")) return false;

  return basename.startsWith(sampleId) && basename.endsWith(FASTQ_GZ_SUFFIX);
}

/**
 * Classify a FASTQ name as read 1 or read 2. Anything that does not carry an
 * explicit _R1 marker is treated as read 2.
 *
 * @param basename the FASTQ file name (compressed or not)
 */
export function readNumberOf(basename: string): ReadNumber {
  const match = READ_MARKER_REGEX.exec(basename);

  return match && match[1] === "1" ? "R1" : "R2";
}

/**
 * The (uncompressed) name we give a subsampled FASTQ in the test data - this is
 * the naming the downstream pipelines expect from bcl2fastq.
 *
 * @param sampleId the sample the FASTQ belongs to
 * @param sourceBasename the name of the source FASTQ
 */
export function subsampledFastqName(
  sampleId: string,
  sourceBasename: string
): string {
  return `${sampleId}_L001_${readNumberOf(sourceBasename)}_001.fastq`;
}

/**
 * The name of a FASTQ with any gzip extension removed.
 *
 * @param basename a FASTQ file name
 */
export function decompressedFastqName(basename: string): string {
  return basename.endsWith(".gz") ? basename.slice(0, -".gz".length) : basename;
}
