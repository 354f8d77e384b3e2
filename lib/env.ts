import { env as envDict } from "process";

// by default the external tools are expected to be on the PATH of whoever runs this
// HOWEVER, it is useful to be able to point at specific builds (i.e. a seqkit in a conda env)
// THESE PATHS ARE NOT CHECKED - THEY ARE HANDED DIRECTLY TO execFile

export const seqkitBinary = envDict["SEQKIT"] || "seqkit";
export const gzipBinary = envDict["GZIP_BINARY"] || "gzip";

// the seed handed to every seqkit sample invocation - fixed so that repeated
// generation of the same test data produces the same reads
export const DEFAULT_SUBSAMPLE_SEED = 123456;

export const subsampleSeed = parseSeed(
  envDict["TESTDATA_SEED"],
  DEFAULT_SUBSAMPLE_SEED
);

/**
 * Parse a seed value from the environment, falling back to the default
 * when not set.
 *
 * @param value the raw environment string (if any)
 * @param fallback the seed to use when no value is present
 */
export function parseSeed(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim().length === 0) return fallback;

  const seed = Number(value);

  if (!Number.isSafeInteger(seed))
    throw new Error(
      `Seed environment value '${value}' must be an integer (env TESTDATA_SEED)`
    );

  return seed;
}
