import pipelineMapJson from "./pipeline-map.json";

/**
 * The families of bfq pipeline output we know how to subsample. The kind
 * decides where the FASTQ files live and whether they are subsampled at all.
 */
export type PipelineKind = "standard" | "microbiome" | "single-cell" | "unknown";

export const KNOWN_PIPELINE_KINDS = [
  "standard",
  "microbiome",
  "single-cell",
] as const;

export type KnownPipelineKind = (typeof KNOWN_PIPELINE_KINDS)[number];

/**
 * Flatten the per-kind lists of library prep names into a lookup map.
 *
 * @param table lists of library prep codes keyed by the pipeline kind they belong to
 */
export function createPipelineMap(
  table: Record<KnownPipelineKind, readonly string[]>
): Map<string, KnownPipelineKind> {
  const result = new Map<string, KnownPipelineKind>();

  for (const kind of KNOWN_PIPELINE_KINDS) {
    for (const libprep of table[kind]) {
      const existing = result.get(libprep);

      if (existing && existing !== kind)
        throw new Error(
          `Library prep '${libprep}' is listed under both '${existing}' and '${kind}'`
        );

      result.set(libprep, kind);
    }
  }

  return result;
}

export const PIPELINE_MAP = createPipelineMap(pipelineMapJson);

/**
 * Classify a library prep code. Returns undefined when the code is not one
 * we know about - the caller decides how loudly to complain.
 *
 * @param libprep the Libprep value from the sample sheet
 * @param pipelineMap the lookup to use (defaults to the bundled one)
 */
export function pipelineKindForLibprep(
  libprep: string,
  pipelineMap: ReadonlyMap<string, KnownPipelineKind> = PIPELINE_MAP
): KnownPipelineKind | undefined {
  return pipelineMap.get(libprep);
}
