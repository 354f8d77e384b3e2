import { join } from "path";
import { rename, rm, symlink } from "fs/promises";
import { DirectoryInspector, fastqFolderName } from "../lib/directory-inspector";
import {
  MissingDirectoryError,
  MissingFastqDirectoryError,
  MissingManifestError,
} from "../lib/errors";
import { KnownPipelineKind } from "../lib/pipeline-map";
import {
  createBfqOutput,
  makeTempDir,
  MICROBIOME_LIBPREP,
  recordingReporter,
  removeTempDirs,
  SINGLE_CELL_LIBPREP,
  TEST_EXPERIMENT_ID,
} from "./bfq-fixture";

describe("Inspecting a bfq output directory", () => {
  afterEach(async () => {
    await removeTempDirs();
  });

  it("maps every manifest sample to its FASTQ files", async () => {
    const root = await createBfqOutput();

    const inspected = await new DirectoryInspector().inspect(root);

    expect(inspected.path).toBe(root);
    expect(inspected.pipelineKind).toBe("standard");
    expect(inspected.experimentId).toBe(TEST_EXPERIMENT_ID);
    expect(inspected.fastqRoot).toBe(join(root, TEST_EXPERIMENT_ID));
    expect(inspected.sampleManifestPath).toBe(
      join(root, `${TEST_EXPERIMENT_ID}_samplesheet.tsv`)
    );
    expect([...inspected.sampleToFiles.keys()]).toEqual(["S1", "S2", "S3"]);
    expect(inspected.sampleToFiles.get("S1")).toEqual([
      "S1_R1.fastq.gz",
      "S1_R2.fastq.gz",
    ]);
    expect(inspected.sampleToFiles.get("S2")).toEqual(["S2_R1.fastq.gz"]);
  });

  it("keeps a sample that has no FASTQ with an empty file list", async () => {
    const root = await createBfqOutput({
      samples: { S1: ["S1_R1.fastq.gz"], S4: [] },
    });
    const reporter = recordingReporter();

    const inspected = await new DirectoryInspector(reporter).inspect(root);

    expect([...inspected.sampleToFiles.keys()]).toEqual(["S1", "S4"]);
    expect(inspected.sampleToFiles.get("S4")).toEqual([]);
    expect(reporter.warns).toEqual(["no fastq files found for sample S4"]);
  });

  it("only picks up gzipped FASTQ", async () => {
    const root = await createBfqOutput({
      samples: { S1: ["S1_R1.fastq.gz", "S1_R1.fastq.gz.md5", "S1_notes.txt"] },
    });

    const inspected = await new DirectoryInspector().inspect(root);

    expect(inspected.sampleToFiles.get("S1")).toEqual(["S1_R1.fastq.gz"]);
  });

  it("follows symlinked FASTQ and skips dangling links", async () => {
    const root = await createBfqOutput({
      samples: { S1: ["S1_R1.fastq.gz", "S1_R2.fastq.gz"] },
    });
    const fastqRoot = join(root, TEST_EXPERIMENT_ID);
    const elsewhere = join(await makeTempDir(), "S1_R1.fastq.gz");

    await rename(join(fastqRoot, "S1_R1.fastq.gz"), elsewhere);
    await symlink(elsewhere, join(fastqRoot, "S1_R1.fastq.gz"));
    await symlink(
      join(root, "no-such-file.fastq.gz"),
      join(fastqRoot, "S1_R3.fastq.gz")
    );

    const inspected = await new DirectoryInspector().inspect(root);

    expect(inspected.sampleToFiles.get("S1")).toEqual([
      "S1_R1.fastq.gz",
      "S1_R2.fastq.gz",
    ]);
  });

  it("matches files by sample id prefix", async () => {
    const root = await createBfqOutput({
      samples: { S1: ["S1_R1.fastq.gz"], S10: ["S10_R1.fastq.gz"] },
    });

    const inspected = await new DirectoryInspector().inspect(root);

    expect(inspected.sampleToFiles.get("S1")).toEqual([
      "S10_R1.fastq.gz",
      "S1_R1.fastq.gz",
    ]);
    expect(inspected.sampleToFiles.get("S10")).toEqual(["S10_R1.fastq.gz"]);
  });

  it("finds microbiome FASTQ in the raw_fastq folder", async () => {
    const root = await createBfqOutput({
      libprep: MICROBIOME_LIBPREP,
      fastqFolder: `raw_fastq_${TEST_EXPERIMENT_ID}`,
    });

    const inspected = await new DirectoryInspector().inspect(root);

    expect(inspected.pipelineKind).toBe("microbiome");
    expect(inspected.fastqRoot).toBe(
      join(root, `raw_fastq_${TEST_EXPERIMENT_ID}`)
    );
    expect(inspected.sampleToFiles.get("S3")).toEqual([
      "S3_R1.fastq.gz",
      "S3_R2.fastq.gz",
    ]);
  });

  it("classifies single cell runs", async () => {
    const root = await createBfqOutput({ libprep: SINGLE_CELL_LIBPREP });

    const inspected = await new DirectoryInspector().inspect(root);

    expect(inspected.pipelineKind).toBe("single-cell");
    expect(inspected.libprep).toBe(SINGLE_CELL_LIBPREP);
  });

  it("carries on as unknown with a warning for an unmapped libprep", async () => {
    const root = await createBfqOutput({ libprep: "Mystery Kit" });
    const reporter = recordingReporter();

    const inspected = await new DirectoryInspector(reporter).inspect(root);

    expect(inspected.pipelineKind).toBe("unknown");
    expect(inspected.fastqRoot).toBe(join(root, TEST_EXPERIMENT_ID));
    expect(reporter.warns).toEqual([
      "failed to identify pipeline from libprep name 'Mystery Kit' - using `unknown`",
    ]);
  });

  it("carries on as unknown when there is no libprep at all", async () => {
    const root = await createBfqOutput({ libprep: null });
    const reporter = recordingReporter();

    const inspected = await new DirectoryInspector(reporter).inspect(root);

    expect(inspected.pipelineKind).toBe("unknown");
    expect(inspected.libprep).toBeUndefined();
    expect(reporter.warns.length).toBe(1);
  });

  it("can be given its own pipeline map", async () => {
    const root = await createBfqOutput({ libprep: "Mystery Kit" });

    const pipelineMap = new Map<string, KnownPipelineKind>([
      ["Mystery Kit", "single-cell"],
    ]);

    const inspected = await new DirectoryInspector(
      undefined,
      pipelineMap
    ).inspect(root);

    expect(inspected.pipelineKind).toBe("single-cell");
  });

  it("fails for a directory that does not exist", async () => {
    const missing = join(await makeTempDir(), "nope");

    await expect(new DirectoryInspector().inspect(missing)).rejects.toThrow(
      MissingDirectoryError
    );
  });

  it("fails when the FASTQ folder is not where the pipeline puts it", async () => {
    // a microbiome run whose FASTQ are in the plain experiment folder
    const root = await createBfqOutput({ libprep: MICROBIOME_LIBPREP });

    await expect(new DirectoryInspector().inspect(root)).rejects.toMatchObject({
      name: "MissingFastqDirectoryError",
      path: join(root, `raw_fastq_${TEST_EXPERIMENT_ID}`),
    });
    await expect(new DirectoryInspector().inspect(root)).rejects.toThrow(
      MissingFastqDirectoryError
    );
  });

  it("fails when the per-run sample manifest is missing", async () => {
    const root = await createBfqOutput();
    await rm(join(root, `${TEST_EXPERIMENT_ID}_samplesheet.tsv`));

    await expect(new DirectoryInspector().inspect(root)).rejects.toThrow(
      MissingManifestError
    );
  });

  it("names the FASTQ folder by pipeline kind", () => {
    expect(fastqFolderName("microbiome", "GCF-9")).toBe("raw_fastq_GCF-9");
    expect(fastqFolderName("standard", "GCF-9")).toBe("GCF-9");
    expect(fastqFolderName("single-cell", "GCF-9")).toBe("GCF-9");
    expect(fastqFolderName("unknown", "GCF-9")).toBe("GCF-9");
  });
});
