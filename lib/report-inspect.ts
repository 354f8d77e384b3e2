import { table } from "table";
import { PipelineOutputDirectory } from "./directory-inspector";

/**
 * Produce a text report of an inspected bfq output.
 *
 * @param inspected the result of inspecting a bfq output directory
 */
export function reportInspect(inspected: PipelineOutputDirectory): string {
  const summary = [
    `Directory: ${inspected.path}`,
    `Experiment: ${inspected.experimentId}`,
    `Libprep: ${inspected.libprep ?? "(none)"}`,
    `Pipeline: ${inspected.pipelineKind}`,
    `FASTQ: ${inspected.fastqRoot}`,
  ];

  const tableData: string[][] = [["Sample", "FASTQ files"]];

  for (const [sample, files] of inspected.sampleToFiles)
    tableData.push([sample, files.length > 0 ? files.join("\n") : "-"]);

  return `${summary.join("\n")}\n${table(tableData)}`;
}
