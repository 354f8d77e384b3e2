import { SampleSheetFormatError } from "../lib/errors";
import {
  filterSampleSheet,
  findDataRegion,
  readSampleSheetHeader,
} from "../lib/sample-sheet";

const SHEET = [
  "[Header]",
  "IEMFileVersion,4",
  "ExperimentName,GCF-1",
  "Libprep,Kit A",
  "Libprep,Kit B",
  "[Data]",
  "Lane,Sample_ID,Sample_Name",
  "1,S1,S1",
  "1,S2,S2",
  "2,S1,S1",
  "1,S3,S3",
  "",
].join("\n");

describe("Sample sheet header", () => {
  it("finds the experiment name and the first libprep", () => {
    expect(readSampleSheetHeader(SHEET)).toEqual({
      experimentId: "GCF-1",
      libprep: "Kit A",
    });
  });

  it("stops scanning at the libprep line", () => {
    expect(
      readSampleSheetHeader("Libprep,Kit A\nExperimentName,GCF-1\n")
    ).toEqual({ libprep: "Kit A" });
  });

  it("reads quoted values", () => {
    expect(
      readSampleSheetHeader('ExperimentName,GCF-2\nLibprep,"Kit, with comma"\n')
    ).toEqual({ experimentId: "GCF-2", libprep: "Kit, with comma" });
  });

  it("has no libprep when the line is absent", () => {
    expect(readSampleSheetHeader("ExperimentName,GCF-3\n[Data]\n")).toEqual({
      experimentId: "GCF-3",
    });
  });
});

describe("Sample sheet filtering", () => {
  it("keeps the header region and only the selected data rows in order", () => {
    expect(filterSampleSheet(SHEET, ["S3", "S1"])).toBe(
      [
        "[Header]",
        "IEMFileVersion,4",
        "ExperimentName,GCF-1",
        "Libprep,Kit A",
        "Libprep,Kit B",
        "[Data]",
        "Lane,Sample_ID,Sample_Name",
        "1,S1,S1",
        "2,S1,S1",
        "1,S3,S3",
        "",
      ].join("\n")
    );
  });

  it("keeps only the header region for an empty selection", () => {
    expect(filterSampleSheet(SHEET, [])).toBe(
      [
        "[Header]",
        "IEMFileVersion,4",
        "ExperimentName,GCF-1",
        "Libprep,Kit A",
        "Libprep,Kit B",
        "[Data]",
        "Lane,Sample_ID,Sample_Name",
        "",
      ].join("\n")
    );
  });

  it("does not mind repeated samples in the selection", () => {
    expect(filterSampleSheet(SHEET, ["S2", "S2", "S2"])).toBe(
      [
        "[Header]",
        "IEMFileVersion,4",
        "ExperimentName,GCF-1",
        "Libprep,Kit A",
        "Libprep,Kit B",
        "[Data]",
        "Lane,Sample_ID,Sample_Name",
        "1,S2,S2",
        "",
      ].join("\n")
    );
  });

  it("handles CRLF, comma padded markers and blank data lines", () => {
    const sheet =
      "ExperimentName,GCF-1,,\r\n[Data],,,\r\nSample_ID,index,,\r\nS1,AAAA,,\r\n\r\nS2,CCCC,,\r\n";

    expect(filterSampleSheet(sheet, ["S2"])).toBe(
      "ExperimentName,GCF-1,,\n[Data],,,\nSample_ID,index,,\nS2,CCCC,,\n"
    );
  });

  it("uses the column position from the data header row", () => {
    expect(
      findDataRegion(["a,b", "[Data]", "Lane,Index,Sample_ID", "1,AC,S1"])
    ).toEqual({ headerLine: 2, sampleIdIndex: 2 });
  });

  it("rejects a sheet without a data section", () => {
    expect(() => filterSampleSheet("ExperimentName,GCF-1\n", ["S1"])).toThrow(
      SampleSheetFormatError
    );
  });

  it("rejects a data section without a Sample_ID column", () => {
    expect(() =>
      filterSampleSheet("[Data]\nLane,Sample\n1,S1\n", ["S1"])
    ).toThrow("Sample sheet [Data] header row has no Sample_ID column");
  });

  it("rejects a data section without a header row", () => {
    expect(() => filterSampleSheet("[Data]\n", ["S1"], "x.csv")).toThrow(
      "Sample sheet [Data] section has no column header row (in x.csv)"
    );
  });
});
