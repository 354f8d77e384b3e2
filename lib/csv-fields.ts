import { parse } from "csv/sync";

/**
 * Split the text of a manifest into lines, without the line terminators.
 * A single trailing newline does not produce a trailing empty line.
 *
 * @param text the complete file content
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);

  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  return lines;
}

/**
 * Split a single manifest line into its fields. Quoted fields are honoured, but
 * the line itself is never rewritten - callers that filter lines keep the
 * original text.
 *
 * @param line one line of a delimited file
 * @param delimiter the field delimiter
 */
export function splitFields(line: string, delimiter: string = ","): string[] {
  if (line.length === 0) return [];

  const records: unknown = parse(line, {
    delimiter: delimiter,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
  });

  if (!Array.isArray(records) || records.length === 0) return [];

  const first: unknown = records[0];

  if (!Array.isArray(first)) return [];

  const fields: unknown[] = first;

  return fields.map((f) => String(f));
}

/**
 * Join lines back into file content, each line newline terminated.
 */
export function joinLines(lines: readonly string[]): string {
  return lines.map((l) => `${l}\n`).join("");
}
