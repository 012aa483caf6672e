import fs from "node:fs";
import { CliError } from "../errors.js";
import { isRecord } from "../utils/records.js";

export type RichOutputFormat = "table" | "tsv" | "json";

export type OutputOptions = {
  format?: string;
  out?: string;
  json?: boolean;
};

export type RenderOptions = {
  pretty?: boolean;
};

export function normalizeRichOutputFormat(format: string | undefined, jsonFlag?: boolean): RichOutputFormat {
  if (jsonFlag) {
    return "json";
  }
  const value = (format ?? "table").trim().toLowerCase();
  if (value === "table" || value === "tsv" || value === "json") {
    return value;
  }
  throw new CliError(`Invalid --format value: ${format}. Use table, tsv, or json.`);
}

export function assertRichOutputFileOption(outputPath: string | undefined, format: RichOutputFormat): void {
  if (outputPath && format === "table") {
    throw new CliError("`--out` requires --format tsv/json (or --json).");
  }
}

export function isPrettyJson(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.JIRACTL_JSON_PRETTY?.trim() === "1";
}

export function renderRichOutput(data: unknown, format: RichOutputFormat, options: RenderOptions = {}): string {
  if (format === "tsv") {
    return `${toTsv(data)}\n`;
  }
  const json = options.pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
  return `${json}\n`;
}

export function writeRichOutputFile(path: string, content: string): void {
  fs.writeFileSync(path, content, "utf8");
}

/**
 * Shared tail of every data command: json/tsv go to stdout or `--out`,
 * table mode hands over to the command's own line renderer.
 */
export function emitResult(input: {
  label: string;
  payload: unknown;
  tsvData?: unknown;
  options: OutputOptions;
  renderTable: () => string;
}): void {
  const format = normalizeRichOutputFormat(input.options.format, input.options.json);
  assertRichOutputFileOption(input.options.out, format);

  if (format === "table") {
    process.stdout.write(input.renderTable());
    return;
  }

  const data = format === "tsv" && input.tsvData !== undefined ? input.tsvData : input.payload;
  const content = renderRichOutput(data, format, { pretty: isPrettyJson() });
  if (input.options.out) {
    writeRichOutputFile(input.options.out, content);
    process.stdout.write(`Saved ${input.label} output to ${input.options.out}.\n`);
    return;
  }
  process.stdout.write(content);
}

function toTsv(data: unknown): string {
  if (Array.isArray(data)) {
    const records = data.map(normalizeRecord);
    return recordsToTsv(records);
  }

  if (isRecord(data)) {
    const rows = Object.entries(data).map(([key, value]) => ({
      key,
      value,
    }));
    return recordsToTsv(rows);
  }

  return recordsToTsv([{ value: data }]);
}

function normalizeRecord(value: unknown): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  return { value };
}

function recordsToTsv(records: Record<string, unknown>[]): string {
  const columns = collectColumns(records);
  if (records.length === 0) {
    return columns.join("\t");
  }
  const lines = [columns.join("\t")];
  for (const record of records) {
    lines.push(columns.map((column) => formatTsvCell(record[column])).join("\t"));
  }
  return lines.join("\n");
}

function collectColumns(records: Record<string, unknown>[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      keys.add(key);
    }
  }
  if (keys.size === 0) {
    return ["value"];
  }
  return Array.from(keys);
}

function formatTsvCell(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value.replace(/[\t\r\n]/g, " ");
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value).replace(/[\t\r\n]/g, " ");
}
