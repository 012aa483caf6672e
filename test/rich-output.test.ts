import { describe, expect, it } from "vitest";
import {
  assertRichOutputFileOption,
  isPrettyJson,
  normalizeRichOutputFormat,
  renderRichOutput,
} from "../src/core/output/rich.js";
import { CliError } from "../src/core/errors.js";

describe("rich output", () => {
  it("normalizes the format option", () => {
    expect(normalizeRichOutputFormat(undefined)).toBe("table");
    expect(normalizeRichOutputFormat(" TSV ")).toBe("tsv");
    expect(normalizeRichOutputFormat("table", true)).toBe("json");
    expect(() => normalizeRichOutputFormat("yaml")).toThrow(CliError);
  });

  it("requires a file format for --out", () => {
    expect(() => assertRichOutputFileOption("out.txt", "table")).toThrow(
      "`--out` requires --format tsv/json (or --json)."
    );
    expect(() => assertRichOutputFileOption("out.json", "json")).not.toThrow();
  });

  it("renders compact or pretty JSON", () => {
    expect(renderRichOutput({ key: "PROJ-1" }, "json")).toBe('{"key":"PROJ-1"}\n');
    expect(renderRichOutput({ key: "PROJ-1" }, "json", { pretty: true })).toBe('{\n  "key": "PROJ-1"\n}\n');
  });

  it("renders records as TSV with flattened cells", () => {
    const rows = [
      { key: "PROJ-1", summary: "tab\there" },
      { key: "PROJ-2", status: "Done" },
    ];

    expect(renderRichOutput(rows, "tsv")).toBe("key\tsummary\tstatus\nPROJ-1\ttab here\t\nPROJ-2\t\tDone\n");
  });

  it("reads the pretty JSON switch from the environment", () => {
    expect(isPrettyJson({ JIRACTL_JSON_PRETTY: "1" })).toBe(true);
    expect(isPrettyJson({})).toBe(false);
  });
});
