import { Command } from "commander";
import { getByPath } from "../core/utils/object-path.js";
import { getConfigPath, loadConfig, maskToken } from "../core/config/store.js";
import { JiractlConfig } from "../core/config/schema.js";
import { emitResult, OutputOptions } from "../core/output/rich.js";

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command("config").description("Inspect jiractl configuration");

  configCommand
    .command("path")
    .description("Print config file path")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config path output to file")
    .option("--json", "Print JSON")
    .action((options: OutputOptions) => {
      const configPath = getConfigPath();
      emitResult({
        label: "config path",
        payload: { path: configPath },
        options,
        renderTable: () => `${configPath}\n`,
      });
    });

  configCommand
    .command("get")
    .description("Get full config or one value by dotted path (token is masked)")
    .argument("[key]", "Dotted key path, e.g. auth.server")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config get output to file")
    .option("--json", "Print JSON")
    .action((key: string | undefined, options: OutputOptions) => {
      const masked = maskConfig(loadConfig());
      const result = key ? getByPath(masked, key) : masked;
      emitResult({
        label: "config get",
        payload: result ?? null,
        options,
        renderTable: () => `${typeof result === "string" ? result : JSON.stringify(result ?? null, null, 2)}\n`,
      });
    });
}

export function maskConfig(config: JiractlConfig): JiractlConfig {
  return {
    ...config,
    auth: {
      ...config.auth,
      apiToken: config.auth.apiToken ? maskToken(config.auth.apiToken) : undefined,
    },
  };
}
