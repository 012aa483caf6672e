#!/usr/bin/env node
import { Command } from "commander";
import { registerAuthCommand } from "./commands/auth.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerIssuesCommand } from "./commands/issues.js";
import { CliError } from "./core/errors.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("jiractl")
  .description("jiractl - Jira Cloud CLI with compact, agent-friendly output")
  .version(VERSION, "-v, --version");

registerAuthCommand(program);
registerIssuesCommand(program);
registerConfigCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CliError) {
    process.stderr.write(`Error: ${error.message}\n`);
    process.exit(1);
  }

  if (error instanceof Error) {
    process.stderr.write(`Error: ${error.message}\n`);
    process.exit(1);
  }

  process.stderr.write(`Error: ${String(error)}\n`);
  process.exit(1);
});
