import { Command } from "commander";
import {
  firstNonEmpty,
  getConfigPath,
  loadAuthContext,
  loadConfig,
  maskToken,
  normalizeServerUrl,
  removeConfig,
  updateConfig,
} from "../core/config/store.js";
import { withApiClient } from "../core/api/client.js";
import { getMyself } from "../core/api/issues.js";
import { emitResult, OutputOptions } from "../core/output/rich.js";
import { CliError } from "../core/errors.js";

type LoginOptions = OutputOptions & {
  server?: string;
  email?: string;
  token?: string;
};

export function registerAuthCommand(program: Command): void {
  const auth = program.command("auth").description("Manage Jira Cloud credentials for jiractl");

  auth
    .command("login")
    .description("Verify and save Jira Cloud credentials")
    .option("--server <url>", "Jira Cloud server URL (e.g. https://company.atlassian.net)")
    .option("--email <email>", "Jira account email")
    .option("--token <token>", "Jira API token")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write auth login output to file")
    .option("--json", "Print JSON")
    .action(async (options: LoginOptions) => {
      const server = firstNonEmpty(options.server, process.env.JIRACTL_SERVER);
      if (!server) {
        throw new CliError("--server is required (or set JIRACTL_SERVER)");
      }
      const email = firstNonEmpty(options.email, process.env.JIRACTL_EMAIL);
      if (!email) {
        throw new CliError("--email is required (or set JIRACTL_EMAIL)");
      }
      const apiToken = firstNonEmpty(options.token, process.env.JIRACTL_API_TOKEN);
      if (!apiToken) {
        throw new CliError("--token is required (or set JIRACTL_API_TOKEN)");
      }

      const config = loadConfig();
      const context = {
        server: normalizeServerUrl(server),
        email,
        apiToken,
        timeoutMs: config.api.timeoutMs,
      };
      const user = await withApiClient(context, (client) => getMyself(client));

      updateConfig((current) => ({ ...current, auth: { server: context.server, email, apiToken } }));

      const displayName = user.displayName ?? "";
      emitResult({
        label: "auth login",
        payload: {
          saved: true,
          configPath: getConfigPath(),
          server: context.server,
          email,
          displayName,
          token: maskToken(apiToken),
        },
        options,
        renderTable: () => `Authenticated as ${displayName} (${email}) on ${context.server}\n`,
      });
    });

  auth
    .command("status")
    .description("Show current auth status")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write auth status output to file")
    .option("--json", "Print JSON")
    .action((options: OutputOptions) => {
      const context = loadAuthContext();
      emitResult({
        label: "auth status",
        payload: {
          authenticated: true,
          server: context.server,
          email: context.email,
          token: maskToken(context.apiToken),
        },
        options,
        renderTable: () =>
          [
            "Authenticated: yes",
            `Server:        ${context.server}`,
            `Email:         ${context.email}`,
            "",
          ].join("\n"),
      });
    });

  auth
    .command("logout")
    .description("Remove stored credentials")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write auth logout output to file")
    .option("--json", "Print JSON")
    .action((options: OutputOptions) => {
      const removed = removeConfig();
      emitResult({
        label: "auth logout",
        payload: {
          removed,
          configPath: getConfigPath(),
        },
        options,
        renderTable: () => (removed ? "Logged out. Config removed.\n" : "Already logged out.\n"),
      });
    });
}
