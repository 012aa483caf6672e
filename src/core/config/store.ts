import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { JiraContext, JiractlConfig, JiractlConfigSchema } from "./schema.js";
import { CliError } from "../errors.js";

const CONFIG_DIR_NAME = "jiractl";
const CONFIG_FILE_NAME = "config.json";

type Env = NodeJS.ProcessEnv;

export function getConfigDir(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === "win32") {
    const appData = env.APPDATA?.trim();
    return path.join(appData || path.join(os.homedir(), "AppData", "Roaming"), CONFIG_DIR_NAME);
  }
  const xdg = env.XDG_CONFIG_HOME?.trim();
  return path.join(xdg || path.join(os.homedir(), ".config"), CONFIG_DIR_NAME);
}

export function getConfigPath(env: Env = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILE_NAME);
}

export function getDefaultConfig(): JiractlConfig {
  return JiractlConfigSchema.parse({});
}

export function loadConfig(env: Env = process.env): JiractlConfig {
  const configPath = getConfigPath(env);
  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  let rawParsed: unknown;
  try {
    rawParsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new CliError(`Invalid config JSON at ${configPath}. Fix the file or run \`jiractl auth logout\` to reset it.`, error);
  }

  try {
    return JiractlConfigSchema.parse(rawParsed);
  } catch (error) {
    throw new CliError(`Invalid config format: ${formatConfigValidationError(error)}`, error);
  }
}

export function saveConfig(config: JiractlConfig, env: Env = process.env): void {
  const validated = JiractlConfigSchema.parse(config);
  writeConfigFile(validated, env);
}

export function updateConfig(mutator: (config: JiractlConfig) => JiractlConfig, env: Env = process.env): JiractlConfig {
  const current = loadConfig(env);
  const next = mutator(current);
  saveConfig(next, env);
  return next;
}

/** Returns false when there was nothing to remove. */
export function removeConfig(env: Env = process.env): boolean {
  const configPath = getConfigPath(env);
  if (!fs.existsSync(configPath)) {
    return false;
  }
  fs.rmSync(configPath);
  return true;
}

/**
 * Environment variables win over the stored file. Fails when any of server,
 * email or token is still missing afterwards.
 */
export function resolveAuthContext(config: JiractlConfig, env: Env = process.env): JiraContext {
  const server = firstNonEmpty(env.JIRACTL_SERVER, config.auth.server);
  const email = firstNonEmpty(env.JIRACTL_EMAIL, config.auth.email);
  const apiToken = firstNonEmpty(env.JIRACTL_API_TOKEN, config.auth.apiToken);

  if (!server || !email || !apiToken) {
    throw new CliError("not authenticated; run: jiractl auth login --server URL --email EMAIL");
  }

  return {
    server: normalizeServerUrl(server),
    email,
    apiToken,
    timeoutMs: config.api.timeoutMs,
  };
}

export function loadAuthContext(env: Env = process.env): JiraContext {
  return resolveAuthContext(loadConfig(env), env);
}

export function normalizeServerUrl(server: string): string {
  return server.trim().replace(/\/+$/, "");
}

export function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
}

export function maskToken(token?: string): string {
  if (!token) {
    return "(not set)";
  }
  if (token.length <= 8) {
    return "*".repeat(token.length);
  }
  return `${token.slice(0, 4)}${"*".repeat(token.length - 8)}${token.slice(-4)}`;
}

function formatConfigValidationError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const first = error.issues[0];
    if (first) {
      const where = first.path.length > 0 ? first.path.join(".") : "(root)";
      return `${where}: ${first.message}`;
    }
  }
  return "schema validation failed";
}

function writeConfigFile(config: JiractlConfig, env: Env): void {
  const dir = getConfigDir(env);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  fs.writeFileSync(getConfigPath(env), `${JSON.stringify(config, null, 2)}\n`, { encoding: "utf-8", mode: 0o600 });
}
