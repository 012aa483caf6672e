import { TransportError } from "../errors.js";
import { JiraContext } from "../config/schema.js";
import { isRecord } from "../utils/records.js";

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

type RequestOptions = {
  method?: HttpMethod;
  query?: Record<string, unknown>;
  body?: unknown;
  expectStatus?: number;
};

const USER_AGENT = "jiractl/0.1.0";

export class JiraApiClient {
  constructor(private readonly context: JiraContext) {}

  async get(path: string, query?: Record<string, unknown>): Promise<unknown> {
    return this.request(path, { method: "GET", query });
  }

  async post(path: string, body?: unknown, expectStatus?: number): Promise<unknown> {
    return this.request(path, { method: "POST", body, expectStatus });
  }

  async put(path: string, body?: unknown, expectStatus?: number): Promise<unknown> {
    return this.request(path, { method: "PUT", body, expectStatus });
  }

  async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = buildUrl(this.context.server, path, options.query ?? {});
    const method = options.method ?? "GET";
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.context.timeoutMs);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          "Accept": "application/json",
          "Content-Type": "application/json",
          "Authorization": buildBasicAuthHeader(this.context.email, this.context.apiToken),
          "User-Agent": USER_AGENT,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });

      const text = await response.text();
      const ok = options.expectStatus === undefined ? response.ok : response.status === options.expectStatus;
      if (!ok) {
        const details = parseErrorBody(text);
        throw new TransportError(buildHttpErrorMessage(response.status, response.statusText, details), response.status);
      }
      return parseResponseBody(response, text);
    } catch (error) {
      throw normalizeRequestError(error, this.context.timeoutMs);
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function withApiClient<T>(context: JiraContext, action: (client: JiraApiClient) => Promise<T>): Promise<T> {
  const client = new JiraApiClient(context);
  return action(client);
}

export function buildBasicAuthHeader(email: string, apiToken: string): string {
  return `Basic ${Buffer.from(`${email}:${apiToken}`).toString("base64")}`;
}

function buildUrl(baseUrl: string, path: string, query: Record<string, unknown>): string {
  const normalizedBase = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  const url = new URL(`${normalizedBase}${normalizedPath}`);

  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null || value === "") {
      continue;
    }
    url.searchParams.append(key, String(value));
  }

  return url.toString();
}

function parseResponseBody(response: Response, text: string): unknown {
  if (!text.trim()) {
    return undefined;
  }
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("application/json")) {
    return text;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TransportError(`failed to decode jira api response: ${String(error)}`, response.status, error);
  }
}

// Error bodies are not trusted to match their content type.
function parseErrorBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Jira reports failures as `{errorMessages: [...], errors: {field: message}}`;
 * fall back to the raw body, then the status text.
 */
export function extractErrorDetails(body: unknown): string | undefined {
  if (typeof body === "string") {
    const trimmed = body.trim();
    return trimmed || undefined;
  }
  if (!isRecord(body)) {
    return undefined;
  }

  const messages: string[] = [];
  if (Array.isArray(body.errorMessages)) {
    for (const message of body.errorMessages) {
      if (typeof message === "string" && message.trim()) {
        messages.push(message);
      }
    }
  }
  if (isRecord(body.errors)) {
    for (const [field, message] of Object.entries(body.errors)) {
      if (typeof message === "string") {
        messages.push(`${field}: ${message}`);
      }
    }
  }
  if (messages.length) {
    return messages.join("; ");
  }
  return JSON.stringify(body);
}

function buildHttpErrorMessage(status: number, statusText: string, body: unknown): string {
  const statusLine = statusText ? `${status} ${statusText}` : String(status);
  const details = extractErrorDetails(body) ?? statusLine;
  return `jira api error (${statusLine}): ${details}`;
}

function normalizeRequestError(error: unknown, timeoutMs: number): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new TransportError(`jira api request timed out after ${timeoutMs}ms`, undefined, error);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportError(`jira api request failed: ${reason}`, undefined, error);
}
