import { z } from "zod";

export const DEFAULT_TIMEOUT_MS = 30000;

export const ApiConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export const AuthConfigSchema = z.object({
  server: z.string().optional(),
  email: z.string().optional(),
  apiToken: z.string().optional(),
});

export const JiractlConfigSchema = z.object({
  version: z.literal(1).default(1),
  auth: AuthConfigSchema.default({}),
  api: ApiConfigSchema.default({
    timeoutMs: DEFAULT_TIMEOUT_MS,
  }),
});

export type JiractlConfig = z.infer<typeof JiractlConfigSchema>;

/**
 * Everything a request needs, resolved once per invocation and passed down
 * explicitly.
 */
export type JiraContext = {
  server: string;
  email: string;
  apiToken: string;
  timeoutMs: number;
};
