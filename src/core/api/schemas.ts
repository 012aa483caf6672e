import { z } from "zod";
import { TransportError } from "../errors.js";

export const JiraNameFieldSchema = z.object({
  name: z.string().nullish(),
});

export const JiraUserSchema = z.object({
  accountId: z.string().nullish(),
  emailAddress: z.string().nullish(),
  displayName: z.string().nullish(),
  active: z.boolean().nullish(),
});

export const JiraIssueFieldsSchema = z.object({
  summary: z.string().nullish(),
  description: z.unknown(),
  status: JiraNameFieldSchema.nullish(),
  issuetype: JiraNameFieldSchema.nullish(),
  priority: JiraNameFieldSchema.nullish(),
  assignee: JiraUserSchema.nullish(),
  reporter: JiraUserSchema.nullish(),
  created: z.string().nullish(),
  updated: z.string().nullish(),
  labels: z.array(z.string()).nullish(),
  components: z.array(JiraNameFieldSchema).nullish(),
});

export const JiraIssueSchema = z.object({
  key: z.string(),
  self: z.string().nullish(),
  fields: JiraIssueFieldsSchema.default({}),
});

export const JiraSearchResponseSchema = z.object({
  total: z.number().int().nonnegative().nullish(),
  issues: z.array(JiraIssueSchema).default([]),
  nextPageToken: z.string().nullish(),
});

export const JiraCommentSchema = z.object({
  author: JiraUserSchema.nullish(),
  body: z.unknown(),
  created: z.string().nullish(),
  updated: z.string().nullish(),
});

export const JiraCommentsResponseSchema = z.object({
  comments: z.array(JiraCommentSchema).default([]),
  total: z.number().nullish(),
});

export const JiraTransitionSchema = z.object({
  id: z.string(),
  name: z.string(),
  to: JiraNameFieldSchema.nullish(),
});

export const JiraTransitionsResponseSchema = z.object({
  transitions: z.array(JiraTransitionSchema).default([]),
});

export const JiraUserListSchema = z.array(JiraUserSchema);

export type JiraNameField = z.infer<typeof JiraNameFieldSchema>;
export type JiraUser = z.infer<typeof JiraUserSchema>;
export type JiraIssue = z.infer<typeof JiraIssueSchema>;
export type JiraComment = z.infer<typeof JiraCommentSchema>;

export function decodeResponse<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? first.path.join(".") : "(root)";
    const message = first ? first.message : "invalid value";
    throw new TransportError(`failed to decode ${what}: ${where}: ${message}`, undefined, parsed.error);
  }
  return parsed.data;
}
