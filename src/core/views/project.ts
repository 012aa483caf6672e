import { JiraComment, JiraIssue, JiraNameField, JiraUser } from "../api/schemas.js";
import { PageResult } from "../pagination/accumulate.js";
import { extractDocumentText } from "../document/text.js";

export type IssueView = {
  key: string;
  summary: string;
  status: string;
  type: string;
  priority: string;
  assignee: string;
  created: string;
  updated: string;
  url: string;
};

export type CommentView = {
  author: string;
  body: string;
  created: string;
};

export type IssueDetailView = IssueView & {
  description: string;
  comments?: CommentView[];
};

export type IssueListView = {
  server: string;
  count: number;
  total: number;
  hasMore: boolean;
  issues: IssueView[];
};

// Millisecond or variable-precision fractional seconds, numeric UTC offset.
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?[+-](\d{2})(\d{2})$/;

export function browseUrl(server: string, key: string): string {
  return `${server}/browse/${key}`;
}

export function toIssueView(issue: JiraIssue, server: string): IssueView {
  const fields = issue.fields;
  return {
    key: issue.key,
    summary: fields.summary ?? "",
    status: nameOrEmpty(fields.status),
    type: nameOrEmpty(fields.issuetype),
    priority: nameOrEmpty(fields.priority),
    assignee: userEmail(fields.assignee),
    created: formatDate(fields.created),
    updated: formatDate(fields.updated),
    url: browseUrl(server, issue.key),
  };
}

export function toIssueViews(issues: readonly JiraIssue[], server: string): IssueView[] {
  return issues.map((issue) => toIssueView(issue, server));
}

export function toCommentView(comment: JiraComment): CommentView {
  return {
    author: userDisplayName(comment.author),
    body: extractDocumentText(comment.body),
    created: formatDate(comment.created),
  };
}

export function toIssueDetailView(issue: JiraIssue, server: string, comments: readonly JiraComment[]): IssueDetailView {
  const view: IssueDetailView = {
    ...toIssueView(issue, server),
    description: extractDocumentText(issue.fields.description),
  };
  if (comments.length > 0) {
    view.comments = comments.map(toCommentView);
  }
  return view;
}

export function toIssueListView(result: PageResult<JiraIssue>, server: string): IssueListView {
  const issues = toIssueViews(result.items, server);
  return {
    server,
    count: issues.length,
    total: result.totalAvailable,
    hasMore: result.hasMore,
    issues,
  };
}

/** Prefers the email address; used where an identity must be unambiguous. */
export function userEmail(user: JiraUser | null | undefined): string {
  if (!user) {
    return "";
  }
  return user.emailAddress || user.displayName || "";
}

export function userDisplayName(user: JiraUser | null | undefined): string {
  if (!user) {
    return "";
  }
  return user.displayName || user.emailAddress || "";
}

/**
 * Reduces a server timestamp to its calendar date. Never throws: anything
 * unparseable degrades to its first ten characters, or is returned as is
 * when shorter.
 */
export function formatDate(raw: string | null | undefined): string {
  if (!raw) {
    return "";
  }
  const match = TIMESTAMP_PATTERN.exec(raw);
  if (match && isValidTimestamp(match)) {
    return `${match[1]}-${match[2]}-${match[3]}`;
  }
  return raw.length >= 10 ? raw.slice(0, 10) : raw;
}

function isValidTimestamp(match: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second, offsetHour, offsetMinute] = match.slice(1).map(Number);
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return (
    day <= daysInMonth &&
    hour < 24 &&
    minute < 60 &&
    second < 60 &&
    offsetHour < 24 &&
    offsetMinute < 60
  );
}

function nameOrEmpty(field: JiraNameField | null | undefined): string {
  return field?.name ?? "";
}
