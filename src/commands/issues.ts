import { Command } from "commander";
import { loadAuthContext } from "../core/config/store.js";
import { withApiClient } from "../core/api/client.js";
import {
  addComment,
  applyTransition,
  assignIssue,
  getComments,
  getIssue,
  getTransitions,
  searchIssues,
  searchUsers,
} from "../core/api/issues.js";
import { matchTransition, MatchTier } from "../core/matching/transition.js";
import {
  browseUrl,
  IssueDetailView,
  IssueListView,
  toIssueDetailView,
  toIssueListView,
} from "../core/views/project.js";
import { emitResult, OutputOptions } from "../core/output/rich.js";
import { normalizeIssueKey, parsePositiveIntegerOption } from "../core/utils/options.js";
import { CliError } from "../core/errors.js";

const DEFAULT_ISSUE_LIMIT = 50;
const DEFAULT_COMMENT_LIMIT = 20;

type IssueMineOptions = OutputOptions & {
  limit: number;
  status?: string;
};

type IssueSearchOptions = OutputOptions & {
  jql: string;
  limit: number;
};

type IssueViewOptions = OutputOptions & {
  commentLimit: number;
};

type IssueTransitionOptions = OutputOptions & {
  status: string;
};

type IssueAssignOptions = OutputOptions & {
  email?: string;
};

type IssueCommentOptions = OutputOptions & {
  body: string;
};

export type TransitionResult = {
  key: string;
  status: string;
  matchedBy: MatchTier;
  warning?: string;
  url: string;
};

export type AssignResult = {
  key: string;
  assignee: string;
  assigneeName: string;
  url: string;
};

export type CommentResult = {
  key: string;
  comment: string;
  url: string;
};

export function registerIssuesCommand(program: Command): void {
  const issues = program.command("issues").description("Query and update issues");

  issues
    .command("mine")
    .description("List issues assigned to you")
    .option("-L, --limit <number>", "Maximum issues to return", parsePositiveIntegerOption, DEFAULT_ISSUE_LIMIT)
    .option("-s, --status <status>", "Filter by status (e.g. \"In Progress\")")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write issue list output to file")
    .option("--json", "Print JSON")
    .action(async (options: IssueMineOptions) => {
      const context = loadAuthContext();
      const jql = buildMineJql(options.status);
      const result = await withApiClient(context, (client) => searchIssues(client, jql, options.limit));
      const view = toIssueListView(result, context.server);
      emitResult({
        label: "issue list",
        payload: view,
        tsvData: view.issues,
        options,
        renderTable: () => renderIssueList(view, "Assigned issues", "No issues assigned to you."),
      });
    });

  issues
    .command("search")
    .description("Search issues with JQL")
    .requiredOption("--jql <query>", "JQL query string (e.g. \"project = PROJ\")")
    .option("-L, --limit <number>", "Maximum issues to return", parsePositiveIntegerOption, DEFAULT_ISSUE_LIMIT)
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write issue search output to file")
    .option("--json", "Print JSON")
    .action(async (options: IssueSearchOptions) => {
      if (!options.jql.trim()) {
        throw new CliError("--jql is required (e.g. --jql \"project = PROJ\")");
      }
      const context = loadAuthContext();
      const result = await withApiClient(context, (client) => searchIssues(client, options.jql, options.limit));
      const view = toIssueListView(result, context.server);
      emitResult({
        label: "issue search",
        payload: view,
        tsvData: view.issues,
        options,
        renderTable: () => renderIssueList(view, "Issues", "No issues found."),
      });
    });

  issues
    .command("view")
    .description("View a single issue by key")
    .argument("<issueKey>", "Issue key (e.g. PROJ-123)")
    .option("--comment-limit <number>", "Maximum comments to return", parsePositiveIntegerOption, DEFAULT_COMMENT_LIMIT)
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write issue view output to file")
    .option("--json", "Print JSON")
    .action(async (issueKey: string, options: IssueViewOptions) => {
      const key = normalizeIssueKey(issueKey);
      const context = loadAuthContext();
      const view = await withApiClient(context, async (client) => {
        const issue = await getIssue(client, key);
        const comments = await getComments(client, key, options.commentLimit);
        return toIssueDetailView(issue, context.server, comments);
      });
      emitResult({
        label: "issue view",
        payload: view,
        options,
        renderTable: () => renderIssueDetail(view),
      });
    });

  issues
    .command("transition")
    .description("Change issue status")
    .argument("<issueKey>", "Issue key (e.g. PROJ-123)")
    .requiredOption("--status <name>", "Target status or transition name; exact, prefix and substring matches are accepted")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write issue transition output to file")
    .option("--json", "Print JSON")
    .action(async (issueKey: string, options: IssueTransitionOptions) => {
      const key = normalizeIssueKey(issueKey);
      const context = loadAuthContext();
      const outcome = await withApiClient(context, async (client) => {
        const transitions = await getTransitions(client, key);
        const matched = matchTransition(transitions, options.status);
        await applyTransition(client, key, matched.selected.id);
        return matched;
      });

      const result: TransitionResult = {
        key,
        status: outcome.selected.name,
        matchedBy: outcome.matchedBy,
        url: browseUrl(context.server, key),
      };
      if (outcome.ambiguityWarning) {
        result.warning = outcome.ambiguityWarning;
      }
      emitResult({
        label: "issue transition",
        payload: result,
        options,
        renderTable: () => {
          if (result.warning) {
            process.stderr.write(`warning: ${result.warning}\n`);
          }
          return `${result.key} transitioned to ${result.status}\n`;
        },
      });
    });

  issues
    .command("assign")
    .description("Reassign an issue")
    .argument("<issueKey>", "Issue key (e.g. PROJ-123)")
    .option("--email <email>", "Assignee email (defaults to the reporter)")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write issue assign output to file")
    .option("--json", "Print JSON")
    .action(async (issueKey: string, options: IssueAssignOptions) => {
      const key = normalizeIssueKey(issueKey);
      const context = loadAuthContext();
      const result = await withApiClient(context, async (client): Promise<AssignResult> => {
        const assignee = options.email
          ? (await searchUsers(client, options.email))[0]
          : (await getIssue(client, key)).fields.reporter;
        const accountId = assignee?.accountId;
        if (!assignee || !accountId) {
          throw new CliError(
            options.email
              ? `no user found for ${JSON.stringify(options.email)}`
              : "issue has no reporter; use --email to specify an assignee"
          );
        }
        await assignIssue(client, key, accountId);
        return {
          key,
          assignee: assignee.emailAddress ?? "",
          assigneeName: assignee.displayName ?? "",
          url: browseUrl(context.server, key),
        };
      });
      emitResult({
        label: "issue assign",
        payload: result,
        options,
        renderTable: () => renderAssignResult(result),
      });
    });

  issues
    .command("comment")
    .description("Add a comment to an issue")
    .argument("<issueKey>", "Issue key (e.g. PROJ-123)")
    .requiredOption("--body <text>", "Comment text")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write issue comment output to file")
    .option("--json", "Print JSON")
    .action(async (issueKey: string, options: IssueCommentOptions) => {
      if (!options.body.trim()) {
        throw new CliError("--body is required");
      }
      const key = normalizeIssueKey(issueKey);
      const context = loadAuthContext();
      await withApiClient(context, (client) => addComment(client, key, options.body));
      const result: CommentResult = {
        key,
        comment: options.body,
        url: browseUrl(context.server, key),
      };
      emitResult({
        label: "issue comment",
        payload: result,
        options,
        renderTable: () => `Comment added to ${result.key}\n`,
      });
    });
}

export function buildMineJql(status?: string): string {
  const trimmed = status?.trim();
  if (!trimmed) {
    return "assignee = currentUser() ORDER BY updated DESC";
  }
  return `assignee = currentUser() AND status = ${JSON.stringify(trimmed)} ORDER BY updated DESC`;
}

export function renderIssueList(view: IssueListView, heading: string, emptyMessage: string): string {
  if (view.issues.length === 0) {
    return `${emptyMessage}\n`;
  }
  const title =
    view.total > view.count || view.hasMore
      ? `${heading} (${view.count} of ${view.total}):`
      : `${heading} (${view.count}):`;
  const lines = [title, ...view.issues.map((issue) => `- ${issue.key.padEnd(12)}  [${issue.status}]  ${issue.summary}`)];
  return `${lines.join("\n")}\n`;
}

export function renderIssueDetail(view: IssueDetailView): string {
  const lines = [
    `Key:         ${view.key}`,
    `Summary:     ${view.summary}`,
    `Status:      ${view.status}`,
    `Type:        ${view.type}`,
    `Priority:    ${view.priority}`,
    `Assignee:    ${view.assignee}`,
    `Created:     ${view.created}`,
    `Updated:     ${view.updated}`,
    `URL:         ${view.url}`,
  ];
  if (view.description) {
    lines.push("", "Description:", view.description);
  }
  if (view.comments && view.comments.length > 0) {
    lines.push("", `Comments (${view.comments.length}):`);
    for (const comment of view.comments) {
      lines.push("", `  ${comment.author} (${comment.created}):`, `  ${comment.body}`);
    }
  }
  return `${lines.join("\n")}\n`;
}

export function renderAssignResult(result: AssignResult): string {
  if (result.assigneeName && result.assignee) {
    return `${result.key} assigned to ${result.assigneeName} (${result.assignee})\n`;
  }
  return `${result.key} assigned to ${result.assigneeName || result.assignee}\n`;
}
