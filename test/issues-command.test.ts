import { describe, expect, it } from "vitest";
import {
  buildMineJql,
  renderAssignResult,
  renderIssueDetail,
  renderIssueList,
} from "../src/commands/issues.js";
import type { IssueListView, IssueView } from "../src/core/views/project.js";

function issueView(key: string, status: string, summary: string): IssueView {
  return {
    key,
    summary,
    status,
    type: "Task",
    priority: "Medium",
    assignee: "dev@example.com",
    created: "2024-01-02",
    updated: "2024-01-03",
    url: `https://example.atlassian.net/browse/${key}`,
  };
}

function listView(issues: IssueView[], total: number, hasMore: boolean): IssueListView {
  return { server: "https://example.atlassian.net", count: issues.length, total, hasMore, issues };
}

describe("buildMineJql", () => {
  it("lists everything assigned to the current user", () => {
    expect(buildMineJql()).toBe("assignee = currentUser() ORDER BY updated DESC");
  });

  it("quotes the status filter", () => {
    expect(buildMineJql("In Progress")).toBe(
      'assignee = currentUser() AND status = "In Progress" ORDER BY updated DESC'
    );
  });
});

describe("renderIssueList", () => {
  it("shows the partial count when more issues exist", () => {
    const view = listView([issueView("PROJ-1", "To Do", "First"), issueView("PROJ-12", "Done", "Second")], 5, true);

    expect(renderIssueList(view, "Issues", "No issues found.")).toBe(
      "Issues (2 of 5):\n- PROJ-1        [To Do]  First\n- PROJ-12       [Done]  Second\n"
    );
  });

  it("shows the plain count when everything was fetched", () => {
    const view = listView([issueView("PROJ-1", "To Do", "First")], 1, false);

    expect(renderIssueList(view, "Assigned issues", "No issues assigned to you.")).toBe(
      "Assigned issues (1):\n- PROJ-1        [To Do]  First\n"
    );
  });

  it("prints the empty message", () => {
    expect(renderIssueList(listView([], 0, false), "Issues", "No issues found.")).toBe("No issues found.\n");
  });
});

describe("renderIssueDetail", () => {
  it("includes description and comments", () => {
    const output = renderIssueDetail({
      ...issueView("PROJ-1", "To Do", "First"),
      description: "Line one",
      comments: [{ author: "Ann", body: "Seen it", created: "2024-01-04" }],
    });

    expect(output.split("\n")).toEqual([
      "Key:         PROJ-1",
      "Summary:     First",
      "Status:      To Do",
      "Type:        Task",
      "Priority:    Medium",
      "Assignee:    dev@example.com",
      "Created:     2024-01-02",
      "Updated:     2024-01-03",
      "URL:         https://example.atlassian.net/browse/PROJ-1",
      "",
      "Description:",
      "Line one",
      "",
      "Comments (1):",
      "",
      "  Ann (2024-01-04):",
      "  Seen it",
      "",
    ]);
  });
});

describe("renderAssignResult", () => {
  it("shows name and email when both are known", () => {
    expect(
      renderAssignResult({ key: "PROJ-1", assignee: "ann@example.com", assigneeName: "Ann", url: "u" })
    ).toBe("PROJ-1 assigned to Ann (ann@example.com)\n");
  });

  it("falls back to whichever identity exists", () => {
    expect(renderAssignResult({ key: "PROJ-1", assignee: "", assigneeName: "Ann", url: "u" })).toBe(
      "PROJ-1 assigned to Ann\n"
    );
    expect(renderAssignResult({ key: "PROJ-1", assignee: "ann@example.com", assigneeName: "", url: "u" })).toBe(
      "PROJ-1 assigned to ann@example.com\n"
    );
  });
});
