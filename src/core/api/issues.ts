import { JiraApiClient } from "./client.js";
import {
  JiraComment,
  JiraCommentsResponseSchema,
  JiraIssue,
  JiraIssueSchema,
  JiraSearchResponseSchema,
  JiraTransitionsResponseSchema,
  JiraUser,
  JiraUserListSchema,
  JiraUserSchema,
  decodeResponse,
} from "./schemas.js";
import { Page, PageResult, accumulatePages } from "../pagination/accumulate.js";
import { Transition } from "../matching/transition.js";
import { plainTextToDocument } from "../document/text.js";

const LIST_FIELDS = "summary,status,issuetype,priority,assignee,reporter,created,updated,labels,components";
const DETAIL_FIELDS = "summary,description,status,issuetype,priority,assignee,reporter,created,updated,labels,components";

function issuePath(issueKey: string, suffix = ""): string {
  return `/rest/api/3/issue/${encodeURIComponent(issueKey)}${suffix}`;
}

export async function getMyself(client: JiraApiClient): Promise<JiraUser> {
  const body = await client.get("/rest/api/3/myself");
  return decodeResponse(JiraUserSchema, body, "current user");
}

export async function searchIssuesPage(
  client: JiraApiClient,
  jql: string,
  maxResults: number,
  nextPageToken?: string
): Promise<Page<JiraIssue>> {
  const body = await client.get("/rest/api/3/search/jql", {
    jql,
    maxResults,
    fields: LIST_FIELDS,
    nextPageToken,
  });
  const response = decodeResponse(JiraSearchResponseSchema, body, "search response");
  return {
    items: response.issues,
    total: response.total ?? undefined,
    nextCursor: response.nextPageToken ?? undefined,
  };
}

export async function searchIssues(client: JiraApiClient, jql: string, limit: number): Promise<PageResult<JiraIssue>> {
  return accumulatePages(
    (query, maxCount, cursor) => searchIssuesPage(client, query, maxCount, cursor),
    jql,
    limit
  );
}

export async function getIssue(client: JiraApiClient, issueKey: string): Promise<JiraIssue> {
  const body = await client.get(issuePath(issueKey), { fields: DETAIL_FIELDS });
  return decodeResponse(JiraIssueSchema, body, `issue ${issueKey}`);
}

export async function getComments(client: JiraApiClient, issueKey: string, limit: number): Promise<JiraComment[]> {
  const body = await client.get(issuePath(issueKey, "/comment"), {
    orderBy: "-created",
    maxResults: limit,
  });
  return decodeResponse(JiraCommentsResponseSchema, body, `comments of ${issueKey}`).comments;
}

export async function getTransitions(client: JiraApiClient, issueKey: string): Promise<Transition[]> {
  const body = await client.get(issuePath(issueKey, "/transitions"));
  const response = decodeResponse(JiraTransitionsResponseSchema, body, `transitions of ${issueKey}`);
  return response.transitions.map((transition) => {
    const targetStatusName = transition.to?.name ?? undefined;
    return targetStatusName
      ? { id: transition.id, name: transition.name, targetStatusName }
      : { id: transition.id, name: transition.name };
  });
}

export async function applyTransition(client: JiraApiClient, issueKey: string, transitionId: string): Promise<void> {
  await client.post(issuePath(issueKey, "/transitions"), { transition: { id: transitionId } }, 204);
}

export async function searchUsers(client: JiraApiClient, query: string): Promise<JiraUser[]> {
  const body = await client.get("/rest/api/3/user/search", { query });
  return decodeResponse(JiraUserListSchema, body, "user search response");
}

export async function assignIssue(client: JiraApiClient, issueKey: string, accountId: string): Promise<void> {
  await client.put(issuePath(issueKey, "/assignee"), { accountId }, 204);
}

export async function addComment(client: JiraApiClient, issueKey: string, text: string): Promise<void> {
  await client.post(issuePath(issueKey, "/comment"), { body: plainTextToDocument(text) }, 201);
}
