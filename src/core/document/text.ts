import { isRecord, readString } from "../utils/records.js";

export const BLOCK_NODE_TYPES = [
  "paragraph",
  "heading",
  "bulletList",
  "orderedList",
  "blockquote",
  "codeBlock",
  "mediaSingle",
  "rule",
] as const;

export type BlockNodeType = (typeof BLOCK_NODE_TYPES)[number];

type NodeBody = {
  text?: string;
  children: DocumentNode[];
};

/**
 * Structured document tree as served for long-form fields. Unknown node types
 * land in `other` and still contribute their text.
 */
export type DocumentNode =
  | (NodeBody & { kind: "block"; type: BlockNodeType })
  | (NodeBody & { kind: "listItem"; type: "listItem" })
  | (NodeBody & { kind: "other"; type: string });

export type PlainTextDocument = {
  type: "doc";
  version: 1;
  content: Array<{
    type: "paragraph";
    content: Array<{ type: "text"; text: string }>;
  }>;
};

const blockTypes: ReadonlySet<string> = new Set(BLOCK_NODE_TYPES);

function isBlockType(type: string): type is BlockNodeType {
  return blockTypes.has(type);
}

/** Returns undefined for anything that is not node-shaped. */
export function parseDocumentNode(value: unknown): DocumentNode | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const type = readString(value, "type") ?? "";
  const text = readString(value, "text");
  const children: DocumentNode[] = [];
  if (Array.isArray(value.content)) {
    for (const child of value.content) {
      const parsed = parseDocumentNode(child);
      if (parsed) {
        children.push(parsed);
      }
    }
  }

  if (type === "listItem") {
    return { kind: "listItem", type, text, children };
  }
  if (isBlockType(type)) {
    return { kind: "block", type, text, children };
  }
  return { kind: "other", type, text, children };
}

export function extractDocumentText(doc: unknown): string {
  if (doc === null || doc === undefined) {
    return "";
  }
  if (typeof doc === "string") {
    return doc;
  }

  const root = parseDocumentNode(doc);
  if (!root) {
    return "";
  }
  const parts: string[] = [];
  renderNode(root, parts);
  return parts.join("").trim();
}

function renderNode(node: DocumentNode, out: string[]): void {
  if (node.text !== undefined) {
    out.push(node.text);
  }

  node.children.forEach((child, index) => {
    renderNode(child, out);
    if (child.kind === "block" && index < node.children.length - 1) {
      out.push("\n");
    }
  });

  if (node.kind === "listItem") {
    out.push("\n");
  }
}

export function plainTextToDocument(text: string): PlainTextDocument {
  return {
    type: "doc",
    version: 1,
    content: [
      {
        type: "paragraph",
        content: [{ type: "text", text }],
      },
    ],
  };
}
