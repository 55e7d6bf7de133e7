import type { Commander, CommanderState } from "../commander.js";
import type { NodeStatus, TaskNode, TaskNodeKind } from "./types.js";

export type NodeSnapshot = {
  id: string;
  name: string;
  kind: TaskNodeKind;
  status: NodeStatus;
  result?: unknown;
  error?: string;
  startedAt?: number;
  endedAt?: number;
  children: NodeSnapshot[];
};

export type TreeSnapshot = {
  id: string;
  name: string;
  state: CommanderState;
  roots: NodeSnapshot[];
};

/** Every node under `nodes`, parents before children, siblings in submission order. */
export function walk(nodes: readonly TaskNode[]): TaskNode[] {
  const out: TaskNode[] = [];
  const visit = (node: TaskNode): void => {
    out.push(node);
    for (const child of node.children) visit(child);
  };
  for (const node of nodes) visit(node);
  return out;
}

export function snapshotNode(node: TaskNode): NodeSnapshot {
  const snap: NodeSnapshot = {
    id: node.id,
    name: node.name,
    kind: node.kind,
    status: node.status,
    children: node.children.map(snapshotNode),
  };
  if (node.status === "completed") snap.result = node.result;
  if (node.error) snap.error = node.error.message;
  if (node.startedAt !== undefined) snap.startedAt = node.startedAt;
  if (node.endedAt !== undefined) snap.endedAt = node.endedAt;
  return snap;
}

export function snapshot(commander: Commander): TreeSnapshot {
  return {
    id: commander.id,
    name: commander.name,
    state: commander.state,
    roots: commander.children.map(snapshotNode),
  };
}

/**
 * Render the tree as text:
 *
 * ```
 * commander main [resolved]
 * ├── job A [completed]
 * │   └── handler B [failed: boom]
 * └── handler C [completed]
 * ```
 */
export function formatTree(commander: Commander): string {
  const lines = [`commander ${commander.name} [${commander.state}]`];
  const render = (nodes: readonly TaskNode[], indent: string): void => {
    nodes.forEach((node, i) => {
      const last = i === nodes.length - 1;
      lines.push(`${indent}${last ? "└── " : "├── "}${describeNode(node)}`);
      render(node.children, indent + (last ? "    " : "│   "));
    });
  };
  render(commander.children, "");
  return lines.join("\n");
}

function describeNode(node: TaskNode): string {
  const status = node.error ? `failed: ${node.error.message}` : node.status;
  return `${node.kind} ${node.name} [${status}]`;
}
