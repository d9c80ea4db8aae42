import type { NodeId } from "./types";

/**
 * A story pack problem found by validation.
 * Errors abort loading; warnings are only reported.
 */
export type ValidationIssue = {
  type: "error" | "warning";
  message: string;
  path?: string;
};

/**
 * Navigation reached a node id the story pack does not define.
 * Always an authoring bug: the session cannot continue.
 */
export class UnknownNodeError extends Error {
  readonly nodeId: NodeId;

  constructor(nodeId: NodeId) {
    super(`Node not found: ${nodeId}`);
    this.name = "UnknownNodeError";
    this.nodeId = nodeId;
  }
}

/**
 * The story pack failed semantic validation
 */
export class ContentError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => (i.path ? `${i.message} (${i.path})` : i.message)).join("; ");
    super(`Invalid story pack: ${summary}`);
    this.name = "ContentError";
    this.issues = issues;
  }
}
