/** Node labels of the workflow graph. */
export const NODE_LABELS = ["Workflow", "Task", "Tool"] as const;
export type NodeLabel = (typeof NODE_LABELS)[number];

export type RelationshipType = "CONTAINS" | "USES";

/** Labels each relationship type connects, as [from, to]. */
export const RELATIONSHIP_ENDPOINTS: Record<RelationshipType, readonly [NodeLabel, NodeLabel]> = {
  CONTAINS: ["Workflow", "Task"],
  USES: ["Task", "Tool"],
};

export type PropertyValue = string | number | boolean | null;
export type NodeProperties = Record<string, PropertyValue>;

export interface GraphNode {
  id: string;
  label: NodeLabel;
  key: string;
  properties: NodeProperties;
  embedding: number[] | null;
  createdAt: string;
  updatedAt: string;
}

export interface RelationshipProperties {
  /** Required for CONTAINS, ignored for USES. */
  order?: number;
}

export interface ToolEntity {
  id: string;
  name: string;
  description: string;
  /** Opaque reference the tool registry resolves to an Invocable. */
  callable: string;
  embedding: number[] | null;
  createdAt: string;
  updatedAt: string;
}

export interface TaskEntity {
  id: string;
  name: string;
  description: string;
  /** Tool name given at creation; the USES edge is authoritative at run time. */
  toolName: string;
  embedding: number[] | null;
  createdAt: string;
  updatedAt: string;
}

export interface WorkflowEntity {
  id: string;
  name: string;
  description: string;
  embedding: number[] | null;
  createdAt: string;
  updatedAt: string;
}

export interface EntityByLabel {
  Workflow: WorkflowEntity;
  Task: TaskEntity;
  Tool: ToolEntity;
}

export type GraphEntity = EntityByLabel[NodeLabel];

export interface OrderedTask {
  order: number;
  task: TaskEntity;
}

export interface ScoredKey {
  key: string;
  /** Normalized to [0, 1]. */
  score: number;
}

/**
 * Query contract of the graph backend.
 *
 * Writes are idempotent on (label, key). Missing keys raise NotFoundError,
 * broken uniqueness raises ConstraintViolationError.
 */
export interface GraphStore {
  upsertNode(label: NodeLabel, key: string, properties: NodeProperties): GraphNode;
  upsertRelationship(
    fromKey: string,
    toKey: string,
    type: RelationshipType,
    properties?: RelationshipProperties,
  ): void;
  getOrderedTasks(workflowName: string): OrderedTask[];
  getToolForTask(taskName: string): ToolEntity;
  queryByEmbeddingSimilarity(label: NodeLabel, vector: number[], topK: number): ScoredKey[];
  queryByFulltext(label: NodeLabel, text: string, topK: number): ScoredKey[];

  getNode(label: NodeLabel, key: string): GraphNode | undefined;
  getEntity<L extends NodeLabel>(label: L, key: string): EntityByLabel[L] | undefined;
  listEntities<L extends NodeLabel>(label: L): EntityByLabel[L][];
  countNodes(label: NodeLabel): number;
  deleteNode(label: NodeLabel, key: string): boolean;

  writeEmbedding(label: NodeLabel, key: string, vector: number[] | null): void;
  writeFulltext(label: NodeLabel, key: string, text: string): void;

  removeRelationships(fromKey: string, type: RelationshipType, toKey?: string): number;
  insertContainsAt(workflowName: string, taskName: string, order: number): void;
  getWorkflowsContaining(taskName: string): Array<{ workflow: string; order: number }>;
  getTasksUsing(toolName: string): string[];

  transaction<T>(fn: () => T): T;
  close(): void;
}
