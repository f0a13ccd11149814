import type { EntityByLabel, NodeLabel, TaskEntity, ToolEntity, WorkflowEntity } from "../graph/types.js";
import type { SearchHit } from "../retrieval/engine.js";

export interface CreateToolInput {
  name: string;
  description: string;
  /** Registry key of the implementation. Defaults to the tool name. */
  callable?: string;
}

export interface CreateTaskInput {
  name: string;
  description: string;
  toolName: string;
}

export interface WorkflowTaskRef {
  name: string;
  order: number;
}

export interface CreateWorkflowInput {
  name: string;
  description: string;
  tasks: WorkflowTaskRef[];
}

export interface TaskDetails {
  task: TaskEntity;
  /** null when the task's tool was deleted */
  tool: ToolEntity | null;
  workflows: Array<{ workflow: string; order: number }>;
}

export interface WorkflowStep {
  order: number;
  name: string;
  description: string;
  toolName: string;
}

export interface WorkflowDetails {
  workflow: WorkflowEntity;
  tasks: WorkflowStep[];
}

/** Relations attached to a search hit, by kind of entity found. */
export interface SearchDetailsByLabel {
  Workflow: {
    /** In execution order */
    tasks: WorkflowStep[];
  };
  Task: {
    /** null when the task's tool was deleted */
    toolName: string | null;
    workflows: Array<{ workflow: string; order: number }>;
  };
  Tool: {
    usedByTasks: string[];
  };
}

export type SearchResult<L extends NodeLabel> = SearchHit<EntityByLabel[L]> & {
  details: SearchDetailsByLabel[L];
};
