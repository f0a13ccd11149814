import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

import { SqliteGraphStore, segmentIdeographs, toFulltextQuery } from "./store.js";
import {
  ConstraintViolationError,
  NotFoundError,
  ValidationError,
  WorkflowNotFoundError,
} from "../errors.js";

describe("SqliteGraphStore", () => {
  let store: SqliteGraphStore;

  beforeEach(() => {
    store = new SqliteGraphStore({ path: ":memory:", dimensions: 4 });
  });

  afterEach(() => {
    store.close();
  });

  function addTool(name: string): void {
    store.upsertNode("Tool", name, { description: `${name} tool`, callable: name });
  }

  function addTask(name: string, tool: string): void {
    store.upsertNode("Task", name, { description: `${name} task`, toolName: tool });
    store.upsertRelationship(name, tool, "USES");
  }

  function countRelationships(type: string): number {
    const row = store
      .getDb()
      .prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM relationships WHERE type = ?")
      .get(type);
    return row?.count ?? 0;
  }

  // ---------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------
  it("upsertNode creates a node and updates it in place on the same name", () => {
    const first = store.upsertNode("Workflow", "etl", { description: "old" });
    const second = store.upsertNode("Workflow", "etl", { description: "new" });

    expect(second.id).toBe(first.id);
    expect(second.properties.description).toBe("new");
    expect(store.countNodes("Workflow")).toBe(1);
  });

  it("upsertNode merges properties rather than replacing them", () => {
    store.upsertNode("Tool", "adder", { description: "adds", callable: "add" });
    store.upsertNode("Tool", "adder", { description: "adds numbers" });

    const tool = store.getEntity("Tool", "adder");
    expect(tool?.description).toBe("adds numbers");
    expect(tool?.callable).toBe("add");
  });

  it("keeps names unique per label only", () => {
    store.upsertNode("Task", "shared", { description: "a task" });
    store.upsertNode("Tool", "shared", { description: "a tool" });

    expect(store.countNodes("Task")).toBe(1);
    expect(store.countNodes("Tool")).toBe(1);
  });

  it("upsertNode rejects an empty name", () => {
    expect(() => store.upsertNode("Tool", "  ", {})).toThrow(ValidationError);
  });

  it("listEntities returns entities sorted by name", () => {
    addTool("zeta");
    addTool("alpha");

    expect(store.listEntities("Tool").map((t) => t.name)).toEqual(["alpha", "zeta"]);
  });

  it("rolls back every write when a transaction throws", () => {
    expect(() =>
      store.transaction(() => {
        store.upsertNode("Tool", "ghost", { description: "never committed" });
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(store.getNode("Tool", "ghost")).toBeUndefined();
  });

  // ---------------------------------------------------------------
  // CONTAINS ordering
  // ---------------------------------------------------------------
  it("getOrderedTasks returns tasks ascending by order, not insertion", () => {
    addTool("tool");
    addTask("load", "tool");
    addTask("clean", "tool");
    addTask("report", "tool");
    store.upsertNode("Workflow", "etl", { description: "" });

    store.upsertRelationship("etl", "report", "CONTAINS", { order: 30 });
    store.upsertRelationship("etl", "load", "CONTAINS", { order: 10 });
    store.upsertRelationship("etl", "clean", "CONTAINS", { order: 20 });

    const ordered = store.getOrderedTasks("etl");
    expect(ordered.map((t) => t.task.name)).toEqual(["load", "clean", "report"]);
    expect(ordered.map((t) => t.order)).toEqual([10, 20, 30]);
    expect(ordered[0].task.toolName).toBe("tool");
  });

  it("getOrderedTasks throws WorkflowNotFoundError for an unknown workflow", () => {
    expect(() => store.getOrderedTasks("missing")).toThrow(WorkflowNotFoundError);
  });

  it("getOrderedTasks returns an empty list for a workflow without tasks", () => {
    store.upsertNode("Workflow", "empty", { description: "" });
    expect(store.getOrderedTasks("empty")).toEqual([]);
  });

  it("rejects a second task at an order already taken", () => {
    addTool("tool");
    addTask("a", "tool");
    addTask("b", "tool");
    store.upsertNode("Workflow", "w", { description: "" });
    store.upsertRelationship("w", "a", "CONTAINS", { order: 1 });

    expect(() => store.upsertRelationship("w", "b", "CONTAINS", { order: 1 })).toThrow(
      ConstraintViolationError,
    );
    expect(countRelationships("CONTAINS")).toBe(1);
  });

  it("treats re-adding the same task at the same order as a no-op", () => {
    addTool("tool");
    addTask("a", "tool");
    store.upsertNode("Workflow", "w", { description: "" });

    store.upsertRelationship("w", "a", "CONTAINS", { order: 1 });
    store.upsertRelationship("w", "a", "CONTAINS", { order: 1 });

    expect(store.getOrderedTasks("w")).toHaveLength(1);
  });

  it("allows one task at several orders of the same workflow", () => {
    addTool("tool");
    addTask("retry", "tool");
    store.upsertNode("Workflow", "w", { description: "" });

    store.upsertRelationship("w", "retry", "CONTAINS", { order: 1 });
    store.upsertRelationship("w", "retry", "CONTAINS", { order: 2 });

    expect(store.getOrderedTasks("w").map((t) => t.order)).toEqual([1, 2]);
  });

  it("rejects a non-integer order", () => {
    addTool("tool");
    addTask("a", "tool");
    store.upsertNode("Workflow", "w", { description: "" });

    expect(() => store.upsertRelationship("w", "a", "CONTAINS", { order: 1.5 })).toThrow(ValidationError);
    expect(() => store.upsertRelationship("w", "a", "CONTAINS")).toThrow(ValidationError);
  });

  it("throws NotFoundError when a relationship endpoint is missing", () => {
    store.upsertNode("Workflow", "w", { description: "" });
    expect(() => store.upsertRelationship("w", "nope", "CONTAINS", { order: 1 })).toThrow(NotFoundError);
  });

  it("insertContainsAt shifts the occupied slot and everything after it", () => {
    addTool("tool");
    for (const name of ["a", "b", "c", "d"]) addTask(name, "tool");
    store.upsertNode("Workflow", "w", { description: "" });
    store.upsertRelationship("w", "a", "CONTAINS", { order: 1 });
    store.upsertRelationship("w", "b", "CONTAINS", { order: 2 });
    store.upsertRelationship("w", "c", "CONTAINS", { order: 3 });

    store.insertContainsAt("w", "d", 2);

    expect(store.getOrderedTasks("w").map((t) => [t.task.name, t.order])).toEqual([
      ["a", 1],
      ["d", 2],
      ["b", 3],
      ["c", 4],
    ]);
  });

  it("insertContainsAt leaves other orders alone when the slot is free", () => {
    addTool("tool");
    for (const name of ["a", "b", "c"]) addTask(name, "tool");
    store.upsertNode("Workflow", "w", { description: "" });
    store.upsertRelationship("w", "a", "CONTAINS", { order: 1 });
    store.upsertRelationship("w", "c", "CONTAINS", { order: 5 });

    store.insertContainsAt("w", "b", 3);

    expect(store.getOrderedTasks("w").map((t) => [t.task.name, t.order])).toEqual([
      ["a", 1],
      ["b", 3],
      ["c", 5],
    ]);
  });

  it("removeRelationships removes edges to one task or all of them", () => {
    addTool("tool");
    for (const name of ["a", "b"]) addTask(name, "tool");
    store.upsertNode("Workflow", "w", { description: "" });
    store.upsertRelationship("w", "a", "CONTAINS", { order: 1 });
    store.upsertRelationship("w", "b", "CONTAINS", { order: 2 });

    expect(store.removeRelationships("w", "CONTAINS", "a")).toBe(1);
    expect(store.removeRelationships("w", "CONTAINS", "unknown")).toBe(0);
    expect(store.getOrderedTasks("w").map((t) => t.task.name)).toEqual(["b"]);
    expect(store.removeRelationships("w", "CONTAINS")).toBe(1);
    expect(store.getOrderedTasks("w")).toEqual([]);
  });

  // ---------------------------------------------------------------
  // USES
  // ---------------------------------------------------------------
  it("getToolForTask follows the USES relationship", () => {
    addTool("adder");
    addTask("sum", "adder");

    expect(store.getToolForTask("sum").name).toBe("adder");
  });

  it("keeps a single USES relationship per task", () => {
    addTool("old");
    addTool("new");
    addTask("sum", "old");
    store.upsertRelationship("sum", "new", "USES");

    expect(store.getToolForTask("sum").name).toBe("new");
    expect(countRelationships("USES")).toBe(1);
  });

  it("getToolForTask throws NotFoundError once the tool is deleted", () => {
    addTool("adder");
    addTask("sum", "adder");

    store.deleteNode("Tool", "adder");

    expect(() => store.getToolForTask("sum")).toThrow(NotFoundError);
    expect(countRelationships("USES")).toBe(0);
  });

  it("getToolForTask throws NotFoundError for an unknown task", () => {
    expect(() => store.getToolForTask("nope")).toThrow(NotFoundError);
  });

  it("reports which workflows contain a task and which tasks use a tool", () => {
    addTool("tool");
    addTask("a", "tool");
    addTask("b", "tool");
    store.upsertNode("Workflow", "w2", { description: "" });
    store.upsertNode("Workflow", "w1", { description: "" });
    store.upsertRelationship("w2", "a", "CONTAINS", { order: 7 });
    store.upsertRelationship("w1", "a", "CONTAINS", { order: 3 });

    expect(store.getWorkflowsContaining("a")).toEqual([
      { workflow: "w1", order: 3 },
      { workflow: "w2", order: 7 },
    ]);
    expect(store.getTasksUsing("tool")).toEqual(["a", "b"]);
  });

  // ---------------------------------------------------------------
  // Deletion
  // ---------------------------------------------------------------
  it("deleteNode detaches a workflow's CONTAINS edges and keeps the tasks", () => {
    addTool("tool");
    addTask("a", "tool");
    store.upsertNode("Workflow", "w", { description: "" });
    store.upsertRelationship("w", "a", "CONTAINS", { order: 1 });

    expect(store.deleteNode("Workflow", "w")).toBe(true);
    expect(countRelationships("CONTAINS")).toBe(0);
    expect(store.getNode("Task", "a")).toBeDefined();
  });

  it("deleteNode removes index entries and returns false for unknown nodes", () => {
    addTool("adder");
    store.writeEmbedding("Tool", "adder", [1, 0, 0, 0]);
    store.writeFulltext("Tool", "adder", "adder sums numbers");

    expect(store.deleteNode("Tool", "adder")).toBe(true);
    expect(store.queryByEmbeddingSimilarity("Tool", [1, 0, 0, 0], 5)).toEqual([]);
    expect(store.queryByFulltext("Tool", "sums", 5)).toEqual([]);
    expect(store.deleteNode("Tool", "adder")).toBe(false);
  });

  // ---------------------------------------------------------------
  // Embeddings
  // ---------------------------------------------------------------
  it("stores an embedding on the node", () => {
    addTool("adder");
    store.writeEmbedding("Tool", "adder", [0.5, 0.25, 0, 1]);

    expect(store.getNode("Tool", "adder")?.embedding).toEqual([0.5, 0.25, 0, 1]);
  });

  it("rejects an embedding of the wrong length", () => {
    addTool("adder");
    expect(() => store.writeEmbedding("Tool", "adder", [1, 0])).toThrow(ConstraintViolationError);
  });

  it("writeEmbedding with null clears the vector and its index entry", () => {
    addTool("adder");
    store.writeEmbedding("Tool", "adder", [1, 0, 0, 0]);
    store.writeEmbedding("Tool", "adder", null);

    expect(store.getNode("Tool", "adder")?.embedding).toBeNull();
    expect(store.queryByEmbeddingSimilarity("Tool", [1, 0, 0, 0], 5)).toEqual([]);
  });

  it("scores vector matches from 1 (same direction) to 0 (opposite)", () => {
    for (const name of ["same", "orthogonal", "opposite"]) addTool(name);
    store.writeEmbedding("Tool", "same", [1, 0, 0, 0]);
    store.writeEmbedding("Tool", "orthogonal", [0, 1, 0, 0]);
    store.writeEmbedding("Tool", "opposite", [-1, 0, 0, 0]);

    const hits = store.queryByEmbeddingSimilarity("Tool", [1, 0, 0, 0], 3);

    expect(hits.map((h) => h.key)).toEqual(["same", "orthogonal", "opposite"]);
    expect(hits[0].score).toBeCloseTo(1, 5);
    expect(hits[1].score).toBeCloseTo(0.5, 5);
    expect(hits[2].score).toBeCloseTo(0, 5);
  });

  it("returns at most topK vector matches from the label's own index", () => {
    for (const name of ["a", "b"]) addTool(name);
    store.upsertNode("Workflow", "w", { description: "" });
    store.writeEmbedding("Tool", "a", [1, 0, 0, 0]);
    store.writeEmbedding("Tool", "b", [0, 1, 0, 0]);
    store.writeEmbedding("Workflow", "w", [1, 0, 0, 0]);

    expect(store.queryByEmbeddingSimilarity("Tool", [1, 0, 0, 0], 1).map((h) => h.key)).toEqual(["a"]);
    expect(store.queryByEmbeddingSimilarity("Workflow", [1, 0, 0, 0], 5).map((h) => h.key)).toEqual(["w"]);
  });

  it("accepts a topK above the vector index's KNN limit", () => {
    for (const name of ["a", "b"]) addTool(name);
    store.writeEmbedding("Tool", "a", [1, 0, 0, 0]);
    store.writeEmbedding("Tool", "b", [0, 1, 0, 0]);

    expect(store.queryByEmbeddingSimilarity("Tool", [1, 0, 0, 0], 5000).map((h) => h.key)).toEqual(["a", "b"]);
  });

  it("rejects a query vector of the wrong length", () => {
    expect(() => store.queryByEmbeddingSimilarity("Tool", [1, 0, 0], 5)).toThrow(ConstraintViolationError);
  });

  // ---------------------------------------------------------------
  // Full-text
  // ---------------------------------------------------------------
  it("finds full-text matches and scores the best one 1", () => {
    store.upsertNode("Workflow", "analysis", { description: "" });
    store.upsertNode("Workflow", "images", { description: "" });
    store.writeFulltext("Workflow", "analysis", "analysis data analysis pipeline");
    store.writeFulltext("Workflow", "images", "images resize thumbnails");

    expect(store.queryByFulltext("Workflow", "data analysis", 5)).toEqual([{ key: "analysis", score: 1 }]);
  });

  it("ORs query words so partial matches still surface", () => {
    store.upsertNode("Workflow", "analysis", { description: "" });
    store.upsertNode("Workflow", "images", { description: "" });
    store.writeFulltext("Workflow", "analysis", "analysis data analysis pipeline");
    store.writeFulltext("Workflow", "images", "images resize thumbnails");

    const hits = store.queryByFulltext("Workflow", "resize data", 5);

    expect(hits.map((h) => h.key).sort()).toEqual(["analysis", "images"]);
    expect(hits[0].score).toBe(1);
    for (const hit of hits) {
      expect(hit.score).toBeGreaterThan(0);
      expect(hit.score).toBeLessThanOrEqual(1);
    }
  });

  it("re-registering text replaces the previous full-text entry", () => {
    store.upsertNode("Task", "t", { description: "" });
    store.writeFulltext("Task", "t", "old words");
    store.writeFulltext("Task", "t", "fresh words");

    expect(store.queryByFulltext("Task", "old", 5)).toEqual([]);
    expect(store.queryByFulltext("Task", "fresh", 5)).toEqual([{ key: "t", score: 1 }]);
  });

  it("matches part of a name written in ideographs", () => {
    store.upsertNode("Workflow", "数据预处理", { description: "" });
    store.upsertNode("Workflow", "报告生成", { description: "" });
    store.writeFulltext("Workflow", "数据预处理", "数据预处理 清洗原始数据");
    store.writeFulltext("Workflow", "报告生成", "报告生成 汇总结果");

    expect(store.queryByFulltext("Workflow", "数据", 5)).toEqual([{ key: "数据预处理", score: 1 }]);
    expect(store.queryByFulltext("Workflow", "预处理", 5)).toEqual([{ key: "数据预处理", score: 1 }]);
    expect(store.queryByFulltext("Workflow", "生成报告", 5)).toEqual([]);
  });

  it("returns nothing for a query without word characters", () => {
    store.upsertNode("Task", "t", { description: "" });
    store.writeFulltext("Task", "t", "anything");

    expect(store.queryByFulltext("Task", "?!-", 5)).toEqual([]);
  });

  // ---------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------
  it("close() is idempotent", () => {
    store.close();
    expect(() => store.close()).not.toThrow();
  });

  it("rejects non-positive dimensions", () => {
    expect(() => new SqliteGraphStore({ path: ":memory:", dimensions: 0 })).toThrow(ValidationError);
  });
});

describe("toFulltextQuery", () => {
  it("quotes each distinct word and joins them with OR", () => {
    expect(toFulltextQuery("Data-analysis, data 2024!")).toBe('"data" OR "analysis" OR "2024"');
  });

  it("turns a run of ideographs into a phrase of single characters", () => {
    expect(toFulltextQuery("数据 analysis")).toBe('"数 据" OR "analysis"');
    expect(toFulltextQuery("Excel数据")).toBe('"excel 数 据"');
  });

  it("returns null when there is nothing to search for", () => {
    expect(toFulltextQuery("")).toBeNull();
    expect(toFulltextQuery("--- ?")).toBeNull();
  });
});

describe("segmentIdeographs", () => {
  it("separates ideographs and leaves other words whole", () => {
    expect(segmentIdeographs("数据预处理 pipeline")).toBe("数 据 预 处 理 pipeline");
    expect(segmentIdeographs("load  data")).toBe("load data");
  });
});
