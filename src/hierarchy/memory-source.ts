/**
 * RVK-Classifier-MCP: In-Memory Hierarchy Source
 *
 * Serves RVK nodes from a flat list (parent links only). Used for loaded
 * JSON dumps of an RVK excerpt and as the in-process source in tests.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs/promises";
import { z } from "zod";
import type { RawNode } from "../types.js";
import type { HierarchySource } from "./source.js";
import { createToolError } from "../utils.js";

/**
 * Dump file format: a JSON array of nodes. `benennung` is accepted as an
 * alias of `label`, `parent` as an alias of `parent_id`.
 */
export const HierarchyDumpSchema = z.array(
  z.object({
    notation: z.string().min(1),
    label: z.string().optional(),
    benennung: z.string().optional(),
    parent_id: z.string().optional(),
    parent: z.string().optional(),
  }).refine(n => n.label !== undefined || n.benennung !== undefined, {
    message: "Node needs a label or benennung",
  })
);

export class MemoryHierarchySource implements HierarchySource {
  readonly name: string;
  private nodes = new Map<string, RawNode>();
  private childIndex = new Map<string, string[]>();
  private roots: string[] = [];

  /** Number of fetch calls served, per method */
  readonly calls = { topLevel: 0, node: 0, children: 0 };

  constructor(nodes: Array<Omit<RawNode, "has_children">>, name = "memory") {
    this.name = name;

    for (const node of nodes) {
      this.nodes.set(node.notation, { notation: node.notation, label: node.label, parent_id: node.parent_id });
      this.childIndex.set(node.notation, this.childIndex.get(node.notation) ?? []);
    }

    for (const node of nodes) {
      if (node.parent_id === undefined) {
        this.roots.push(node.notation);
      } else {
        const siblings = this.childIndex.get(node.parent_id) ?? [];
        siblings.push(node.notation);
        this.childIndex.set(node.parent_id, siblings);
      }
    }
  }

  /**
   * Load a dump file written in the {@link HierarchyDumpSchema} format
   */
  static async fromFile(filePath: string): Promise<MemoryHierarchySource> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
    } catch (err) {
      throw createToolError("CONFIG_INVALID", `Cannot read hierarchy file ${filePath}`, {
        details: { error: String(err) },
        suggestion: "Check hierarchy.file_path / RVK_HIERARCHY_FILE",
      });
    }

    const parsed = HierarchyDumpSchema.safeParse(raw);
    if (!parsed.success) {
      throw createToolError("PARSE_ERROR", `Invalid hierarchy file ${filePath}`, {
        details: parsed.error.issues.slice(0, 5),
      });
    }

    return new MemoryHierarchySource(
      parsed.data.map(n => ({
        notation: n.notation,
        label: n.label ?? n.benennung ?? "",
        parent_id: n.parent_id ?? n.parent,
      })),
      `file:${filePath}`
    );
  }

  async fetchTopLevel(): Promise<RawNode[]> {
    this.calls.topLevel++;
    return this.roots.map(id => this.withChildFlag(id));
  }

  async fetchNode(notation: string): Promise<RawNode | null> {
    this.calls.node++;
    return this.nodes.has(notation) ? this.withChildFlag(notation) : null;
  }

  async fetchChildren(notation: string): Promise<RawNode[] | null> {
    this.calls.children++;
    const ids = this.childIndex.get(notation);
    if (!this.nodes.has(notation) || !ids) return null;
    return ids.map(id => this.withChildFlag(id));
  }

  private withChildFlag(notation: string): RawNode {
    const node = this.nodes.get(notation);
    if (!node) {
      throw createToolError("BROKEN_ANCESTRY", `Child ${notation} has no node entry`, {
        details: { notation },
      });
    }
    return { ...node, has_children: (this.childIndex.get(notation)?.length ?? 0) > 0 };
  }
}
