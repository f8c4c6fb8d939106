/**
 * RVK-Classifier-MCP: Path Reconstructor
 *
 * Walks parent links from a node to its Hauptgruppe. Ancestors reached during
 * traversal are already cached, so this normally triggers no fetch.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { NotationNode } from "../types.js";
import type { HierarchyAccessor } from "../hierarchy/accessor.js";
import { createToolError, isToolError } from "../utils.js";

export class PathReconstructor {
  constructor(private readonly accessor: HierarchyAccessor) {}

  /**
   * Nodes from the Hauptgruppe down to `node`
   *
   * @throws {ToolError} BROKEN_ANCESTRY when a parent id cannot be resolved
   * @throws {ToolError} MALFORMED_HIERARCHY on a cycle or an over-long chain
   */
  async buildNodePath(node: NotationNode, signal?: AbortSignal): Promise<NotationNode[]> {
    const chain: NotationNode[] = [node];
    const seen = new Set<string>([node.notation]);
    let current = node;

    while (current.parent_id !== undefined) {
      const parentId = current.parent_id;

      if (seen.has(parentId) || chain.length > this.accessor.maxDepth) {
        throw createToolError("MALFORMED_HIERARCHY", `Parent chain of ${node.notation} does not terminate`, {
          details: { notation: node.notation, at: parentId, depth: chain.length },
        });
      }

      const parent = this.accessor.peek(parentId) ?? await this.resolveParent(node, parentId, signal);
      seen.add(parentId);
      chain.push(parent);
      current = parent;
    }

    return chain.reverse();
  }

  /**
   * Labels from the Hauptgruppe down to `node`; length is `node.depth + 1`
   *
   * @example
   * await reconstructor.buildPath(chemie) // ["Naturwissenschaften", "Chemie"]
   */
  async buildPath(node: NotationNode, signal?: AbortSignal): Promise<string[]> {
    const nodes = await this.buildNodePath(node, signal);
    return nodes.map(n => n.label);
  }

  private async resolveParent(node: NotationNode, parentId: string, signal?: AbortSignal): Promise<NotationNode> {
    try {
      return await this.accessor.getNode(parentId, signal);
    } catch (err) {
      if (isToolError(err) && err.code === "NOT_FOUND") {
        throw createToolError("BROKEN_ANCESTRY", `Parent ${parentId} of ${node.notation} cannot be resolved`, {
          details: { notation: node.notation, parent: parentId, depth: node.depth },
        });
      }
      throw err;
    }
  }
}
