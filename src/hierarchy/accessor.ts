/**
 * RVK-Classifier-MCP: Hierarchy Accessor
 *
 * Session-scoped, read-only view of the RVK hierarchy on top of a
 * {@link HierarchySource}:
 * - append-only cache (notation → node, notation → child ids, top-level list)
 * - one in-flight fetch per key, shared by concurrent callers
 * - retry with linear backoff for transient failures, then UPSTREAM_UNAVAILABLE
 * - depth bookkeeping and cycle detection (MALFORMED_HIERARCHY)
 *
 * A cancelled caller stops waiting. A fetch already in flight still completes
 * and fills the cache; once no live caller waits on a load, it issues no
 * further attempts.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { NotationNode, RawNode } from "../types.js";
import { TransientSourceError, type HierarchySource } from "./source.js";
import {
  ClassifierLogger,
  createToolError,
  errorMessage,
  isToolError,
  raceAbort,
  sleep,
  throwIfAborted,
} from "../utils.js";

export interface AccessorOptions {
  retries: number;
  backoff_ms: number;
  max_depth: number;
  logger?: ClassifierLogger;
}

export interface AccessorStats {
  source: string;
  cached_nodes: number;
  cached_child_lists: number;
  fetches: number;
  retries: number;
  cache_hits: number;
}

/**
 * One shared load. Its signal aborts when every caller that joined with a
 * signal has aborted and no caller joined without one.
 */
interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

function singleFlight<T>(
  pending: Map<string, Flight<T>>,
  key: string,
  load: (signal: AbortSignal) => Promise<T>,
  signal: AbortSignal | undefined,
  context: Record<string, unknown>
): Promise<T> {
  throwIfAborted(signal, context);

  let flight = pending.get(key);
  if (!flight || flight.controller.signal.aborted) {
    const controller = new AbortController();
    const created: Flight<T> = {
      controller,
      waiters: 0,
      promise: load(controller.signal).finally(() => {
        if (pending.get(key) === created) pending.delete(key);
      }),
    };
    pending.set(key, created);
    flight = created;
  }

  const joined = flight;
  joined.waiters++;
  if (!signal) return joined.promise;

  const leave = () => {
    joined.waiters--;
    if (joined.waiters === 0) joined.controller.abort();
  };
  signal.addEventListener("abort", leave, { once: true });
  const detach = () => signal.removeEventListener("abort", leave);
  joined.promise.then(detach, detach);

  return raceAbort(joined.promise, signal, context);
}

export class HierarchyAccessor {
  private nodes = new Map<string, NotationNode>();
  private childIds = new Map<string, readonly string[]>();
  private topLevel: readonly string[] | null = null;

  private pendingNodes = new Map<string, Flight<NotationNode>>();
  private pendingChildren = new Map<string, Flight<NotationNode[]>>();
  private pendingTop = new Map<string, Flight<NotationNode[]>>();

  private counters = { fetches: 0, retries: 0, cache_hits: 0 };

  constructor(
    private readonly source: HierarchySource,
    private readonly options: AccessorOptions
  ) {}

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  /**
   * The Hauptgruppen, in source order
   *
   * @throws {ToolError} EMPTY_HIERARCHY when the source lists no groups
   * @throws {ToolError} UPSTREAM_UNAVAILABLE when retries are exhausted
   */
  async getTopLevelGroups(signal?: AbortSignal): Promise<NotationNode[]> {
    throwIfAborted(signal, { operation: "top-level" });

    if (this.topLevel) {
      this.counters.cache_hits++;
      return this.topLevel.map(id => this.require(id));
    }

    return singleFlight(this.pendingTop, "", s => this.loadTopLevel(s), signal, { operation: "top-level" });
  }

  /**
   * Children of a node in source order; empty for a leaf
   *
   * @throws {ToolError} NOT_FOUND for an unknown notation
   * @throws {ToolError} MALFORMED_HIERARCHY when a child is its own ancestor
   */
  async getChildren(notation: string, signal?: AbortSignal): Promise<NotationNode[]> {
    throwIfAborted(signal, { operation: "children", notation });

    const cached = this.childIds.get(notation);
    if (cached) {
      this.counters.cache_hits++;
      return cached.map(id => this.require(id));
    }

    const parent = await this.getNode(notation, signal);
    if (!parent.has_children) {
      this.childIds.set(notation, []);
      return [];
    }

    return singleFlight(this.pendingChildren, notation, s => this.loadChildren(parent, s), signal, {
      operation: "children",
      notation,
    });
  }

  /**
   * One node, with its depth resolved through the parent chain
   *
   * @throws {ToolError} NOT_FOUND for an unknown notation
   * @throws {ToolError} BROKEN_ANCESTRY when a parent cannot be resolved
   */
  async getNode(notation: string, signal?: AbortSignal): Promise<NotationNode> {
    throwIfAborted(signal, { operation: "node", notation });

    const cached = this.nodes.get(notation);
    if (cached) {
      this.counters.cache_hits++;
      return cached;
    }

    return singleFlight(this.pendingNodes, notation, s => this.loadNode(notation, new Set(), s), signal, {
      operation: "node",
      notation,
    });
  }

  /** Cached node, without fetching */
  peek(notation: string): NotationNode | undefined {
    return this.nodes.get(notation);
  }

  /** Cached child ids, without fetching */
  getChildIds(notation: string): readonly string[] | undefined {
    return this.childIds.get(notation);
  }

  get maxDepth(): number {
    return this.options.max_depth;
  }

  stats(): AccessorStats {
    return {
      source: this.source.name,
      cached_nodes: this.nodes.size,
      cached_child_lists: this.childIds.size,
      ...this.counters,
    };
  }

  // --------------------------------------------------------------------------
  // Loading
  // --------------------------------------------------------------------------

  private async loadTopLevel(signal: AbortSignal): Promise<NotationNode[]> {
    const raw = await this.withRetry("top-level", undefined, signal, () => this.source.fetchTopLevel());

    if (raw.length === 0) {
      throw createToolError("EMPTY_HIERARCHY", `Hierarchy source ${this.source.name} returned no top-level groups`, {
        details: { source: this.source.name },
        suggestion: "Check hierarchy.base_url or the hierarchy file",
      });
    }

    const nodes = raw.map(r => this.store(r, undefined, 0));
    this.topLevel = nodes.map(n => n.notation);
    return nodes;
  }

  private async loadChildren(parent: NotationNode, signal: AbortSignal): Promise<NotationNode[]> {
    const raw = await this.withRetry("children", parent.notation, signal, () => this.source.fetchChildren(parent.notation));

    if (raw === null) {
      throw createToolError("NOT_FOUND", `Notation not found: ${parent.notation}`, {
        details: { notation: parent.notation },
      });
    }

    const depth = parent.depth + 1;
    const ancestors = this.ancestorIds(parent);

    const children = raw.map(child => {
      if (ancestors.has(child.notation)) {
        throw createToolError("MALFORMED_HIERARCHY", `Node ${child.notation} is its own ancestor`, {
          details: { notation: child.notation, parent: parent.notation, depth },
        });
      }
      if (depth > this.options.max_depth) {
        throw createToolError("MALFORMED_HIERARCHY", `Depth ceiling of ${this.options.max_depth} exceeded`, {
          details: { notation: child.notation, parent: parent.notation, depth },
        });
      }
      return this.store(child, parent.notation, depth);
    });

    this.childIds.set(parent.notation, children.map(c => c.notation));
    return children;
  }

  /**
   * Fetch a node and resolve its parent chain. Parents are loaded directly
   * (not through the single-flight map) so that two chains pointing at each
   * other fail on the cycle check instead of waiting on each other.
   */
  private async loadNode(notation: string, visiting: Set<string>, signal: AbortSignal): Promise<NotationNode> {
    visiting.add(notation);

    const raw = await this.withRetry("node", notation, signal, () => this.source.fetchNode(notation));
    if (raw === null) {
      throw createToolError("NOT_FOUND", `Notation not found: ${notation}`, {
        details: { notation },
        suggestion: "Check the notation spelling (e.g. 'AN 1000')",
      });
    }

    if (raw.parent_id === undefined) {
      return this.store(raw, undefined, 0);
    }

    if (visiting.has(raw.parent_id)) {
      throw createToolError("MALFORMED_HIERARCHY", `Parent chain of ${notation} cycles back to ${raw.parent_id}`, {
        details: { notation, parent: raw.parent_id, depth: visiting.size },
      });
    }
    if (visiting.size > this.options.max_depth) {
      throw createToolError("MALFORMED_HIERARCHY", `Depth ceiling of ${this.options.max_depth} exceeded`, {
        details: { notation, depth: visiting.size },
      });
    }

    let parent = this.nodes.get(raw.parent_id);
    if (!parent) {
      try {
        parent = await this.loadNode(raw.parent_id, visiting, signal);
      } catch (err) {
        if (isToolError(err) && err.code === "NOT_FOUND") {
          throw createToolError("BROKEN_ANCESTRY", `Parent ${raw.parent_id} of ${notation} cannot be resolved`, {
            details: { notation, parent: raw.parent_id },
          });
        }
        throw err;
      }
    }

    return this.store(raw, parent.notation, parent.depth + 1);
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /**
   * Insert a node into the cache. The first write wins; a second write that
   * places the node under a different parent means the data is not a forest.
   */
  private store(raw: RawNode, parentId: string | undefined, depth: number): NotationNode {
    const existing = this.nodes.get(raw.notation);
    if (existing) {
      if (existing.parent_id !== parentId) {
        throw createToolError("MALFORMED_HIERARCHY", `Node ${raw.notation} has more than one parent`, {
          details: { notation: raw.notation, parents: [existing.parent_id ?? null, parentId ?? null], depth },
        });
      }
      return existing;
    }

    const node: NotationNode = {
      notation: raw.notation,
      label: raw.label,
      parent_id: parentId,
      depth,
      has_children: raw.has_children ?? true,
    };
    this.nodes.set(node.notation, node);
    return node;
  }

  private require(notation: string): NotationNode {
    const node = this.nodes.get(notation);
    if (!node) {
      throw createToolError("BROKEN_ANCESTRY", `Cached child list references unknown node ${notation}`, {
        details: { notation },
      });
    }
    return node;
  }

  /** The node itself and every cached ancestor */
  private ancestorIds(node: NotationNode): Set<string> {
    const ids = new Set<string>([node.notation]);
    let current: NotationNode | undefined = node;

    while (current?.parent_id !== undefined) {
      if (ids.has(current.parent_id) || ids.size > this.options.max_depth) {
        throw createToolError("MALFORMED_HIERARCHY", `Parent chain of ${node.notation} does not terminate`, {
          details: { notation: node.notation, depth: ids.size },
        });
      }
      ids.add(current.parent_id);
      current = this.nodes.get(current.parent_id);
    }
    return ids;
  }

  /**
   * Run a source call, retrying TransientSourceError with linear backoff.
   * No attempt starts after `signal` aborted; the backoff wait ends early.
   */
  private async withRetry<T>(
    operation: string,
    notation: string | undefined,
    signal: AbortSignal,
    fn: () => Promise<T>
  ): Promise<T> {
    const attempts = this.options.retries + 1;
    const context = { operation, notation };
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      throwIfAborted(signal, context);
      this.counters.fetches++;
      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof TransientSourceError)) {
          throw err;
        }
        lastError = err;
        if (attempt < attempts) {
          this.counters.retries++;
          const delay = this.options.backoff_ms * attempt;
          await this.options.logger?.warn("hierarchy", this.source.name,
            `Attempt ${attempt}/${attempts} failed, retrying in ${delay}ms`,
            { operation, notation, error: errorMessage(err) });
          await sleep(delay, signal, context);
        }
      }
    }

    throw createToolError("UPSTREAM_UNAVAILABLE", `Hierarchy source ${this.source.name} unavailable (${operation})`, {
      details: { operation, notation, attempts, error: errorMessage(lastError) },
      recoverable: true,
      suggestion: "Retry later or check hierarchy.base_url",
    });
  }
}
