/**
 * 🔎 Hierarchical Search Engine - RVK-Classifier-MCP
 *
 * Walks the RVK tree top-down, breadth-first, and returns the most specific
 * notations matching a ranked list of concepts.
 *
 * Pipeline:
 * 1. Normalize place concepts to their country or continent
 * 2. Score the Hauptgruppen; scoring and priority groups become traversal roots (else all groups)
 * 3. Expand level by level; emit candidates, expand every node above the expand threshold
 * 4. Geographic precedence: a country or continent node beats its own subdivisions for that place concept
 * 5. Depth policy: one report per root-to-leaf path, at the deepest candidate
 * 6. Dedup by notation, merging contributing concepts
 * 7. Sort by confidence, depth, notation
 * 8. Truncate to max_results
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type {
  ClassificationResult,
  Concept,
  MatchCandidate,
  NotationNode,
} from "../types.js";
import type { HierarchyAccessor } from "../hierarchy/accessor.js";
import { PathReconstructor } from "./path-reconstructor.js";
import { defaultScoringContext, hauptgruppeOf, scoreNode, type NodeScore, type ScoringContext } from "./scoring.js";
import { formatPath, hierarchyLevel } from "./notation.js";
import { ClassifierLogger, createToolError, normalizeTerm, throwIfAborted } from "../utils.js";

// ============================================================================
// Options
// ============================================================================

export interface SearchOptions {
  /** Maximum number of results (default 10) */
  max_results?: number;
  /** Minimum best score for a node to be expanded further (default 0.3) */
  expand_threshold?: number;
  /** Minimum score for a node to be reported for a concept (default 0.6) */
  candidate_threshold?: number;
  /** Depth ceiling; deeper nodes mean malformed data (default: accessor's) */
  max_depth?: number;
  /** Visited-node ceiling per request (default 5000) */
  max_nodes?: number;
  /** Parallel child fetches per level (default 4) */
  concurrency?: number;
  /** Confidence lost per rank position, floored at 0.5 (default 0.05) */
  rank_decay?: number;
  /** Hauptgruppen letters that are always traversed */
  priority_groups?: readonly string[];
  signal?: AbortSignal;
}

export const DEFAULT_SEARCH_OPTIONS = {
  max_results: 10,
  expand_threshold: 0.3,
  candidate_threshold: 0.6,
  max_nodes: 5000,
  concurrency: 4,
  rank_decay: 0.05,
} as const;

type ResolvedOptions = Required<Omit<SearchOptions, "signal">> & { signal?: AbortSignal };

// ============================================================================
// Internal Types
// ============================================================================

interface Visit {
  node: NotationNode;
  /** Notations from the Hauptgruppe down to the parent */
  ancestors: readonly string[];
}

interface TraversalHit extends MatchCandidate {
  node: NotationNode;
  ancestors: readonly string[];
}

interface ScoredNode {
  node: NotationNode;
  matches: Array<{ concept: Concept } & NodeScore>;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ============================================================================
// Engine
// ============================================================================

export class HierarchicalSearchEngine {
  private readonly paths: PathReconstructor;

  constructor(
    private readonly accessor: HierarchyAccessor,
    private readonly ctx: ScoringContext = defaultScoringContext(),
    private readonly logger?: ClassifierLogger
  ) {
    this.paths = new PathReconstructor(accessor);
  }

  /**
   * Classify a ranked concept list against the hierarchy.
   *
   * An empty list yields an empty result without touching the source.
   * An empty result otherwise means "no classification found"; failures are
   * thrown as ToolError (UPSTREAM_UNAVAILABLE, EMPTY_HIERARCHY,
   * MALFORMED_HIERARCHY, BROKEN_ANCESTRY, CANCELLED).
   *
   * @example
   * const results = await engine.search([{ text: "Chemie", kind: "discipline", rank: 0 }]);
   * // [{ notation: "A1", path: ["Naturwissenschaften", "Chemie"], ... }]
   */
  async search(concepts: readonly Concept[], options: SearchOptions = {}): Promise<ClassificationResult[]> {
    if (concepts.length === 0) {
      return [];
    }

    const opts = this.resolveOptions(options);
    const normalized = concepts.map(c => this.ctx.places.normalize(c));

    // Hauptgruppen
    const groups = await this.accessor.getTopLevelGroups(opts.signal);
    const scoredGroups: ScoredNode[] = groups.map(node => ({
      node,
      matches: scoreNode(node, normalized, this.ctx),
    }));
    const matchingGroups = scoredGroups.filter(g => g.matches.length > 0);
    const selected = scoredGroups.filter(g =>
      g.matches.length > 0 || opts.priority_groups.includes(hauptgruppeOf(g.node.notation))
    );
    const roots = selected.length > 0 ? selected : scoredGroups;

    const hits: TraversalHit[] = [];
    for (const root of roots) {
      hits.push(...this.toHits(root, [], opts));
    }

    const visited = await this.traverse(
      roots.map(r => ({ node: r.node, ancestors: [] })),
      normalized,
      hits,
      groups.length,
      opts
    );

    await this.logger?.debug("search", "hierarchical_search", "Traversal finished", {
      concepts: normalized.length,
      roots: roots.map(r => r.node.notation),
      priority_groups: opts.priority_groups,
      visited,
      candidates: hits.length,
    });

    if (hits.length === 0) {
      return this.fallbackToGroups(matchingGroups, opts);
    }

    const ranked = this.sortResults(this.dedupe(this.preferDeepest(this.applyGeographicPrecedence(hits))));
    return Promise.all(ranked.slice(0, opts.max_results).map(hit => this.toResult(hit, opts.signal)));
  }

  // --------------------------------------------------------------------------
  // Traversal
  // --------------------------------------------------------------------------

  /**
   * Breadth-first expansion. Each level's child fetches run with bounded
   * concurrency; the next level starts only after the whole level settled.
   *
   * @returns number of visited nodes
   */
  private async traverse(
    start: Visit[],
    concepts: readonly Concept[],
    hits: TraversalHit[],
    alreadyVisited: number,
    opts: ResolvedOptions
  ): Promise<number> {
    let frontier = start;
    let visited = alreadyVisited;

    while (frontier.length > 0) {
      throwIfAborted(opts.signal, { visited });

      const childLists = await this.expandLevel(frontier, opts);
      const next: Visit[] = [];

      frontier.forEach((visit, i) => {
        const ancestors = [...visit.ancestors, visit.node.notation];

        for (const child of childLists[i]) {
          visited++;
          if (visited > opts.max_nodes) {
            throw createToolError("MALFORMED_HIERARCHY", `Visited more than ${opts.max_nodes} nodes`, {
              details: { notation: child.notation, depth: child.depth, max_nodes: opts.max_nodes },
              suggestion: "Raise search.max_nodes or check the hierarchy source for cycles",
            });
          }
          if (child.depth > opts.max_depth || ancestors.includes(child.notation)) {
            throw createToolError("MALFORMED_HIERARCHY", `Node ${child.notation} exceeds the depth ceiling or repeats on its path`, {
              details: { notation: child.notation, depth: child.depth, max_depth: opts.max_depth },
            });
          }

          const scored: ScoredNode = { node: child, matches: scoreNode(child, concepts, this.ctx) };
          hits.push(...this.toHits(scored, ancestors, opts));

          const bestScore = Math.max(0, ...scored.matches.map(m => m.score));
          if (bestScore >= opts.expand_threshold) {
            next.push({ node: child, ancestors });
          }
        }
      });

      frontier = next;
    }

    return visited;
  }

  /**
   * Fetch the children of every frontier node, at most `concurrency` at once.
   * All dispatched fetches settle before this returns or throws.
   */
  private async expandLevel(frontier: Visit[], opts: ResolvedOptions): Promise<NotationNode[][]> {
    const results: NotationNode[][] = frontier.map(() => []);
    const queue = frontier.map((visit, index) => ({ visit, index }));
    const inFlight: Promise<void>[] = [];
    let failure: unknown = null;

    const fetchOne = async (item: { visit: Visit; index: number }): Promise<void> => {
      try {
        results[item.index] = await this.accessor.getChildren(item.visit.node.notation, opts.signal);
      } catch (err) {
        if (failure === null) failure = err;
        queue.length = 0;
      }
    };

    while (queue.length > 0 || inFlight.length > 0) {
      while (queue.length > 0 && inFlight.length < opts.concurrency) {
        const item = queue.shift();
        if (!item) break;
        const promise: Promise<void> = fetchOne(item).then(() => {
          const idx = inFlight.indexOf(promise);
          if (idx >= 0) inFlight.splice(idx, 1);
        });
        inFlight.push(promise);
      }

      if (inFlight.length > 0) {
        await Promise.race(inFlight);
      }
    }

    if (failure !== null) {
      throw failure;
    }
    return results;
  }

  private toHits(scored: ScoredNode, ancestors: readonly string[], opts: ResolvedOptions): TraversalHit[] {
    return scored.matches
      .filter(m => m.score >= opts.candidate_threshold)
      .map(m => ({
        notation: scored.node.notation,
        concept: m.concept,
        match_kind: m.match_kind,
        confidence: round(Math.min(1, m.score * this.rankWeight(m.concept, opts))),
        depth: scored.node.depth,
        node: scored.node,
        ancestors,
      }));
  }

  private rankWeight(concept: Concept, opts: ResolvedOptions): number {
    return Math.max(0.5, 1 - Math.max(0, concept.rank) * opts.rank_decay);
  }

  // --------------------------------------------------------------------------
  // Aggregation
  // --------------------------------------------------------------------------

  /**
   * For a place concept resolved to a country or continent: once a node
   * labelled with it is a candidate, its descendants no longer count for the concept.
   */
  private applyGeographicPrecedence(hits: TraversalHit[]): TraversalHit[] {
    const countryNodes = new Map<Concept, Set<string>>();

    for (const hit of hits) {
      const country = hit.concept.kind === "place" ? hit.concept.normalized : undefined;
      if (!country || !(this.ctx.places.isCountry(country) || this.ctx.places.isContinent(country))) continue;
      if (normalizeTerm(hit.node.label) !== normalizeTerm(country)) continue;

      const ids = countryNodes.get(hit.concept) ?? new Set<string>();
      ids.add(hit.notation);
      countryNodes.set(hit.concept, ids);
    }

    if (countryNodes.size === 0) return hits;

    return hits.filter(hit => {
      const ids = countryNodes.get(hit.concept);
      return !ids || !hit.ancestors.some(a => ids.has(a));
    });
  }

  /**
   * Drop every candidate that is an ancestor of another candidate
   */
  private preferDeepest(hits: TraversalHit[]): TraversalHit[] {
    const covered = new Set<string>();
    for (const hit of hits) {
      for (const ancestor of hit.ancestors) covered.add(ancestor);
    }
    return hits.filter(hit => !covered.has(hit.notation));
  }

  /**
   * One entry per notation: the highest confidence wins, concepts are merged
   */
  private dedupe(hits: TraversalHit[]): Array<TraversalHit & { concepts: Concept[] }> {
    const byNotation = new Map<string, TraversalHit[]>();
    for (const hit of hits) {
      const group = byNotation.get(hit.notation) ?? [];
      group.push(hit);
      byNotation.set(hit.notation, group);
    }

    return [...byNotation.values()].map(group => {
      const ordered = [...group].sort((a, b) => b.confidence - a.confidence || a.concept.rank - b.concept.rank);
      const concepts: Concept[] = [];
      for (const hit of ordered) {
        if (!concepts.some(c => c.kind === hit.concept.kind && normalizeTerm(c.text) === normalizeTerm(hit.concept.text))) {
          concepts.push(hit.concept);
        }
      }
      return { ...ordered[0], concepts };
    });
  }

  private sortResults<T extends MatchCandidate>(hits: T[]): T[] {
    return [...hits].sort((a, b) =>
      b.confidence - a.confidence ||
      b.depth - a.depth ||
      (a.notation < b.notation ? -1 : a.notation > b.notation ? 1 : 0)
    );
  }

  /**
   * No candidate anywhere: report the Hauptgruppen that scored at all.
   * If none did, there is no classification.
   */
  private async fallbackToGroups(groups: ScoredNode[], opts: ResolvedOptions): Promise<ClassificationResult[]> {
    const hits = groups.map(g => {
      const top = [...g.matches].sort((a, b) => b.score - a.score)[0];
      return {
        notation: g.node.notation,
        concept: top.concept,
        match_kind: top.match_kind,
        confidence: round(Math.min(1, top.score * this.rankWeight(top.concept, opts))),
        depth: 0,
        node: g.node,
        ancestors: [],
        concepts: g.matches.map(m => m.concept),
      };
    });

    return Promise.all(this.sortResults(hits).slice(0, opts.max_results).map(hit => this.toResult(hit, opts.signal)));
  }

  private async toResult(hit: TraversalHit & { concepts: Concept[] }, signal?: AbortSignal): Promise<ClassificationResult> {
    const nodes = await this.paths.buildNodePath(hit.node, signal);
    const path = nodes.map(n => n.label);

    if (path.length !== hit.node.depth + 1) {
      throw createToolError("BROKEN_ANCESTRY", `Path of ${hit.notation} has ${path.length} levels, expected ${hit.node.depth + 1}`, {
        details: { notation: hit.notation, depth: hit.node.depth, path },
      });
    }

    return {
      notation: hit.notation,
      label: hit.node.label,
      path,
      path_display: formatPath(nodes),
      confidence: hit.confidence,
      depth: hit.depth,
      match_kind: hit.match_kind,
      hierarchy_level: hierarchyLevel(hit.notation),
      concepts: hit.concepts,
    };
  }

  private resolveOptions(options: SearchOptions): ResolvedOptions {
    return {
      max_results: options.max_results ?? DEFAULT_SEARCH_OPTIONS.max_results,
      expand_threshold: options.expand_threshold ?? DEFAULT_SEARCH_OPTIONS.expand_threshold,
      candidate_threshold: options.candidate_threshold ?? DEFAULT_SEARCH_OPTIONS.candidate_threshold,
      max_depth: options.max_depth ?? this.accessor.maxDepth,
      max_nodes: options.max_nodes ?? DEFAULT_SEARCH_OPTIONS.max_nodes,
      concurrency: Math.max(1, options.concurrency ?? DEFAULT_SEARCH_OPTIONS.concurrency),
      rank_decay: options.rank_decay ?? DEFAULT_SEARCH_OPTIONS.rank_decay,
      priority_groups: options.priority_groups?.map(g => g.toUpperCase()) ?? [],
      signal: options.signal,
    };
  }
}
