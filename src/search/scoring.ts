/**
 * ⚖️ Concept/Node Scoring - RVK-Classifier-MCP
 *
 * Pure scoring of one concept against one notation node, dispatched on the
 * concept kind:
 * - keyword: label equality, label containment, keyword alias table
 * - discipline: label equality/containment, Hauptgruppe discipline mapping (roots only)
 * - place: country or continent form, literal surface form, regions containing the place
 * - form/period: canonical name or indicator words, below the Hauptgruppen only
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { Concept, MatchKind, NotationNode } from "../types.js";
import type { HauptgruppeEntry, IndicatorTable } from "../reference-data.js";
import { getReferenceData } from "../reference-data.js";
import { getPlaceNormalizer, type PlaceNormalizer } from "./place-normalizer.js";
import { containsWord, normalizeTerm, tokenize } from "../utils.js";

// ============================================================================
// Score Table
// ============================================================================

export const SCORES = {
  /** Label equals the term */
  exact: 1.0,
  /** Place node labelled with the literal (non-country) surface form */
  placeLiteral: 0.9,
  /** Label contains the term */
  contains: 0.7,
  /** Place node labelled with a region that contains the literal place */
  placeRegion: 0.65,
  /** Root whose discipline mapping lists the term */
  disciplineCategory: 0.6,
  /** Label contains a related term from the keyword alias table */
  keywordAlias: 0.5,
  /** Label contains an indicator word of a form or period */
  indicator: 0.5,
} as const;

export interface NodeScore {
  score: number;
  match_kind: MatchKind;
}

export interface ScoringContext {
  hauptgruppen: ReadonlyMap<string, HauptgruppeEntry>;
  keywordAliases: ReadonlyMap<string, readonly string[]>;
  places: PlaceNormalizer;
  forms: IndicatorTable;
  periods: IndicatorTable;
}

/**
 * Scoring context over the bundled reference tables
 */
export function defaultScoringContext(): ScoringContext {
  const data = getReferenceData();
  return {
    hauptgruppen: data.hauptgruppen,
    keywordAliases: data.keywordAliases,
    places: getPlaceNormalizer(),
    forms: data.forms,
    periods: data.periods,
  };
}

// ============================================================================
// Helpers
// ============================================================================

function best(...scores: Array<NodeScore | null>): NodeScore | null {
  let top: NodeScore | null = null;
  for (const s of scores) {
    if (s && (!top || s.score > top.score)) {
      top = s;
    }
  }
  return top;
}

function labelMatch(label: string, term: string, kind: MatchKind = "exact-label"): NodeScore | null {
  if (!term) return null;
  if (label === term) return { score: SCORES.exact, match_kind: kind };
  if (label.includes(term)) return { score: SCORES.contains, match_kind: kind };
  return null;
}

/**
 * Hauptgruppe letter of a notation ("AN 1000" → "A")
 */
export function hauptgruppeOf(notation: string): string {
  return notation.trim().charAt(0).toUpperCase();
}

// ============================================================================
// Per-kind Scoring
// ============================================================================

function scoreKeyword(term: string, label: string, ctx: ScoringContext): NodeScore | null {
  const direct = labelMatch(label, term);
  if (direct) return direct;

  const related = ctx.keywordAliases.get(term) ?? [];
  if (related.some(r => label.includes(r))) {
    return { score: SCORES.keywordAlias, match_kind: "alias" };
  }
  return null;
}

function scoreDiscipline(term: string, node: NotationNode, label: string, ctx: ScoringContext): NodeScore | null {
  let category: NodeScore | null = null;

  if (node.depth === 0) {
    const group = ctx.hauptgruppen.get(hauptgruppeOf(node.notation));
    const words = tokenize(term);
    if (group && group.disciplines.some(d => d === term || words.includes(d))) {
      category = { score: SCORES.disciplineCategory, match_kind: "discipline-category" };
    }
  }

  return best(labelMatch(label, term), category);
}

function scorePlace(concept: Concept, label: string, ctx: ScoringContext): NodeScore | null {
  const literal = normalizeTerm(concept.text);
  const country = normalizeTerm(concept.normalized ?? concept.text);
  const viaAlias = country !== literal;

  const countryMatch = labelMatch(label, country, viaAlias ? "alias" : "exact-label");

  let literalMatch: NodeScore | null = null;
  if (viaAlias) {
    if (label === literal) {
      literalMatch = { score: SCORES.placeLiteral, match_kind: "exact-label" };
    } else if (label.includes(literal)) {
      literalMatch = { score: SCORES.contains, match_kind: "exact-label" };
    }
  }

  const region: NodeScore | null = ctx.places.regionsContaining(literal).includes(label)
    ? { score: SCORES.placeRegion, match_kind: "alias" }
    : null;

  return best(countryMatch, literalMatch, region);
}

function scoreQualifier(term: string, node: NotationNode, label: string, table: IndicatorTable): NodeScore | null {
  if (node.depth === 0) return null;

  const canonical = normalizeTerm(table.canonical.get(term) ?? term);
  const direct = best(labelMatch(label, term), labelMatch(label, canonical));
  if (direct) return direct;

  const indicators = table.indicators.get(canonical) ?? [];
  if (indicators.some(i => containsWord(label, i))) {
    return { score: SCORES.indicator, match_kind: "alias" };
  }
  return null;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Score one concept against one node.
 *
 * @returns score in (0, 1] with its match kind, or null when nothing matches
 *
 * @example
 * score({ text: "Chemie", kind: "discipline", rank: 0 }, chemieNode, ctx)
 * // { score: 1, match_kind: "exact-label" }
 */
export function score(concept: Concept, node: NotationNode, ctx: ScoringContext): NodeScore | null {
  const label = normalizeTerm(node.label);

  switch (concept.kind) {
    case "keyword":
      return scoreKeyword(normalizeTerm(concept.text), label, ctx);
    case "discipline":
      return scoreDiscipline(normalizeTerm(concept.text), node, label, ctx);
    case "place":
      return scorePlace(concept, label, ctx);
    case "form":
      return scoreQualifier(normalizeTerm(concept.text), node, label, ctx.forms);
    case "period":
      return scoreQualifier(normalizeTerm(concept.text), node, label, ctx.periods);
  }
}

/**
 * Score a node against every concept.
 * Returned entries keep the concept order; concepts that do not match are omitted.
 */
export function scoreNode(
  node: NotationNode,
  concepts: readonly Concept[],
  ctx: ScoringContext
): Array<{ concept: Concept } & NodeScore> {
  const matches: Array<{ concept: Concept } & NodeScore> = [];
  for (const concept of concepts) {
    const s = score(concept, node, ctx);
    if (s) {
      matches.push({ concept, ...s });
    }
  }
  return matches;
}
