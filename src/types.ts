/**
 * RVK-Classifier-MCP: Canonical Data Types
 *
 * These types define the core data structures shared by the hierarchy
 * accessor, the search engine and the MCP tools.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// NotationNode - One node of the RVK hierarchy
// ============================================================================

export interface NotationNode {
  notation: string;            // RVK notation, e.g. "AN 1000"
  label: string;               // RVK "Benennung"
  parent_id?: string;          // Absent for a Hauptgruppe
  depth: number;               // 0 = Hauptgruppe
  has_children: boolean;
}

/**
 * Node data as delivered by a hierarchy source, before the accessor has
 * placed it in the tree (depth is derived by the accessor).
 */
export interface RawNode {
  notation: string;
  label: string;
  parent_id?: string;
  has_children?: boolean;
}

// ============================================================================
// Concepts - Candidate subject terms driving the search
// ============================================================================

/** form and period are RVK Schlüssel concepts: they refine a subject below the Hauptgruppen */
export type ConceptKind = "keyword" | "discipline" | "place" | "form" | "period";

export interface Concept {
  text: string;
  kind: ConceptKind;
  rank: number;                // 0 = most salient
  normalized?: string;         // Country or continent form for place concepts
}

// ============================================================================
// Matching & Results
// ============================================================================

export type MatchKind = "exact-label" | "alias" | "discipline-category";

export interface MatchCandidate {
  notation: string;
  concept: Concept;
  match_kind: MatchKind;
  confidence: number;          // [0, 1]
  depth: number;
}

export type HierarchyLevel =
  | "Hauptgruppe"
  | "Untergruppe"
  | "Feingruppe"
  | "Feingruppe + Schlüssel"
  | "Unbekannt";

export interface ClassificationResult {
  notation: string;
  label: string;
  path: string[];              // Labels, root first
  path_display: string;
  confidence: number;
  depth: number;
  match_kind: MatchKind;
  hierarchy_level: HierarchyLevel;
  concepts: Concept[];
}

// ============================================================================
// Bibliographic record (PICA)
// ============================================================================

export interface MetadataRecord {
  title?: string;
  authors: string[];
  year?: string;
  publisher?: string;
  subjects: string[];
  abstract?: string;
  fields: Record<string, string[]>;   // Main content per PICA tag
}

// ============================================================================
// Configuration Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ClassifierConfig {
  version: string;

  hierarchy: {
    source: "rvk-api" | "file";
    base_url: string;
    api_key?: string;
    file_path?: string;
    timeout_ms: number;
    retries: number;
    backoff_ms: number;
    user_agent: string;
  };

  search: {
    max_results: number;
    expand_threshold: number;
    candidate_threshold: number;
    max_depth: number;
    max_nodes: number;
    concurrency: number;
    rank_decay: number;
  };

  extraction: {
    llm_enabled: boolean;
    base_url?: string;
    model: string;
    api_key_env: string;
    temperature: number;
    max_tokens: number;
  };

  logging: {
    level: LogLevel;
    log_dir?: string;
  };
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "UPSTREAM_UNAVAILABLE"
  | "NOT_FOUND"
  | "MALFORMED_HIERARCHY"
  | "BROKEN_ANCESTRY"
  | "EMPTY_HIERARCHY"
  | "CANCELLED"
  | "INVALID_INPUT"
  | "CONFIG_INVALID"
  | "PARSE_ERROR"
  | "EXTRACTION_FAILED";

export interface ToolError {
  success: false;
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export interface EventLogEntry {
  timestamp: string;
  level: LogLevel;
  phase: string;
  tool: string;
  message: string;
  data?: unknown;
}
