/**
 * RVK-Classifier-MCP: Zod Schemas for Tool Input Validation
 *
 * Every tool has a strict schema that enforces type safety and provides
 * clear error messages for invalid inputs.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";

// ============================================================================
// Common Schemas
// ============================================================================

export const NotationSchema = z.string().trim().min(1).max(100)
  .describe("RVK notation (e.g. 'A', 'AN', 'AN 1000')");

export const ConceptSchema = z.object({
  text: z.string().trim().min(1).max(200)
    .describe("Concept surface text"),
  kind: z.enum(["keyword", "discipline", "place", "form", "period"])
    .describe("keyword = subject term, discipline = academic field, place = geographic name, form = publication form (Lehrbuch, Kongress), period = epoch (Mittelalter, DDR)"),
}).strict();

export const SearchOptionsSchema = z.object({
  max_results: z.number().int().min(1).max(100).optional()
    .describe("Maximum results (default from config: 10)"),
  expand_threshold: z.number().min(0).max(1).optional()
    .describe("Minimum node score to descend into its children (default 0.3)"),
  candidate_threshold: z.number().min(0).max(1).optional()
    .describe("Minimum node score to report a node (default 0.6)"),
  concurrency: z.number().int().min(1).max(16).optional()
    .describe("Parallel child fetches per level (default 4)"),
  priority_groups: z.array(z.string().regex(/^[A-Z]$/)).max(26).optional()
    .describe("Preferred Hauptgruppen letters: always traversed, and the only roots when no Hauptgruppe scores"),
}).strict();

// ============================================================================
// Classification Schemas
// ============================================================================

export const ClassifyConceptsInputSchema = z.object({
  concepts: z.array(ConceptSchema).max(50)
    .describe("Concepts in rank order, most salient first"),
  options: SearchOptionsSchema.optional(),
}).strict();

export const ClassifyRecordInputSchema = z.object({
  record: z.string().min(1).max(100_000)
    .describe("PICA record (PICA3 '4000 Title' or PICA+ '021A $aTitle'), one field per line"),
  use_llm: z.boolean().optional()
    .describe("Use the configured chat model for concept extraction (default from config)"),
  options: SearchOptionsSchema.optional(),
}).strict();

// ============================================================================
// Lookup Schemas
// ============================================================================

export const GetNodeInputSchema = z.object({
  notation: NotationSchema,
  include_children: z.boolean().default(false)
    .describe("Also return the node's children"),
}).strict();

export const NormalizePlaceInputSchema = z.object({
  place: z.string().trim().min(1).max(200)
    .describe("Place name (city, region, country or adjective)"),
}).strict();

// ============================================================================
// Session Schemas
// ============================================================================

export const SessionResetInputSchema = z.object({}).strict();
export const SessionInfoInputSchema = z.object({}).strict();

// ============================================================================
// Type Exports
// ============================================================================

export type ClassifyConceptsInput = z.infer<typeof ClassifyConceptsInputSchema>;
export type ClassifyRecordInput = z.infer<typeof ClassifyRecordInputSchema>;
export type GetNodeInput = z.infer<typeof GetNodeInputSchema>;
export type NormalizePlaceInput = z.infer<typeof NormalizePlaceInputSchema>;
export type SearchOptionsInput = z.infer<typeof SearchOptionsSchema>;
