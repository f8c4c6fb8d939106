/**
 * 🏷️ RVK Classification Tools - RVK-Classifier-MCP
 *
 * - rvk_classify_concepts: ranked concepts → RVK notations
 * - rvk_classify_record: PICA record → concepts → RVK notations
 *
 * An empty result list means "no classification found"; a failed search
 * returns a ToolError.
 *
 * @module tools/classify
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ClassificationResult, Concept, MetadataRecord, ToolError } from "../types.js";
import type { ClassifyConceptsInput, ClassifyRecordInput, SearchOptionsInput } from "../schemas.js";
import { getSessionManager, type SessionManager } from "../session-manager.js";
import { getPlaceNormalizer } from "../search/place-normalizer.js";
import { rvkOnlineUrl } from "../search/notation.js";
import { parsePica } from "../record/pica.js";
import { extractConcepts } from "../record/concept-extractor.js";
import { errorMessage, isToolError, timed } from "../utils.js";

// ============================================================================
// Result Types
// ============================================================================

export interface ClassificationSuggestion extends ClassificationResult {
  rvk_url: string;
}

export interface ClassifyConceptsResult {
  success: true;
  session_id: string;
  concepts: Concept[];
  results: ClassificationSuggestion[];
  result_count: number;
  duration_ms: number;
  message?: string;
}

export interface ClassifyRecordResult extends ClassifyConceptsResult {
  record: Omit<MetadataRecord, "fields">;
  extractor: string;
  priority_groups: string[];
}

const NO_RESULTS = "No classification found";

// ============================================================================
// Shared Search
// ============================================================================

async function runSearch(
  manager: SessionManager,
  tool: string,
  concepts: Concept[],
  options: SearchOptionsInput | undefined,
  signal: AbortSignal | undefined
): Promise<ClassifyConceptsResult> {
  const request = manager.recordRequest();
  const logger = manager.getLogger();
  const normalized = concepts.map(c => getPlaceNormalizer().normalize(c));

  await logger.info("search", tool, "Classification started", {
    request,
    concepts: normalized.map(c => ({ text: c.text, kind: c.kind, normalized: c.normalized })),
  });

  const engine = await manager.getEngine();
  const { result, duration_ms } = await timed(() =>
    engine.search(concepts, manager.searchOptions({ ...options, signal }))
  );

  await logger.info("search", tool, "Classification finished", {
    request,
    results: result.map(r => r.notation),
    duration_ms,
  });

  return {
    success: true,
    session_id: manager.getSessionId(),
    concepts: normalized,
    results: result.map(r => ({ ...r, rvk_url: rvkOnlineUrl(r.notation) })),
    result_count: result.length,
    duration_ms,
    message: result.length === 0 ? NO_RESULTS : undefined,
  };
}

async function reportFailure(manager: SessionManager, tool: string, err: unknown): Promise<ToolError> {
  if (!isToolError(err)) {
    await manager.getLogger().error("search", tool, "Unexpected failure", { error: errorMessage(err) });
    throw err;
  }

  const level = err.code === "CANCELLED" ? "info" : err.recoverable ? "warn" : "error";
  await manager.getLogger()[level]("search", tool, err.message, { code: err.code, details: err.details });
  return err;
}

// ============================================================================
// rvk_classify_concepts
// ============================================================================

export async function classifyConcepts(
  input: ClassifyConceptsInput,
  signal?: AbortSignal
): Promise<ClassifyConceptsResult | ToolError> {
  const manager = getSessionManager();
  const concepts: Concept[] = input.concepts.map((c, rank) => ({ text: c.text, kind: c.kind, rank }));

  try {
    return await runSearch(manager, "rvk_classify_concepts", concepts, input.options, signal);
  } catch (err) {
    return reportFailure(manager, "rvk_classify_concepts", err);
  }
}

// ============================================================================
// rvk_classify_record
// ============================================================================

export async function classifyRecord(
  input: ClassifyRecordInput,
  signal?: AbortSignal
): Promise<ClassifyRecordResult | ToolError> {
  const manager = getSessionManager();
  const config = manager.getConfig();

  try {
    const parsed = parsePica(input.record);
    const extraction = await extractConcepts(parsed, {
      ...config.extraction,
      llm_enabled: input.use_llm ?? config.extraction.llm_enabled,
    }, { logger: manager.getLogger() });

    const priority_groups = [...new Set([...(input.options?.priority_groups ?? []), ...extraction.priority_groups])];
    const search = await runSearch(manager, "rvk_classify_record", extraction.concepts, {
      ...input.options,
      priority_groups,
    }, signal);
    return {
      ...search,
      record: {
        title: parsed.title,
        authors: parsed.authors,
        year: parsed.year,
        publisher: parsed.publisher,
        subjects: parsed.subjects,
        abstract: parsed.abstract,
      },
      extractor: extraction.extractor,
      priority_groups,
    };
  } catch (err) {
    return reportFailure(manager, "rvk_classify_record", err);
  }
}
