/**
 * 🧠 Concept Extraction - RVK-Classifier-MCP
 *
 * Turns a parsed record into a ranked concept list for the search engine.
 * - HeuristicConceptExtractor: subject fields, discipline words, known places,
 *   form and period indicator words
 * - OpenAIConceptExtractor: chat model returning a JSON analysis, including
 *   the Hauptgruppen it expects the record under
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import type { ClassifierConfig, Concept, ConceptKind, MetadataRecord } from "../types.js";
import { getReferenceData, type IndicatorTable, type ReferenceData } from "../reference-data.js";
import { recordText } from "./pica.js";
import {
  ClassifierLogger,
  containsWord,
  createToolError,
  errorMessage,
  isToolError,
  normalizeTerm,
} from "../utils.js";

export interface Extraction {
  concepts: Concept[];
  /** Hauptgruppen letters the search should always traverse */
  priority_groups: string[];
}

export interface ConceptExtractor {
  readonly name: string;
  extract(record: MetadataRecord): Promise<Extraction>;
}

/**
 * Build ranked concepts from (kind, text) pairs, dropping blanks and
 * case-insensitive duplicates of the same kind
 */
export function rankConcepts(entries: Array<[ConceptKind, string | undefined]>): Concept[] {
  const seen = new Set<string>();
  const concepts: Concept[] = [];

  for (const [kind, text] of entries) {
    const trimmed = text?.trim();
    if (!trimmed) continue;

    const key = `${kind}:${normalizeTerm(trimmed)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    concepts.push({ text: trimmed, kind, rank: concepts.length });
  }
  return concepts;
}

function capitalize(term: string): string {
  return term.charAt(0).toUpperCase() + term.slice(1);
}

// ============================================================================
// Heuristic
// ============================================================================

export class HeuristicConceptExtractor implements ConceptExtractor {
  readonly name = "heuristic";

  constructor(private readonly data: ReferenceData = getReferenceData()) {}

  async extract(record: MetadataRecord): Promise<Extraction> {
    const text = recordText(record);
    const entries: Array<[ConceptKind, string]> = record.subjects.map(s => ["keyword", s]);

    for (const group of this.data.hauptgruppen.values()) {
      for (const discipline of group.disciplines) {
        if (containsWord(text, discipline)) {
          entries.push(["discipline", capitalize(discipline)]);
        }
      }
    }

    for (const surface of this.data.placeAliases.keys()) {
      if (containsWord(text, surface)) {
        entries.push(["place", capitalize(surface)]);
      }
    }

    entries.push(...matchIndicators(text, this.data.forms).map((f): [ConceptKind, string] => ["form", f]));
    entries.push(...matchIndicators(text, this.data.periods).map((p): [ConceptKind, string] => ["period", p]));

    return { concepts: rankConcepts(entries), priority_groups: [] };
  }
}

/**
 * Canonical names whose own name or an indicator word occurs in the text
 */
function matchIndicators(text: string, table: IndicatorTable): string[] {
  const found: string[] = [];
  for (const [canonical, name] of table.canonical) {
    if (!found.includes(name) && containsWord(text, canonical)) {
      found.push(name);
    }
  }
  return found;
}

// ============================================================================
// OpenAI
// ============================================================================

const AnalysisSchema = z.object({
  primaryKeyword: z.string().optional(),
  discipline: z.string().optional(),
  subjects: z.array(z.string()).default([]),
  places: z.array(z.string()).default([]),
  forms: z.array(z.string()).default([]),
  periods: z.array(z.string()).default([]),
  relatedGermanConcepts: z.array(z.string()).default([]),
  suggestedRVKPrefixes: z.array(z.string()).default([]),
});

export type RecordAnalysis = z.infer<typeof AnalysisSchema>;

export function buildAnalysisPrompt(record: MetadataRecord): string {
  const lines = [
    record.title ? `Title: ${record.title}` : "",
    record.authors.length > 0 ? `Authors: ${record.authors.join("; ")}` : "",
    record.year ? `Year: ${record.year}` : "",
    record.publisher ? `Publisher: ${record.publisher}` : "",
    record.subjects.length > 0 ? `Subjects: ${record.subjects.join("; ")}` : "",
    record.abstract ? `Abstract: ${record.abstract}` : "",
  ].filter(Boolean);

  return `Analyze the following library record for classification in the Regensburg Classification (RVK).

${lines.join("\n")}

Return a JSON object with these keys, all values in German:
- primaryKeyword: the single most representative subject term
- discipline: the main academic discipline (e.g. "Soziologie", "Chemie", "Informatik")
- subjects: array of subject keywords
- places: array of geographic names the work is about (cities, regions, countries, continents)
- forms: array of publication forms (e.g. "Lehrbuch", "Empirische Untersuchung", "Kongress", "Hochschulschrift")
- periods: array of historical periods covered (e.g. "Mittelalter", "20. Jahrhundert", "DDR")
- relatedGermanConcepts: array of related or synonymous terms likely to appear in RVK labels
- suggestedRVKPrefixes: array of RVK Hauptgruppen letters the record most likely belongs to (e.g. "M", "N")

Respond only with valid JSON.`;
}

/**
 * Parse the model's reply; tolerates prose around the JSON object
 *
 * @throws {ToolError} EXTRACTION_FAILED
 */
export function parseAnalysis(content: string): RecordAnalysis {
  const match = /\{[\s\S]*\}/.exec(content);
  if (!match) {
    throw createToolError("EXTRACTION_FAILED", "Model reply contains no JSON object", {
      details: { reply: content.slice(0, 200) },
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(match[0]);
  } catch (err) {
    throw createToolError("EXTRACTION_FAILED", `Model reply is not valid JSON: ${errorMessage(err)}`, {
      details: { reply: content.slice(0, 200) },
    });
  }

  const parsed = AnalysisSchema.safeParse(raw);
  if (!parsed.success) {
    throw createToolError("EXTRACTION_FAILED", "Model reply does not match the analysis format", {
      details: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function analysisToConcepts(analysis: RecordAnalysis): Concept[] {
  return rankConcepts([
    ["keyword", analysis.primaryKeyword],
    ["discipline", analysis.discipline],
    ...analysis.subjects.map((s): [ConceptKind, string] => ["keyword", s]),
    ...analysis.places.map((p): [ConceptKind, string] => ["place", p]),
    ...analysis.relatedGermanConcepts.map((c): [ConceptKind, string] => ["keyword", c]),
    ...analysis.forms.map((f): [ConceptKind, string] => ["form", f]),
    ...analysis.periods.map((p): [ConceptKind, string] => ["period", p]),
  ]);
}

/**
 * Hauptgruppen letters from the suggested prefixes ("MS 1000" → "M"),
 * keeping only letters the Hauptgruppen table knows
 */
export function priorityGroups(analysis: RecordAnalysis, data: ReferenceData = getReferenceData()): string[] {
  const groups: string[] = [];
  for (const prefix of analysis.suggestedRVKPrefixes) {
    const letter = prefix.trim().charAt(0).toUpperCase();
    if (data.hauptgruppen.has(letter) && !groups.includes(letter)) {
      groups.push(letter);
    }
  }
  return groups;
}

export class OpenAIConceptExtractor implements ConceptExtractor {
  readonly name = "openai";

  constructor(
    private readonly apiKey: string,
    private readonly settings: ClassifierConfig["extraction"]
  ) {}

  async extract(record: MetadataRecord): Promise<Extraction> {
    const OpenAI = (await import("openai")).default;
    const client = new OpenAI({ apiKey: this.apiKey, baseURL: this.settings.base_url });

    let content: string | null | undefined;
    try {
      const response = await client.chat.completions.create({
        model: this.settings.model,
        messages: [{ role: "user", content: buildAnalysisPrompt(record) }],
        temperature: this.settings.temperature,
        max_tokens: this.settings.max_tokens,
      });
      content = response.choices[0]?.message.content;
    } catch (err) {
      throw createToolError("EXTRACTION_FAILED", `Chat completion failed: ${errorMessage(err)}`, {
        details: { model: this.settings.model },
        recoverable: true,
      });
    }

    if (!content) {
      throw createToolError("EXTRACTION_FAILED", "Chat completion returned no content", {
        details: { model: this.settings.model },
      });
    }
    const analysis = parseAnalysis(content);
    return { concepts: analysisToConcepts(analysis), priority_groups: priorityGroups(analysis) };
  }
}

// ============================================================================
// Selection with fallback
// ============================================================================

export interface ExtractionResult extends Extraction {
  extractor: string;
}

/**
 * Extract concepts with the model when enabled and a key is configured,
 * falling back to the heuristic extractor on any extraction failure.
 */
export async function extractConcepts(
  record: MetadataRecord,
  settings: ClassifierConfig["extraction"],
  options: {
    logger?: ClassifierLogger;
    env?: NodeJS.ProcessEnv;
    llm?: ConceptExtractor;
    heuristic?: ConceptExtractor;
  } = {}
): Promise<ExtractionResult> {
  const heuristic = options.heuristic ?? new HeuristicConceptExtractor();
  const apiKey = (options.env ?? process.env)[settings.api_key_env];

  const llm = settings.llm_enabled
    ? options.llm ?? (apiKey ? new OpenAIConceptExtractor(apiKey, settings) : undefined)
    : undefined;

  if (llm) {
    try {
      const extraction = await llm.extract(record);
      if (extraction.concepts.length > 0) {
        return { ...extraction, extractor: llm.name };
      }
      await options.logger?.warn("extract", llm.name, "Model returned no concepts, using heuristic extraction");
    } catch (err) {
      if (!isToolError(err) || err.code !== "EXTRACTION_FAILED") {
        throw err;
      }
      await options.logger?.warn("extract", llm.name, "Model extraction failed, using heuristic extraction", {
        error: errorMessage(err),
      });
    }
  }

  return { ...(await heuristic.extract(record)), extractor: heuristic.name };
}
