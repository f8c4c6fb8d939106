/**
 * RVK-Classifier-MCP: Static Reference Tables
 *
 * Hauptgruppe → discipline mapping, place alias and region tables, keyword
 * aliases and form/period indicators. Loaded once from data/*.json and shared read-only for the process lifetime.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { readFileSync, existsSync } from "fs";
import { fileURLToPath } from "url";
import * as path from "path";
import { z } from "zod";
import { createToolError, normalizeTerm } from "./utils.js";

// ============================================================================
// Schemas
// ============================================================================

const HauptgruppenFileSchema = z.object({
  groups: z.array(z.object({
    notation: z.string().min(1),
    description: z.string(),
    disciplines: z.array(z.string()),
    subgroups: z.record(z.string()),
  })),
});

const PlaceAliasFileSchema = z.object({
  countries: z.record(z.array(z.string())),
  continents: z.record(z.array(z.string())).default({}),
  /** Region → places lying inside it */
  regions: z.record(z.array(z.string())).default({}),
});

const IndicatorFileSchema = z.object({
  forms: z.record(z.array(z.string())),
  periods: z.record(z.array(z.string())),
});

const KeywordAliasFileSchema = z.object({
  keywords: z.record(z.array(z.string())),
});

export type HauptgruppeEntry = z.infer<typeof HauptgruppenFileSchema>["groups"][number];

export interface ReferenceData {
  /** Hauptgruppe letter → entry */
  hauptgruppen: ReadonlyMap<string, HauptgruppeEntry>;
  /** Lowercase place surface form → canonical country or continent */
  placeAliases: ReadonlyMap<string, string>;
  /** Lowercase canonical country names */
  countries: ReadonlySet<string>;
  /** Lowercase canonical continent names */
  continents: ReadonlySet<string>;
  /** Lowercase place → lowercase regions containing it */
  regions: ReadonlyMap<string, readonly string[]>;
  /** Lowercase keyword → related lowercase terms */
  keywordAliases: ReadonlyMap<string, readonly string[]>;
  forms: IndicatorTable;
  periods: IndicatorTable;
}

export interface IndicatorTable {
  /** Lowercase canonical name or indicator word → canonical name */
  canonical: ReadonlyMap<string, string>;
  /** Lowercase canonical name → lowercase indicator words */
  indicators: ReadonlyMap<string, readonly string[]>;
}

// ============================================================================
// Loading
// ============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Locate the data/ directory both from src/ (tests) and dist/src/ (build)
 */
export function resolveDataDir(): string {
  const candidates = [
    path.resolve(__dirname, "..", "data"),
    path.resolve(__dirname, "..", "..", "data"),
  ];
  const found = candidates.find(dir => existsSync(path.join(dir, "hauptgruppen.json")));
  if (!found) {
    throw createToolError("CONFIG_INVALID", "Reference data directory not found", {
      details: { searched: candidates },
      suggestion: "Ensure the data/ directory ships next to src/ or dist/",
    });
  }
  return found;
}

function readTable<T>(dataDir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(readFileSync(path.join(dataDir, file), "utf-8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw createToolError("CONFIG_INVALID", `Invalid reference table ${file}`, {
      details: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Build the lookup structures from the raw tables
 */
export function buildReferenceData(tables: {
  hauptgruppen: z.infer<typeof HauptgruppenFileSchema>;
  places: z.infer<typeof PlaceAliasFileSchema>;
  keywords: z.infer<typeof KeywordAliasFileSchema>;
  indicators?: z.infer<typeof IndicatorFileSchema>;
}): ReferenceData {
  const hauptgruppen = new Map<string, HauptgruppeEntry>();
  for (const group of tables.hauptgruppen.groups) {
    hauptgruppen.set(group.notation.toUpperCase(), group);
  }

  const placeAliases = new Map<string, string>();
  const countries = new Set<string>();
  for (const [country, surfaces] of Object.entries(tables.places.countries)) {
    countries.add(normalizeTerm(country));
    placeAliases.set(normalizeTerm(country), country);
    for (const surface of surfaces) {
      placeAliases.set(normalizeTerm(surface), country);
    }
  }

  const continents = new Set<string>();
  for (const [continent, surfaces] of Object.entries(tables.places.continents)) {
    continents.add(normalizeTerm(continent));
    placeAliases.set(normalizeTerm(continent), continent);
    for (const surface of surfaces) {
      placeAliases.set(normalizeTerm(surface), continent);
    }
  }

  const regions = new Map<string, string[]>();
  for (const [region, members] of Object.entries(tables.places.regions)) {
    for (const member of members) {
      const key = normalizeTerm(member);
      regions.set(key, [...(regions.get(key) ?? []), normalizeTerm(region)]);
    }
  }

  const keywordAliases = new Map<string, readonly string[]>();
  for (const [keyword, related] of Object.entries(tables.keywords.keywords)) {
    keywordAliases.set(normalizeTerm(keyword), related.map(normalizeTerm));
  }

  return {
    hauptgruppen,
    placeAliases,
    countries,
    continents,
    regions,
    keywordAliases,
    forms: buildIndicatorTable(tables.indicators?.forms ?? {}),
    periods: buildIndicatorTable(tables.indicators?.periods ?? {}),
  };
}

function buildIndicatorTable(entries: Record<string, string[]>): IndicatorTable {
  const canonical = new Map<string, string>();
  const indicators = new Map<string, readonly string[]>();

  for (const [name, words] of Object.entries(entries)) {
    const key = normalizeTerm(name);
    canonical.set(key, name);
    for (const word of words) {
      if (!canonical.has(normalizeTerm(word))) canonical.set(normalizeTerm(word), name);
    }
    indicators.set(key, words.map(normalizeTerm));
  }
  return { canonical, indicators };
}

export interface NotationDescription {
  hauptgruppe: string;
  description: string;
  subgroup?: string;
}

/**
 * Hauptgruppe and Untergruppe descriptions for a notation, where the table has them
 *
 * @example
 * describeNotation(data, "AN 1000")
 * // { hauptgruppe: "A", description: "General, ...", subgroup: "Book and Library Science" }
 */
export function describeNotation(
  data: ReferenceData,
  notation: string
): NotationDescription | undefined {
  const prefix = notation.trim().split(/\s+/)[0].toUpperCase();
  const group = data.hauptgruppen.get(prefix.charAt(0));
  if (!group) return undefined;

  return {
    hauptgruppe: group.notation,
    description: group.description,
    subgroup: prefix.length > 1 ? group.subgroups[prefix] : undefined,
  };
}

let cached: ReferenceData | null = null;

/**
 * Load the reference tables (once per process)
 */
export function getReferenceData(): ReferenceData {
  if (!cached) {
    const dataDir = resolveDataDir();
    cached = buildReferenceData({
      hauptgruppen: readTable(dataDir, "hauptgruppen.json", HauptgruppenFileSchema),
      places: readTable(dataDir, "place-aliases.json", PlaceAliasFileSchema),
      keywords: readTable(dataDir, "keyword-aliases.json", KeywordAliasFileSchema),
      indicators: readTable(dataDir, "form-period-indicators.json", IndicatorFileSchema),
    });
  }
  return cached;
}
