/**
 * 🌍 Place Normalizer - RVK-Classifier-MCP
 *
 * Maps a geographic surface form (city, region, adjective) to its canonical
 * country or continent so that "Chemnitz" is searched as "Deutschland".
 * Exact, case-insensitive lookup in the static alias table; no fuzzy matching.
 * The region table says which regions contain a place ("Chemnitz" → Sachsen).
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { Concept } from "../types.js";
import { getReferenceData } from "../reference-data.js";
import { normalizeTerm } from "../utils.js";

export class PlaceNormalizer {
  constructor(
    private readonly aliases: ReadonlyMap<string, string>,
    private readonly countries: ReadonlySet<string>,
    private readonly continents: ReadonlySet<string> = new Set(),
    private readonly regions: ReadonlyMap<string, readonly string[]> = new Map()
  ) {}

  /**
   * Return the concept with `normalized` set. Non-place concepts pass through
   * unchanged; unknown places keep their literal text.
   *
   * @example
   * normalizer.normalize({ text: "Chemnitz", kind: "place", rank: 0 })
   * // { text: "Chemnitz", kind: "place", rank: 0, normalized: "Deutschland" }
   */
  normalize(concept: Concept): Concept {
    if (concept.kind !== "place") {
      return concept;
    }
    return { ...concept, normalized: this.countryOf(concept.text) ?? concept.text };
  }

  /** Canonical country (or continent) for a surface form, if the table knows it */
  countryOf(text: string): string | undefined {
    return this.aliases.get(normalizeTerm(text));
  }

  /** Whether the text is itself a canonical country name */
  isCountry(text: string): boolean {
    return this.countries.has(normalizeTerm(text));
  }

  isContinent(text: string): boolean {
    return this.continents.has(normalizeTerm(text));
  }

  /**
   * Lowercase names of the regions containing a place
   *
   * @example
   * normalizer.regionsContaining("Dresden") // ["sachsen", "ostdeutschland"]
   */
  regionsContaining(text: string): readonly string[] {
    return this.regions.get(normalizeTerm(text)) ?? [];
  }
}

let shared: PlaceNormalizer | null = null;

/**
 * Normalizer over the bundled alias table
 */
export function getPlaceNormalizer(): PlaceNormalizer {
  if (!shared) {
    const data = getReferenceData();
    shared = new PlaceNormalizer(data.placeAliases, data.countries, data.continents, data.regions);
  }
  return shared;
}
