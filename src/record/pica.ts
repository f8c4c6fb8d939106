/**
 * RVK-Classifier-MCP: PICA Record Parser
 *
 * Parses PICA3 (K10plus "4000 ...") and PICA+ ("021A $a...") records into a
 * MetadataRecord. One field per line; `$x` starts subfield x.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { MetadataRecord } from "../types.js";
import { createToolError } from "../utils.js";

const FIELD_LINE = /^(\d{4}|\d{3}[A-Z@])(?:\/\d{2,3})?\s+(.+)$/;
const SUBFIELD = /\$([a-zA-Z0-9])([^$]*)/g;

/** PICA3 tag and its PICA+ equivalent, per metadata attribute */
const TAGS = {
  title: ["4000", "021A"],
  authors: ["3000", "028A"],
  year: ["1100", "011@"],
  publisher: ["4030", "033A"],
  subjects: ["5550", "044K"],
  abstract: ["4207", "047I"],
} as const;

/** PICA3 range of RSWK subject chains */
const RSWK_CHAIN = { from: 5100, to: 5199 };

export interface PicaField {
  tag: string;
  content: string;
  subfields: Record<string, string>;
}

/**
 * Split a record into fields. Lines that are not fields are skipped.
 */
export function parsePicaFields(text: string): PicaField[] {
  const fields: PicaField[] = [];

  for (const line of text.split(/\r?\n/).map(l => l.trim()).filter(Boolean)) {
    const match = FIELD_LINE.exec(line);
    if (!match) continue;

    const subfields: Record<string, string> = {};
    for (const sf of match[2].matchAll(SUBFIELD)) {
      // First occurrence of a code is the main one
      if (!(sf[1] in subfields)) {
        subfields[sf[1]] = sf[2].trim();
      }
    }
    fields.push({ tag: match[1], content: match[2].trim(), subfields });
  }

  return fields;
}

function mainContent(field: PicaField): string {
  return field.subfields["a"] ?? field.content;
}

function isRswkChain(tag: string): boolean {
  const n = Number(tag);
  return Number.isInteger(n) && n >= RSWK_CHAIN.from && n <= RSWK_CHAIN.to;
}

/**
 * Parse a PICA record.
 *
 * @throws {ToolError} PARSE_ERROR when the text contains no PICA field
 *
 * @example
 * parsePica("4000 Migration in Sachsen\n1100 2021").title // "Migration in Sachsen"
 */
export function parsePica(text: string): MetadataRecord {
  const parsed = parsePicaFields(text);
  if (parsed.length === 0) {
    throw createToolError("PARSE_ERROR", "No PICA fields found in record", {
      suggestion: "Each field line starts with a tag such as '4000' or '021A'",
    });
  }

  const fields: Record<string, string[]> = {};
  for (const field of parsed) {
    (fields[field.tag] ??= []).push(mainContent(field));
  }

  const all = (tags: readonly string[]) => tags.flatMap(t => fields[t] ?? []);
  const first = (tags: readonly string[]) => all(tags)[0];

  const subjects = [
    ...all(TAGS.subjects),
    ...parsed.filter(f => isRswkChain(f.tag)).map(mainContent),
  ];

  return {
    title: first(TAGS.title),
    authors: all(TAGS.authors),
    year: first(TAGS.year),
    publisher: first(TAGS.publisher),
    subjects: [...new Set(subjects.filter(s => s.length > 0))],
    abstract: first(TAGS.abstract),
    fields,
  };
}

/**
 * Plain text of a record for keyword scanning
 */
export function recordText(record: MetadataRecord): string {
  return [record.title, ...record.subjects, record.abstract]
    .filter((s): s is string => typeof s === "string" && s.length > 0)
    .join(" ");
}
