/**
 * RVK-Classifier-MCP: Notation Helpers
 *
 * RVK level names and display formatting for notations and paths.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { HierarchyLevel, NotationNode } from "../types.js";

const RVK_ONLINE_BASE = "https://rvk.uni-regensburg.de/regensburger-verbundklassifikation-online";
const MAX_LABEL_CHARS = 70;

/**
 * RVK level of a notation.
 * For ranges ("AN 70000 - AN 79900") the lower bound decides.
 *
 * @example
 * hierarchyLevel("M")            // "Hauptgruppe"
 * hierarchyLevel("MS")           // "Untergruppe"
 * hierarchyLevel("MS 1000")      // "Feingruppe"
 * hierarchyLevel("MS 1000 G4")   // "Feingruppe + Schlüssel"
 */
export function hierarchyLevel(notation: string): HierarchyLevel {
  const lower = notation.split(" - ")[0].trim();
  const parts = lower.split(/\s+/).filter(p => p.length > 0);

  if (parts.length === 1) {
    if (/^[A-Z]$/.test(parts[0])) return "Hauptgruppe";
    if (/^[A-Z]{2,}$/.test(parts[0])) return "Untergruppe";
    return "Unbekannt";
  }
  if (parts.length === 2) {
    return /^[A-Z]+$/.test(parts[0]) && /^\d+$/.test(parts[1]) ? "Feingruppe" : "Unbekannt";
  }
  if (parts.length >= 3) {
    return "Feingruppe + Schlüssel";
  }
  return "Unbekannt";
}

function truncateLabel(label: string): string {
  return label.length > MAX_LABEL_CHARS ? label.slice(0, MAX_LABEL_CHARS - 3) + "..." : label;
}

/**
 * One-line display of a hierarchy path
 *
 * @example
 * formatPath(nodes) // "A (Naturwissenschaften) → A1 (Chemie)"
 */
export function formatPath(nodes: readonly NotationNode[]): string {
  return nodes
    .filter(n => n.notation && n.label)
    .map(n => `${n.notation} (${truncateLabel(n.label)})`)
    .join(" → ");
}

/**
 * Link to the notation in RVK Online
 */
export function rvkOnlineUrl(notation: string): string {
  return `${RVK_ONLINE_BASE}#notation=${encodeURIComponent(notation)}`;
}
