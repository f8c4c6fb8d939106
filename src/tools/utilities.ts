/**
 * RVK-Classifier-MCP: Utility Tools
 *
 * Hierarchy lookup, place normalization and session management.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ClassifierConfig, HierarchyLevel, NotationNode, ToolError } from "../types.js";
import type { GetNodeInput, NormalizePlaceInput } from "../schemas.js";
import { getSessionManager, type SessionInfo } from "../session-manager.js";
import { PathReconstructor } from "../search/path-reconstructor.js";
import { getPlaceNormalizer } from "../search/place-normalizer.js";
import { formatPath, hierarchyLevel, rvkOnlineUrl } from "../search/notation.js";
import { describeNotation, getReferenceData, type NotationDescription } from "../reference-data.js";
import { isToolError } from "../utils.js";

// ============================================================================
// Get Node
// ============================================================================

export interface GetNodeResult {
  success: true;
  node: NotationNode;
  path: string[];
  path_display: string;
  hierarchy_level: HierarchyLevel;
  rvk_url: string;
  /** Description of the Hauptgruppe and Untergruppe from the reference table */
  subject_area?: NotationDescription;
  children?: NotationNode[];
}

export async function getNode(input: GetNodeInput, signal?: AbortSignal): Promise<GetNodeResult | ToolError> {
  const manager = getSessionManager();

  try {
    const accessor = await manager.getAccessor();
    const node = await accessor.getNode(input.notation, signal);
    const nodes = await new PathReconstructor(accessor).buildNodePath(node, signal);
    const children = input.include_children ? await accessor.getChildren(node.notation, signal) : undefined;

    return {
      success: true,
      node,
      path: nodes.map(n => n.label),
      path_display: formatPath(nodes),
      hierarchy_level: hierarchyLevel(node.notation),
      rvk_url: rvkOnlineUrl(node.notation),
      subject_area: describeNotation(getReferenceData(), node.notation),
      children,
    };
  } catch (err) {
    if (!isToolError(err)) throw err;
    await manager.getLogger().warn("lookup", "rvk_get_node", err.message, { code: err.code, notation: input.notation });
    return err;
  }
}

// ============================================================================
// Normalize Place
// ============================================================================

export interface NormalizePlaceResult {
  success: true;
  place: string;
  normalized: string;
  /** Whether the alias table knows the place */
  resolved: boolean;
  is_country: boolean;
  is_continent: boolean;
}

export function normalizePlace(input: NormalizePlaceInput): NormalizePlaceResult {
  const normalizer = getPlaceNormalizer();
  const concept = normalizer.normalize({ text: input.place, kind: "place", rank: 0 });
  const normalized = concept.normalized ?? input.place;

  return {
    success: true,
    place: input.place,
    normalized,
    resolved: normalizer.countryOf(input.place) !== undefined,
    is_country: normalizer.isCountry(normalized),
    is_continent: normalizer.isContinent(normalized),
  };
}

// ============================================================================
// Session
// ============================================================================

export interface SessionInfoResult extends SessionInfo {
  success: true;
  hierarchy_source: {
    source: string;
    base_url?: string;
    file_path?: string;
    authenticated: boolean;
  };
  search_defaults: ClassifierConfig["search"];
}

export function sessionInfo(): SessionInfoResult {
  const manager = getSessionManager();
  const config = manager.getConfig();

  return {
    success: true,
    ...manager.info(),
    hierarchy_source: {
      source: config.hierarchy.source,
      base_url: config.hierarchy.source === "rvk-api" ? config.hierarchy.base_url : undefined,
      file_path: config.hierarchy.source === "file" ? config.hierarchy.file_path : undefined,
      authenticated: config.hierarchy.api_key !== undefined,
    },
    search_defaults: config.search,
  };
}

export async function sessionReset(): Promise<SessionInfoResult> {
  await getSessionManager().reset();
  return sessionInfo();
}
