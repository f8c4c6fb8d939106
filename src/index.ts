#!/usr/bin/env node
/**
 * RVK-Classifier-MCP: Main Server Entry Point
 *
 * Classifies bibliographic records against the Regensburg Classification (RVK).
 * Pipeline: PICA record → concepts → place normalization → hierarchical search → paths
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 *
 * This source code is the property of vario.automation and is protected
 * by trade secret and copyright law. Unauthorized copying, modification,
 * distribution, or use of this software is strictly prohibited.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import * as path from "path";

import { classifyConcepts, classifyRecord } from "./tools/classify.js";
import { getNode, normalizePlace, sessionInfo, sessionReset } from "./tools/utilities.js";
import {
  ClassifyConceptsInputSchema,
  ClassifyRecordInputSchema,
  GetNodeInputSchema,
  NormalizePlaceInputSchema,
  SessionInfoInputSchema,
  SessionResetInputSchema,
} from "./schemas.js";
import { initSessionManager, loadConfig } from "./session-manager.js";
import { resolveDataDir } from "./reference-data.js";
import { errorMessage, formatErrorResponse, isToolError } from "./utils.js";

const server = new McpServer({
  name: "rvk-classifier-mcp",
  version: "0.1.0",
});

function respond(result: unknown) {
  if (isToolError(result)) {
    return formatErrorResponse(result);
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

// ============================================================================
// CLASSIFICATION TOOLS
// ============================================================================

server.tool(
  "rvk_classify_concepts",
  `🏷️ Find the most specific RVK notations for a ranked list of concepts.

WHAT THIS DOES:
1. Normalizes place names to their country ("Chemnitz" → "Deutschland")
2. Scores the RVK Hauptgruppen and walks the tree breadth-first
3. Keeps the deepest match per branch; a country node wins over its regions
4. Returns notation, full path, confidence and contributing concepts

Concepts are given most salient first. Form and period concepts (Lehrbuch, DDR) refine
matches below the Hauptgruppen. options.priority_groups names Hauptgruppen to always search.
An empty result means no classification was found.`,
  ClassifyConceptsInputSchema.shape,
  async (args, extra) => respond(await classifyConcepts(args, extra.signal))
);

server.tool(
  "rvk_classify_record",
  `📚 Classify a PICA record (PICA3 or PICA+) against the RVK.

Parses title, authors, year, publisher, subjects and abstract, extracts concepts
(chat model when configured, otherwise subject fields and known disciplines/places)
and runs the hierarchical search.`,
  ClassifyRecordInputSchema.shape,
  async (args, extra) => respond(await classifyRecord(args, extra.signal))
);

// ============================================================================
// LOOKUP TOOLS
// ============================================================================

server.tool(
  "rvk_get_node",
  "Look up one RVK notation: label, depth, full path, RVK level and optionally its children.",
  GetNodeInputSchema.shape,
  async (args, extra) => respond(await getNode(args, extra.signal))
);

server.tool(
  "rvk_normalize_place",
  "Map a place name (city, region, adjective) to its country or continent as used for RVK matching.",
  NormalizePlaceInputSchema.shape,
  async (args) => respond(normalizePlace(args))
);

// ============================================================================
// SESSION TOOLS
// ============================================================================

server.tool(
  "rvk_session_reset",
  "Discard the cached RVK nodes and start a new session.",
  SessionResetInputSchema.shape,
  async () => respond(await sessionReset())
);

server.tool(
  "rvk_session_info",
  "Show the current session: id, request count, hierarchy source and cache statistics.",
  SessionInfoInputSchema.shape,
  async () => respond(sessionInfo())
);

// ============================================================================
// SERVER STARTUP
// ============================================================================

async function main() {
  // Installation directory: the one holding data/, from src/ and dist/src/ alike
  const baseDir = path.dirname(resolveDataDir());
  const config = await loadConfig(baseDir);
  const manager = initSessionManager(config);
  const logger = manager.getLogger();
  await logger.init();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  await logger.info("startup", "server", "RVK-Classifier-MCP server started", {
    session_id: manager.getSessionId(),
    source: config.hierarchy.source,
    base_url: config.hierarchy.source === "rvk-api" ? config.hierarchy.base_url : undefined,
    file_path: config.hierarchy.file_path,
    llm_enabled: config.extraction.llm_enabled,
    log_dir: config.logging.log_dir,
  });
}

main().catch((error: unknown) => {
  if (isToolError(error)) {
    console.error(formatErrorResponse(error).content[0].text);
  } else {
    console.error("Fatal error:", errorMessage(error));
  }
  process.exit(1);
});
