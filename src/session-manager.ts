/**
 * RVK-Classifier-MCP: Session Manager
 *
 * Owns the configuration, the logger and the session-scoped hierarchy cache.
 * A session starts with an empty cache; reset() discards it and starts anew.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import * as fs from "fs/promises";
import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import type { ClassifierConfig } from "./types.js";
import type { HierarchySource } from "./hierarchy/source.js";
import { HierarchyAccessor, type AccessorStats } from "./hierarchy/accessor.js";
import { MemoryHierarchySource } from "./hierarchy/memory-source.js";
import { RvkApiSource } from "./hierarchy/rvk-api.js";
import { HierarchicalSearchEngine, type SearchOptions } from "./search/search-engine.js";
import { defaultScoringContext } from "./search/scoring.js";
import { ClassifierLogger, createToolError, now, pathExists } from "./utils.js";

export const CONFIG_FILE_NAME = "rvk-classifier.config.json";

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: ClassifierConfig = {
  version: "1.0.0",

  hierarchy: {
    source: "rvk-api",
    base_url: "https://rvk.uni-regensburg.de/api",
    timeout_ms: 10000,
    retries: 2,
    backoff_ms: 500,
    user_agent: "RVK-Classifier/0.1",
  },

  search: {
    max_results: 10,
    expand_threshold: 0.3,
    candidate_threshold: 0.6,
    max_depth: 12,
    max_nodes: 5000,
    concurrency: 4,
    rank_decay: 0.05,
  },

  extraction: {
    llm_enabled: true,
    model: "gpt-4o-mini",
    api_key_env: "OPENAI_API_KEY",
    temperature: 0.3,
    max_tokens: 1000,
  },

  logging: {
    level: "info",
  },
};

// ============================================================================
// Validation
// ============================================================================

const HierarchyConfigSchema = z.object({
  source: z.enum(["rvk-api", "file"]),
  base_url: z.string().url(),
  api_key: z.string().min(1).optional(),
  file_path: z.string().min(1).optional(),
  timeout_ms: z.number().int().positive(),
  retries: z.number().int().min(0).max(10),
  backoff_ms: z.number().int().min(0),
  user_agent: z.string().min(1),
});

const SearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(100),
  expand_threshold: z.number().min(0).max(1),
  candidate_threshold: z.number().min(0).max(1),
  max_depth: z.number().int().min(1).max(50),
  max_nodes: z.number().int().min(1),
  concurrency: z.number().int().min(1).max(32),
  rank_decay: z.number().min(0).max(1),
});

const ExtractionConfigSchema = z.object({
  llm_enabled: z.boolean(),
  base_url: z.string().url().optional(),
  model: z.string().min(1),
  api_key_env: z.string().min(1),
  temperature: z.number().min(0).max(2),
  max_tokens: z.number().int().positive(),
});

const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  log_dir: z.string().min(1).optional(),
});

export const ConfigSchema = z.object({
  version: z.string(),
  hierarchy: HierarchyConfigSchema,
  search: SearchConfigSchema,
  extraction: ExtractionConfigSchema,
  logging: LoggingConfigSchema,
}).refine(c => c.hierarchy.source !== "file" || c.hierarchy.file_path !== undefined, {
  message: "hierarchy.file_path is required when hierarchy.source is 'file'",
  path: ["hierarchy", "file_path"],
});

/** Config file: every section and key optional */
const ConfigFileSchema = z.object({
  version: z.string().optional(),
  hierarchy: HierarchyConfigSchema.partial().optional(),
  search: SearchConfigSchema.partial().optional(),
  extraction: ExtractionConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
}).strict();

/**
 * Load configuration: defaults, then `rvk-classifier.config.json` in baseDir,
 * then environment variables.
 *
 * @throws {ToolError} CONFIG_INVALID
 */
export async function loadConfig(baseDir: string, env: NodeJS.ProcessEnv = process.env): Promise<ClassifierConfig> {
  const filePath = path.join(baseDir, CONFIG_FILE_NAME);
  let file: z.infer<typeof ConfigFileSchema> = {};

  if (await pathExists(filePath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
    } catch (err) {
      throw createToolError("CONFIG_INVALID", `Cannot read ${CONFIG_FILE_NAME}: ${String(err)}`, {
        details: { path: filePath },
      });
    }
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw createToolError("CONFIG_INVALID", `Invalid ${CONFIG_FILE_NAME}`, {
        details: { path: filePath, issues: parsed.error.issues },
      });
    }
    file = parsed.data;
  }

  const merged = {
    version: file.version ?? DEFAULT_CONFIG.version,
    hierarchy: {
      ...DEFAULT_CONFIG.hierarchy,
      ...file.hierarchy,
      ...(env.RVK_API_BASE_URL ? { base_url: env.RVK_API_BASE_URL } : {}),
      ...(env.RVK_API_KEY ? { api_key: env.RVK_API_KEY } : {}),
      ...(env.RVK_HIERARCHY_FILE ? { source: "file" as const, file_path: env.RVK_HIERARCHY_FILE } : {}),
    },
    search: { ...DEFAULT_CONFIG.search, ...file.search },
    extraction: { ...DEFAULT_CONFIG.extraction, ...file.extraction },
    logging: {
      ...DEFAULT_CONFIG.logging,
      ...file.logging,
      ...(env.RVK_LOG_DIR ? { log_dir: env.RVK_LOG_DIR } : {}),
      ...(env.RVK_LOG_LEVEL ? { level: env.RVK_LOG_LEVEL } : {}),
    },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw createToolError("CONFIG_INVALID", "Invalid configuration", {
      details: result.error.issues,
      suggestion: `Check ${CONFIG_FILE_NAME} and the RVK_* environment variables`,
    });
  }

  const config: ClassifierConfig = result.data;
  if (config.hierarchy.file_path && !path.isAbsolute(config.hierarchy.file_path)) {
    config.hierarchy.file_path = path.resolve(baseDir, config.hierarchy.file_path);
  }
  if (config.logging.log_dir && !path.isAbsolute(config.logging.log_dir)) {
    config.logging.log_dir = path.resolve(baseDir, config.logging.log_dir);
  }
  return config;
}

/**
 * Hierarchy source selected by `hierarchy.source`
 */
export async function createHierarchySource(config: ClassifierConfig["hierarchy"]): Promise<HierarchySource> {
  if (config.source === "file") {
    if (!config.file_path) {
      throw createToolError("CONFIG_INVALID", "hierarchy.file_path is not set");
    }
    return MemoryHierarchySource.fromFile(config.file_path);
  }

  return new RvkApiSource({
    base_url: config.base_url,
    api_key: config.api_key,
    timeout_ms: config.timeout_ms,
    user_agent: config.user_agent,
  });
}

// ============================================================================
// Session Manager Class
// ============================================================================

export interface SessionInfo {
  session_id: string;
  started_at: string;
  requests: number;
  hierarchy: AccessorStats | null;
}

export class SessionManager {
  private config: ClassifierConfig;
  private logger: ClassifierLogger;
  private sourceFactory: (config: ClassifierConfig["hierarchy"]) => Promise<HierarchySource>;

  private sessionId = uuidv7();
  private startedAt = now();
  private requests = 0;
  private accessor: Promise<HierarchyAccessor> | null = null;
  private loadedAccessor: HierarchyAccessor | null = null;

  constructor(
    config: ClassifierConfig,
    options: {
      logger?: ClassifierLogger;
      sourceFactory?: (config: ClassifierConfig["hierarchy"]) => Promise<HierarchySource>;
    } = {}
  ) {
    this.config = config;
    this.logger = options.logger ?? new ClassifierLogger({
      level: config.logging.level,
      logDir: config.logging.log_dir,
    });
    this.sourceFactory = options.sourceFactory ?? createHierarchySource;
  }

  // --------------------------------------------------------------------------
  // Session Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Hierarchy accessor of the current session, created on first use
   */
  getAccessor(): Promise<HierarchyAccessor> {
    if (!this.accessor) {
      const pending = this.createAccessor();
      this.accessor = pending;
      pending.catch(() => {
        // A failed source setup is retried on the next request
        if (this.accessor === pending) this.accessor = null;
      });
    }
    return this.accessor;
  }

  async getEngine(): Promise<HierarchicalSearchEngine> {
    const accessor = await this.getAccessor();
    return new HierarchicalSearchEngine(accessor, defaultScoringContext(), this.logger);
  }

  /**
   * Search options from config, overridden per request
   */
  searchOptions(overrides: SearchOptions = {}): SearchOptions {
    return { ...this.config.search, ...overrides };
  }

  /**
   * Drop the node cache and start a new session
   */
  async reset(): Promise<SessionInfo> {
    const previous = this.sessionId;
    const stats = this.loadedAccessor?.stats() ?? null;

    this.sessionId = uuidv7();
    this.startedAt = now();
    this.requests = 0;
    this.accessor = null;
    this.loadedAccessor = null;

    await this.logger.info("session", "rvk_session_reset", "Session reset", {
      previous_session: previous,
      session_id: this.sessionId,
      discarded: stats,
    });
    return this.info();
  }

  recordRequest(): number {
    return ++this.requests;
  }

  info(): SessionInfo {
    return {
      session_id: this.sessionId,
      started_at: this.startedAt,
      requests: this.requests,
      hierarchy: this.loadedAccessor?.stats() ?? null,
    };
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  getConfig(): ClassifierConfig {
    return this.config;
  }

  getLogger(): ClassifierLogger {
    return this.logger;
  }

  getSessionId(): string {
    return this.sessionId;
  }

  private async createAccessor(): Promise<HierarchyAccessor> {
    const session = this.sessionId;
    const source = await this.sourceFactory(this.config.hierarchy);
    const accessor = new HierarchyAccessor(source, {
      retries: this.config.hierarchy.retries,
      backoff_ms: this.config.hierarchy.backoff_ms,
      max_depth: this.config.search.max_depth,
      logger: this.logger,
    });
    if (this.sessionId === session) {
      this.loadedAccessor = accessor;
    }

    await this.logger.debug("session", source.name, "Hierarchy source ready", { session_id: this.sessionId });
    return accessor;
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let globalManager: SessionManager | null = null;

export function initSessionManager(
  config: ClassifierConfig,
  options?: ConstructorParameters<typeof SessionManager>[1]
): SessionManager {
  globalManager = new SessionManager(config, options);
  return globalManager;
}

export function getSessionManager(): SessionManager {
  if (!globalManager) {
    throw new Error("SessionManager not initialized. Call initSessionManager first.");
  }
  return globalManager;
}
