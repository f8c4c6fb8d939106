/**
 * RVK-Classifier-MCP: RVK Web API Source
 *
 * Reads the RVK hierarchy from the public RVK API (XML format):
 *   GET {base}/xml/children               → Hauptgruppen
 *   GET {base}/xml/children/{notation}    → node with its children
 *   GET {base}/xml/ancestors/{notation}   → node with nested ancestor chain
 *
 * HTTP 404 or an <error> document means "unknown notation".
 * Network failures, timeouts, 429 and 5xx are transient.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type { RawNode } from "../types.js";
import { TransientSourceError, type HierarchySource } from "./source.js";
import { asArray, createToolError } from "../utils.js";

// ============================================================================
// XML Shapes
// ============================================================================

const XmlNodeSchema = z.object({
  "@_notation": z.string().min(1),
  "@_benennung": z.string().default(""),
  "@_has_children": z.string().optional(),
}).passthrough();

type XmlNode = z.infer<typeof XmlNodeSchema>;

const XmlElementSchema = z.record(z.unknown());

function getProp(value: unknown, key: string): unknown {
  const element = XmlElementSchema.safeParse(value);
  return element.success ? element.data[key] : undefined;
}

function toRawNode(node: XmlNode, parentId?: string): RawNode {
  return {
    notation: node["@_notation"].trim(),
    label: node["@_benennung"].trim(),
    parent_id: parentId,
    has_children: node["@_has_children"] === undefined ? undefined : node["@_has_children"] === "yes",
  };
}

/**
 * Parse the `node` entries of a `<children>` element
 */
function readNodeList(container: unknown, parentId?: string): RawNode[] {
  const nodes: RawNode[] = [];
  for (const item of asArray(getProp(container, "node"))) {
    const parsed = XmlNodeSchema.safeParse(item);
    if (parsed.success) {
      nodes.push(toRawNode(parsed.data, parentId));
    }
  }
  return nodes;
}

// ============================================================================
// Client
// ============================================================================

export interface RvkApiOptions {
  base_url: string;
  api_key?: string;
  timeout_ms: number;
  user_agent: string;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

export class RvkApiSource implements HierarchySource {
  readonly name = "rvk-api";
  private parser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: "@_" });
  private fetchImpl: typeof fetch;

  constructor(private readonly options: RvkApiOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchTopLevel(): Promise<RawNode[]> {
    const doc = await this.get("children");
    if (doc === null) return [];

    // Either <children><node/>…</children> or <node><children>…</children></node>
    const direct = getProp(doc, "children");
    if (direct !== undefined) return readNodeList(direct);
    return readNodeList(getProp(getProp(doc, "node"), "children"));
  }

  async fetchNode(notation: string): Promise<RawNode | null> {
    const doc = await this.get(`ancestors/${encodeURIComponent(notation)}`);
    if (doc === null) return null;

    const parsed = XmlNodeSchema.safeParse(getProp(doc, "node"));
    if (!parsed.success) return null;

    const parent = XmlNodeSchema.safeParse(getProp(getProp(parsed.data, "ancestor"), "node"));
    return toRawNode(parsed.data, parent.success ? parent.data["@_notation"].trim() : undefined);
  }

  async fetchChildren(notation: string): Promise<RawNode[] | null> {
    const doc = await this.get(`children/${encodeURIComponent(notation)}`);
    if (doc === null) return null;

    const parsed = XmlNodeSchema.safeParse(getProp(doc, "node"));
    if (!parsed.success) return null;

    const parentId = parsed.data["@_notation"].trim();
    return readNodeList(getProp(parsed.data, "children"), parentId);
  }

  /**
   * GET an API path and parse the XML body; null for unknown notations
   */
  private async get(apiPath: string): Promise<unknown | null> {
    const url = `${this.options.base_url.replace(/\/+$/, "")}/xml/${apiPath}`;

    const headers: Record<string, string> = {
      "Accept": "application/xml",
      "User-Agent": this.options.user_agent,
    };
    if (this.options.api_key) {
      headers["Authorization"] = `Bearer ${this.options.api_key}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeout_ms);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers, signal: controller.signal });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new TransientSourceError(`Request timed out after ${this.options.timeout_ms}ms: ${url}`);
      }
      throw new TransientSourceError(`Failed to fetch ${url}: ${String(err)}`);
    } finally {
      clearTimeout(timeout);
    }

    if (response.status === 404) {
      return null;
    }
    if (response.status === 429 || response.status >= 500) {
      throw new TransientSourceError(`HTTP ${response.status}: ${response.statusText}`, response.status);
    }
    if (!response.ok) {
      throw createToolError("UPSTREAM_UNAVAILABLE", `HTTP ${response.status}: ${response.statusText}`, {
        details: { url, status: response.status },
        recoverable: false,
        suggestion: response.status === 401 || response.status === 403
          ? "Check hierarchy.api_key / RVK_API_KEY"
          : "Check hierarchy.base_url",
      });
    }

    const xml = await response.text();
    let doc: unknown;
    try {
      doc = this.parser.parse(xml);
    } catch (err) {
      throw createToolError("PARSE_ERROR", `Invalid XML from RVK API: ${String(err)}`, {
        details: { url },
      });
    }

    if (getProp(doc, "error") !== undefined) {
      return null;
    }
    return doc;
  }
}
