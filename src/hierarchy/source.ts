/**
 * RVK-Classifier-MCP: Hierarchy Source Contract
 *
 * A hierarchy source is the transport to the RVK data (remote API or a
 * loaded dump). It knows nothing about caching, depth or retries.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { RawNode } from "../types.js";

export interface HierarchySource {
  /** Human-readable source name for logs */
  readonly name: string;

  /** List the Hauptgruppen in source order */
  fetchTopLevel(): Promise<RawNode[]>;

  /** Fetch one node including its parent id; null if the notation is unknown */
  fetchNode(notation: string): Promise<RawNode | null>;

  /** Fetch the children of a node; null if the notation is unknown */
  fetchChildren(notation: string): Promise<RawNode[] | null>;
}

/**
 * Transient transport failure; the accessor retries these.
 */
export class TransientSourceError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "TransientSourceError";
  }
}
