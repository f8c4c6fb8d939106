/**
 * Tool Handler Tests
 *
 * rvk_classify_concepts, rvk_classify_record, rvk_get_node,
 * rvk_normalize_place and the session tools against the in-memory excerpt.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { classifyConcepts, classifyRecord } from '../src/tools/classify.js';
import { getNode, normalizePlace, sessionInfo, sessionReset } from '../src/tools/utilities.js';
import { DEFAULT_CONFIG, initSessionManager } from '../src/session-manager.js';
import { MemoryHierarchySource } from '../src/hierarchy/memory-source.js';
import type { HierarchySource } from '../src/hierarchy/source.js';
import type { ToolError } from '../src/types.js';
import { isToolError, silentLogger } from '../src/utils.js';
import { createFixtureSource } from './helpers/rvk-fixture.js';

// ============================================================================
// Test Helpers
// ============================================================================

function useSource(source: HierarchySource): void {
  initSessionManager(DEFAULT_CONFIG, {
    logger: silentLogger(),
    sourceFactory: async () => source,
  });
}

function expectSuccess<T>(result: T | ToolError): T {
  if (isToolError(result)) {
    throw new Error(`Unexpected tool error ${result.code}: ${result.message}`);
  }
  return result;
}

function expectToolError(result: unknown): ToolError {
  if (!isToolError(result)) {
    throw new Error('Expected a tool error');
  }
  return result;
}

// ============================================================================
// Tests
// ============================================================================

describe('Tool handlers', () => {
  beforeEach(() => {
    useSource(createFixtureSource());
  });

  describe('rvk_classify_concepts', () => {
    it('should classify a place under its country', async () => {
      const result = expectSuccess(await classifyConcepts({ concepts: [{ text: 'Chemnitz', kind: 'place' }] }));

      expect(result.result_count).toBe(1);
      expect(result.results[0]).toMatchObject({
        notation: 'NQ',
        label: 'Deutschland',
        rvk_url: 'https://rvk.uni-regensburg.de/regensburger-verbundklassifikation-online#notation=NQ',
      });
      expect(result.concepts).toEqual([{ text: 'Chemnitz', kind: 'place', rank: 0, normalized: 'Deutschland' }]);
      expect(result.message).toBeUndefined();
    });

    it('should rank concepts by their position', async () => {
      const result = expectSuccess(await classifyConcepts({
        concepts: [{ text: 'Chemnitz', kind: 'keyword' }, { text: 'Chemnitz', kind: 'place' }],
      }));

      expect(result.concepts.map(c => c.rank)).toEqual([0, 1]);
      expect(result.results.map(r => r.notation)).toEqual(['NQ 1100']);
    });

    it('should report an empty result as no classification found', async () => {
      const result = expectSuccess(await classifyConcepts({ concepts: [] }));

      expect(result.results).toEqual([]);
      expect(result.result_count).toBe(0);
      expect(result.message).toBe('No classification found');
    });

    it('should apply per-request options', async () => {
      const result = expectSuccess(await classifyConcepts({
        concepts: [{ text: 'Migration', kind: 'keyword' }, { text: 'Soziologie', kind: 'discipline' }],
        options: { max_results: 1 },
      }));

      expect(result.results.map(r => r.notation)).toEqual(['MS 1000']);
    });

    it('should return a tool error for an empty hierarchy', async () => {
      useSource(new MemoryHierarchySource([], 'empty'));

      const error = expectToolError(await classifyConcepts({ concepts: [{ text: 'Chemnitz', kind: 'place' }] }));

      expect(error.code).toBe('EMPTY_HIERARCHY');
    });

    it('should return CANCELLED when the request is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = expectToolError(await classifyConcepts(
        { concepts: [{ text: 'Chemnitz', kind: 'place' }] },
        controller.signal
      ));

      expect(error.code).toBe('CANCELLED');
    });
  });

  describe('rvk_classify_record', () => {
    it('should classify a PICA record with the heuristic extractor', async () => {
      const result = expectSuccess(await classifyRecord({ record: '4000 Chemnitz\n5550 Chemnitz', use_llm: false }));

      expect(result.extractor).toBe('heuristic');
      expect(result.record).toMatchObject({ title: 'Chemnitz', authors: [], subjects: ['Chemnitz'] });
      expect(result.concepts.map(c => [c.text, c.kind])).toEqual([
        ['Chemnitz', 'keyword'],
        ['Chemnitz', 'place'],
      ]);
      expect(result.results.map(r => r.notation)).toEqual(['NQ 1100']);
      expect(result.priority_groups).toEqual([]);
    });

    it('should pass requested priority groups to the search', async () => {
      const result = expectSuccess(await classifyRecord({
        record: '4000 Chemnitz\n5550 Chemnitz',
        use_llm: false,
        options: { priority_groups: ['M'] },
      }));

      expect(result.priority_groups).toEqual(['M']);
      expect(result.results).toEqual([]);
      expect(result.message).toBe('No classification found');
    });

    it('should return PARSE_ERROR for text without PICA fields', async () => {
      const error = expectToolError(await classifyRecord({ record: 'kein PICA', use_llm: false }));

      expect(error.code).toBe('PARSE_ERROR');
    });
  });

  describe('rvk_get_node', () => {
    it('should return the node with its path and children', async () => {
      const result = expectSuccess(await getNode({ notation: 'NQ 1000', include_children: true }));

      expect(result.node).toMatchObject({ notation: 'NQ 1000', label: 'Sachsen', depth: 2 });
      expect(result.path).toEqual(['Geschichte', 'Deutschland', 'Sachsen']);
      expect(result.path_display).toBe('N (Geschichte) → NQ (Deutschland) → NQ 1000 (Sachsen)');
      expect(result.hierarchy_level).toBe('Feingruppe');
      expect(result.subject_area).toEqual({ hauptgruppe: 'N', description: 'History', subgroup: 'German History' });
      expect(result.children?.map(c => c.notation)).toEqual(['NQ 1100']);
    });

    it('should leave out children unless asked for', async () => {
      const result = expectSuccess(await getNode({ notation: 'NQ', include_children: false }));

      expect(result.hierarchy_level).toBe('Untergruppe');
      expect(result.children).toBeUndefined();
      expect(result.subject_area?.subgroup).toBe('German History');
    });

    it('should return NOT_FOUND for an unknown notation', async () => {
      const error = expectToolError(await getNode({ notation: 'XY 9999', include_children: false }));

      expect(error.code).toBe('NOT_FOUND');
    });
  });

  describe('rvk_normalize_place', () => {
    it('should map a city to its country', () => {
      expect(normalizePlace({ place: 'Leipzig' })).toEqual({
        success: true,
        place: 'Leipzig',
        normalized: 'Deutschland',
        resolved: true,
        is_country: true,
        is_continent: false,
      });
    });

    it('should map a continent adjective to its continent', () => {
      expect(normalizePlace({ place: 'afrikanisch' })).toMatchObject({
        normalized: 'Afrika',
        resolved: true,
        is_country: false,
        is_continent: true,
      });
    });

    it('should keep an unknown place as it is', () => {
      expect(normalizePlace({ place: 'Atlantis' })).toMatchObject({
        normalized: 'Atlantis',
        resolved: false,
        is_country: false,
      });
    });
  });

  describe('Session tools', () => {
    it('should describe the session and its hierarchy source', async () => {
      await classifyConcepts({ concepts: [{ text: 'Chemnitz', kind: 'place' }] });

      const info = sessionInfo();

      expect(info.requests).toBe(1);
      expect(info.hierarchy).toMatchObject({ source: 'fixture' });
      expect(info.hierarchy_source).toEqual({
        source: 'rvk-api',
        base_url: 'https://rvk.uni-regensburg.de/api',
        file_path: undefined,
        authenticated: false,
      });
      expect(info.search_defaults).toEqual(DEFAULT_CONFIG.search);
    });

    it('should start a new session on reset', async () => {
      await classifyConcepts({ concepts: [{ text: 'Chemnitz', kind: 'place' }] });
      const before = sessionInfo();

      const after = await sessionReset();

      expect(after.session_id).not.toBe(before.session_id);
      expect(after.requests).toBe(0);
      expect(after.hierarchy).toBeNull();
    });
  });
});
