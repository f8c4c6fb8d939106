/**
 * Session Manager & Configuration Tests
 *
 * - loadConfig(): defaults ← config file ← environment, validated
 * - createHierarchySource(): source selection
 * - SessionManager: lazy accessor, session reset, stats
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import {
  CONFIG_FILE_NAME,
  createHierarchySource,
  DEFAULT_CONFIG,
  loadConfig,
  SessionManager,
} from '../src/session-manager.js';
import { MemoryHierarchySource } from '../src/hierarchy/memory-source.js';
import { RvkApiSource } from '../src/hierarchy/rvk-api.js';
import { silentLogger } from '../src/utils.js';
import { createFixtureSource } from './helpers/rvk-fixture.js';

// ============================================================================
// Test Helpers
// ============================================================================

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rvk-classifier-'));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

async function writeConfig(content: unknown): Promise<void> {
  const text = typeof content === 'string' ? content : JSON.stringify(content);
  await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), text, 'utf-8');
}

function createManager() {
  const source = createFixtureSource();
  const manager = new SessionManager(DEFAULT_CONFIG, {
    logger: silentLogger(),
    sourceFactory: async () => source,
  });
  return { manager, source };
}

// ============================================================================
// Tests
// ============================================================================

describe('loadConfig', () => {
  it('should return the defaults without file or environment', async () => {
    const config = await loadConfig(tempDir, {});

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should merge the config file over the defaults', async () => {
    await writeConfig({
      search: { max_results: 5 },
      hierarchy: { source: 'file', file_path: 'rvk.json' },
    });

    const config = await loadConfig(tempDir, {});

    expect(config.search).toEqual({ ...DEFAULT_CONFIG.search, max_results: 5 });
    expect(config.hierarchy.source).toBe('file');
    expect(config.hierarchy.file_path).toBe(path.join(tempDir, 'rvk.json'));
    expect(config.hierarchy.base_url).toBe(DEFAULT_CONFIG.hierarchy.base_url);
  });

  it('should apply environment variables last', async () => {
    await writeConfig({ hierarchy: { base_url: 'https://file.example/api' } });

    const config = await loadConfig(tempDir, {
      RVK_API_BASE_URL: 'https://env.example/api',
      RVK_API_KEY: 'test-key',
      RVK_LOG_LEVEL: 'debug',
      RVK_LOG_DIR: '/var/log/rvk',
    });

    expect(config.hierarchy.base_url).toBe('https://env.example/api');
    expect(config.hierarchy.api_key).toBe('test-key');
    expect(config.logging).toEqual({ level: 'debug', log_dir: '/var/log/rvk' });
  });

  it('should switch to the file source with RVK_HIERARCHY_FILE', async () => {
    const config = await loadConfig(tempDir, { RVK_HIERARCHY_FILE: '/data/rvk.json' });

    expect(config.hierarchy.source).toBe('file');
    expect(config.hierarchy.file_path).toBe('/data/rvk.json');
  });

  it('should reject out-of-range values', async () => {
    await writeConfig({ search: { max_results: 0 } });

    await expect(loadConfig(tempDir, {})).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('should reject unknown sections', async () => {
    await writeConfig({ storage: { runs_dir: 'runs' } });

    await expect(loadConfig(tempDir, {})).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('should reject invalid JSON', async () => {
    await writeConfig('{ "search": ');

    await expect(loadConfig(tempDir, {})).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('should require a file path for the file source', async () => {
    await writeConfig({ hierarchy: { source: 'file' } });

    await expect(loadConfig(tempDir, {})).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('should reject an unknown log level from the environment', async () => {
    await expect(loadConfig(tempDir, { RVK_LOG_LEVEL: 'verbose' })).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });
});

describe('createHierarchySource', () => {
  it('should create the RVK API client by default', async () => {
    const source = await createHierarchySource(DEFAULT_CONFIG.hierarchy);

    expect(source).toBeInstanceOf(RvkApiSource);
    expect(source.name).toBe('rvk-api');
  });

  it('should load a hierarchy dump for the file source', async () => {
    const filePath = path.join(tempDir, 'rvk.json');
    await fs.writeFile(filePath, JSON.stringify([
      { notation: 'A', benennung: 'Allgemeines' },
      { notation: 'AN', benennung: 'Buchwesen', parent: 'A' },
    ]), 'utf-8');

    const source = await createHierarchySource({ ...DEFAULT_CONFIG.hierarchy, source: 'file', file_path: filePath });

    expect(source).toBeInstanceOf(MemoryHierarchySource);
    await expect(source.fetchChildren('A')).resolves.toEqual([
      { notation: 'AN', label: 'Buchwesen', parent_id: 'A', has_children: false },
    ]);
  });

  it('should reject a dump with nodes lacking a label', async () => {
    const filePath = path.join(tempDir, 'rvk.json');
    await fs.writeFile(filePath, JSON.stringify([{ notation: 'A' }]), 'utf-8');

    await expect(createHierarchySource({ ...DEFAULT_CONFIG.hierarchy, source: 'file', file_path: filePath }))
      .rejects.toMatchObject({ code: 'PARSE_ERROR' });
  });

  it('should report a missing dump file as CONFIG_INVALID', async () => {
    await expect(createHierarchySource({
      ...DEFAULT_CONFIG.hierarchy,
      source: 'file',
      file_path: path.join(tempDir, 'missing.json'),
    })).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });
});

describe('SessionManager', () => {
  it('should create the accessor once per session', async () => {
    const { manager } = createManager();

    const [first, second] = await Promise.all([manager.getAccessor(), manager.getAccessor()]);

    expect(first).toBe(second);
  });

  it('should report cache statistics once the hierarchy is used', async () => {
    const { manager } = createManager();

    expect(manager.info().hierarchy).toBeNull();

    const accessor = await manager.getAccessor();
    await accessor.getTopLevelGroups();

    expect(manager.info().hierarchy).toMatchObject({ source: 'fixture', cached_nodes: 3 });
  });

  it('should start a new session with an empty cache on reset', async () => {
    const { manager } = createManager();
    const before = await manager.getAccessor();
    await before.getTopLevelGroups();
    manager.recordRequest();
    const previousId = manager.getSessionId();

    const info = await manager.reset();
    const after = await manager.getAccessor();

    expect(info.session_id).not.toBe(previousId);
    expect(info.requests).toBe(0);
    expect(info.hierarchy).toBeNull();
    expect(after).not.toBe(before);
    expect(after.stats().cached_nodes).toBe(0);
  });

  it('should retry source setup after a failure', async () => {
    let attempts = 0;
    const manager = new SessionManager(DEFAULT_CONFIG, {
      logger: silentLogger(),
      sourceFactory: async () => {
        attempts++;
        if (attempts === 1) {
          throw new Error('source unavailable');
        }
        return createFixtureSource();
      },
    });

    await expect(manager.getAccessor()).rejects.toThrow('source unavailable');
    await expect(manager.getAccessor()).resolves.toBeDefined();
    expect(attempts).toBe(2);
  });

  it('should merge request options over the configured search settings', () => {
    const { manager } = createManager();

    expect(manager.searchOptions({ max_results: 3 })).toEqual({ ...DEFAULT_CONFIG.search, max_results: 3 });
  });
});
