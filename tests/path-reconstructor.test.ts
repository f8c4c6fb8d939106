/**
 * Path Reconstructor Tests
 *
 * buildPath() walks parent links up to the Hauptgruppe:
 * - root first, length depth + 1, last label is the node's own
 * - cached ancestors are not fetched again
 * - BROKEN_ANCESTRY / MALFORMED_HIERARCHY for unresolvable or cyclic chains
 */

import { describe, it, expect } from 'vitest';

import { PathReconstructor } from '../src/search/path-reconstructor.js';
import type { NotationNode } from '../src/types.js';
import { createAccessor, createFixtureSource } from './helpers/rvk-fixture.js';

describe('PathReconstructor', () => {
  it('should return labels from the Hauptgruppe down to the node', async () => {
    const accessor = createAccessor();
    const node = await accessor.getNode('NQ 1100');

    const path = await new PathReconstructor(accessor).buildPath(node);

    expect(path).toEqual(['Geschichte', 'Deutschland', 'Sachsen', 'Chemnitz']);
    expect(path).toHaveLength(node.depth + 1);
  });

  it('should return a one-element path for a Hauptgruppe', async () => {
    const accessor = createAccessor();
    const [root] = await accessor.getTopLevelGroups();

    const path = await new PathReconstructor(accessor).buildPath(root);

    expect(path).toEqual(['Politologie, Soziologie']);
  });

  it('should use cached ancestors without fetching', async () => {
    const source = createFixtureSource();
    const accessor = createAccessor(source);
    const [child] = await accessor.getChildren('MS');
    const nodeCalls = source.calls.node;

    const nodes = await new PathReconstructor(accessor).buildNodePath(child);

    expect(nodes.map(n => n.notation)).toEqual(['M', 'MS', 'MS 1000']);
    expect(source.calls.node).toBe(nodeCalls);
  });

  it('should fail with BROKEN_ANCESTRY when a parent cannot be resolved', async () => {
    const accessor = createAccessor();
    const orphan: NotationNode = { notation: 'QX 10', label: 'Waise', parent_id: 'QX', depth: 1, has_children: false };

    await expect(new PathReconstructor(accessor).buildPath(orphan)).rejects.toMatchObject({
      code: 'BROKEN_ANCESTRY',
      details: { notation: 'QX 10', parent: 'QX' },
    });
  });

  it('should fail with MALFORMED_HIERARCHY when the chain cycles back to the node', async () => {
    const accessor = createAccessor();
    const looped: NotationNode = { notation: 'MS', label: 'Soziologie', parent_id: 'MS', depth: 1, has_children: true };

    await expect(new PathReconstructor(accessor).buildPath(looped)).rejects.toMatchObject({
      code: 'MALFORMED_HIERARCHY',
    });
  });
});
