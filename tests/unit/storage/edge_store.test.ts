import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ReferentialIntegrityError, ValidationError } from '@/errors.js';
import type { FlatGraph } from '@/flatGraph.js';
import { computeEdgePid } from '@/identity/edgePid.js';
import { addAgents, manualClock, openMemoryGraph, sampleRecord } from '../../helpers/graph.js';

describe('addEdge', () => {
  let graph: FlatGraph;
  const clock = manualClock(500);

  beforeEach(async () => {
    graph = await openMemoryGraph({ now: clock.now });
    addAgents(graph, 'a', 'b', 'c');
  });

  afterEach(async () => {
    await graph.close();
  });

  it('returns the content-derived pid and stores pids as row ids', () => {
    const pid = graph.addEdge('a', 'knows', ['b', 'c']);
    expect(pid).toBe(computeEdgePid('a', 'knows', ['b', 'c']));
    expect(graph.getEdge(pid)).toMatchObject({
      pid,
      otype: '_edge_',
      s: 'a',
      p: 'knows',
      o: ['b', 'c'],
      n: null,
    });
    expect(graph.getOtype(pid)).toBe('_edge_');
  });

  it('takes an explicit pid and descriptive columns', () => {
    const pid = graph.addEdge('a', 'knows', ['b'], 'g1', {
      pid: 'friendship-1',
      label: 'friendship',
      altids: ['urn:x-test:1'],
    });
    expect(pid).toBe('friendship-1');
    expect(graph.getEdge(pid)).toMatchObject({
      label: 'friendship',
      altids: ['urn:x-test:1'],
      n: 'g1',
    });
  });

  it('upserts an existing edge', () => {
    const pid = graph.addEdge('a', 'knows', ['b']);
    const created = graph.getEdge(pid)?.tcreated;
    clock.tick(10);
    expect(graph.addEdge('a', 'knows', ['b'])).toBe(pid);
    expect(graph.predicateCounts()).toEqual([{ predicate: 'knows', count: 1 }]);
    expect(graph.getEdge(pid)?.tcreated).toBe(created);
    expect(graph.getEdge(pid)?.tmodified).toBe(clock.now());
  });

  it('fails with ReferentialIntegrityError and writes nothing when a pid is unknown', () => {
    const before = graph.objectCounts();
    expect(() => graph.addEdge('a', 'knows', ['missing'])).toThrowError(ReferentialIntegrityError);
    expect(graph.objectCounts()).toEqual(before);
    expect(graph.getRelations().all()).toEqual([]);
  });

  it('lists every unresolved pid once', () => {
    try {
      graph.addEdge('ghost', 'knows', ['b', 'x', 'x']);
      expect.unreachable('addEdge should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ReferentialIntegrityError);
      if (!(error instanceof ReferentialIntegrityError)) return;
      expect(error.missing).toEqual(['ghost', 'x']);
      expect(error.code).toBe('ERR_REFERENTIAL_INTEGRITY');
    }
  });

  it('rejects empty predicates and empty object lists', () => {
    expect(() => graph.addEdge('a', '', ['b'])).toThrowError(ValidationError);
    expect(() => graph.addEdge('a', 'knows', [])).toThrowError(ValidationError);
  });

  it('rejects predicates that would shadow a column of the subject', () => {
    const before = graph.objectCounts();
    expect(() => graph.addEdge('a', 'affiliation', ['b'])).toThrowError(
      'Edge predicate "affiliation" is a field of Agent',
    );
    expect(() => graph.addEdge('a', 'label', ['b'])).toThrowError(
      'Edge predicate "label" is a reserved column',
    );
    expect(graph.objectCounts()).toEqual(before);
  });

  it('accepts a predicate that is only a field of other otypes', () => {
    graph.addEdge('a', 'latitude', ['b']);
    expect(graph.getNode('a', 1)).toMatchObject({ latitude: { pid: 'b', name: 'B' } });
  });

  it('refuses a pid that names a node', () => {
    expect(() => graph.addEdge('a', 'knows', ['b'], undefined, { pid: 'c' })).toThrowError(
      ValidationError,
    );
    expect(graph.getOtype('c')).toBe('Agent');
  });
});

describe('getNode', () => {
  let graph: FlatGraph;

  beforeEach(async () => {
    graph = await openMemoryGraph({ now: () => 42 });
  });

  afterEach(async () => {
    await graph.close();
  });

  it('returns the base columns and the fields of the otype', () => {
    graph.addNode({ otype: 'Agent', pid: 'ada', name: 'Ada', description: 'first' });
    expect(graph.getNode('ada')).toEqual({
      pid: 'ada',
      otype: 'Agent',
      tcreated: 42,
      tmodified: 42,
      label: null,
      description: 'first',
      altids: null,
      name: 'Ada',
      affiliation: null,
    });
  });

  it('gives undefined for an unknown pid', () => {
    expect(graph.getNode('nobody')).toBeUndefined();
    expect(graph.getNode('nobody', 3)).toBeUndefined();
    expect(graph.getOtype('nobody')).toBeUndefined();
  });

  it('returns edges with subject and objects as pids', () => {
    addAgents(graph, 'a', 'b');
    const pid = graph.addEdge('a', 'knows', ['b']);
    expect(graph.getNode(pid)).toMatchObject({ otype: '_edge_', s: 'a', p: 'knows', o: ['b'], n: null });
  });

  it('inlines referenced nodes down to the requested depth', () => {
    graph.addNode(sampleRecord());
    expect(graph.getNode('sample-1', 2)).toMatchObject({
      pid: 'sample-1',
      produced_by: {
        pid: 'event-1',
        responsibility: [
          { pid: 'agent-1', name: 'Ada' },
          { pid: 'agent-2', name: 'Grace' },
        ],
      },
      registrant: { pid: 'agent-1', name: 'Ada' },
    });

    const shallow = graph.getNode('sample-1', 1);
    expect(shallow?.produced_by).toMatchObject({ pid: 'event-1', otype: 'Event' });
    expect(shallow?.produced_by).not.toHaveProperty('responsibility');
    expect(graph.getNode('sample-1')).not.toHaveProperty('produced_by');
  });

  it('returns a list for declared many references even with one object', () => {
    graph.addNode({
      otype: 'Event',
      pid: 'solo',
      responsibility: [{ otype: 'Agent', pid: 'only', name: 'Only' }],
    });
    expect(graph.getNode('solo', 1)).toMatchObject({ responsibility: [{ pid: 'only' }] });
  });

  it('returns a list when an edge holds several objects or several edges share a predicate', () => {
    addAgents(graph, 'a', 'b', 'c', 'd', 'e');
    graph.addEdge('a', 'likes', ['b', 'c']);
    graph.addEdge('d', 'likes', ['a']);
    graph.addEdge('d', 'likes', ['b']);
    graph.addEdge('e', 'likes', ['c']);

    expect(graph.getNode('a', 1)).toMatchObject({ likes: [{ pid: 'b' }, { pid: 'c' }] });
    expect(graph.getNode('d', 1)).toMatchObject({ likes: [{ pid: 'a' }, { pid: 'b' }] });
    expect(graph.getNode('e', 1)).toMatchObject({ likes: { pid: 'c' } });
  });

  it('stops at nodes already on the expansion path', () => {
    addAgents(graph, 'a', 'b');
    graph.addEdge('a', 'mentor', ['b']);
    graph.addEdge('b', 'mentor', ['a']);
    const node = graph.getNode('a', 5);
    expect(node).toMatchObject({ pid: 'a', mentor: { pid: 'b', mentor: { pid: 'a' } } });
    const inner = graph.getNode('b', 1);
    expect(inner).toMatchObject({ mentor: { pid: 'a' } });
  });
});
