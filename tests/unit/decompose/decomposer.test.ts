import { describe, it, expect, afterEach } from 'vitest';

import { ConfigError, StructuralError, ValidationError } from '@/errors.js';
import { FlatGraph } from '@/flatGraph.js';
import type { NodeInput } from '@/types/schema.js';
import { manualClock, openMemoryGraph, sampleRecord } from '../../helpers/graph.js';

describe('addNode decomposition', () => {
  let graph: FlatGraph;

  afterEach(async () => {
    await graph.close();
  });

  it('writes one row per nested node and one edge per reference field', async () => {
    graph = await openMemoryGraph();
    expect(graph.addNode(sampleRecord())).toBe('sample-1');

    expect(graph.objectCounts()).toEqual([
      { otype: 'Agent', count: 2 },
      { otype: 'Event', count: 1 },
      { otype: 'Sample', count: 1 },
      { otype: '_edge_', count: 3 },
    ]);
    expect(graph.getRelations().all()).toEqual([
      { subject: 'sample-1', predicate: 'produced_by', object: 'event-1' },
      { subject: 'sample-1', predicate: 'registrant', object: 'agent-1' },
      { subject: 'event-1', predicate: 'responsibility', object: 'agent-1' },
      { subject: 'event-1', predicate: 'responsibility', object: 'agent-2' },
    ]);
  });

  it('writes every node before any edge', async () => {
    graph = await openMemoryGraph();
    graph.addNode(sampleRecord());
    expect(graph.getIds().all().map((entry) => entry.otype)).toEqual([
      'Sample',
      'Event',
      'Agent',
      'Agent',
      '_edge_',
      '_edge_',
      '_edge_',
    ]);
  });

  it('turns a k-element reference list into one edge with k objects', async () => {
    graph = await openMemoryGraph();
    graph.addNode(sampleRecord());
    const edges = graph.getEdges({ subject: 'event-1', predicate: 'responsibility' }).all();
    expect(edges).toHaveLength(1);
    expect(edges[0]?.o).toEqual(['agent-1', 'agent-2']);
    expect(graph.getRelations('event-1', 'responsibility').all()).toHaveLength(2);
  });

  it('stores literal fields through the codec', async () => {
    graph = await openMemoryGraph();
    graph.addNode({
      otype: 'Sample',
      pid: 'typed',
      keywords: ['a', 'b'],
      is_public: true,
      mass: 1.25,
      fragments: 4,
      label: 'Typed sample',
      altids: ['ark:/0000/typed'],
    });
    expect(graph.getNode('typed')).toMatchObject({
      pid: 'typed',
      otype: 'Sample',
      label: 'Typed sample',
      description: null,
      altids: ['ark:/0000/typed'],
      sample_identifier: null,
      keywords: ['a', 'b'],
      is_public: true,
      mass: 1.25,
      fragments: 4,
    });
  });

  it('creates one node for a sub-object shared by identity', async () => {
    graph = await openMemoryGraph();
    const shared: NodeInput = { otype: 'Agent', name: 'Shared' };
    graph.addNode({
      otype: 'Sample',
      pid: 'sample-shared',
      produced_by: { otype: 'Event', pid: 'event-shared', responsibility: [shared] },
      registrant: shared,
    });

    const agents = graph.getIds({ otype: 'Agent' }).all();
    expect(agents).toHaveLength(1);
    const agentPid = agents[0]?.pid;
    expect(agentPid).toMatch(/^anon_[0-9a-f]{32}$/);
    expect(graph.getRelations(undefined, undefined, agentPid).all()).toEqual([
      { subject: 'sample-shared', predicate: 'registrant', object: agentPid },
      { subject: 'event-shared', predicate: 'responsibility', object: agentPid },
    ]);
  });

  it('terminates on cyclic inputs', async () => {
    graph = await openMemoryGraph();
    const a: NodeInput = { otype: 'Agent', pid: 'cyc-a', name: 'A' };
    const b: NodeInput = { otype: 'Agent', pid: 'cyc-b', name: 'B', knows: [a] };
    a.knows = [b];

    graph.addNode(a);
    expect(graph.getRelations().all()).toEqual([
      { subject: 'cyc-a', predicate: 'knows', object: 'cyc-b' },
      { subject: 'cyc-b', predicate: 'knows', object: 'cyc-a' },
    ]);
  });

  it('does not duplicate rows when the same structure is written again', async () => {
    graph = await openMemoryGraph();
    graph.addNode(sampleRecord());
    const before = graph.objectCounts();
    graph.addNode(sampleRecord());
    expect(graph.objectCounts()).toEqual(before);
  });

  it('stores undeclared node-valued fields as references', async () => {
    graph = await openMemoryGraph();
    graph.addNode({ otype: 'Agent', pid: 'mentee', mentor: { otype: 'Agent', pid: 'mentor' } });
    expect(graph.getRelations('mentee').all()).toEqual([
      { subject: 'mentee', predicate: 'mentor', object: 'mentor' },
    ]);
    expect(graph.getNode('mentee', 1)).toMatchObject({ mentor: { pid: 'mentor' } });
  });

  it('puts edges into the given named graph', async () => {
    graph = await openMemoryGraph();
    graph.addNode(sampleRecord(), { namedGraph: 'batch-7' });
    const inBatch = graph.getRelations(undefined, undefined, undefined, { namedGraph: 'batch-7' });
    expect(inBatch.all()).toHaveLength(4);
    const elsewhere = graph.getRelations(undefined, undefined, undefined, { namedGraph: 'other' });
    expect(elsewhere.all()).toEqual([]);
  });

  describe('upsert', () => {
    it('keeps row id and tcreated, bumps tmodified and only touches given fields', async () => {
      const clock = manualClock(100);
      graph = await openMemoryGraph({ now: clock.now });
      graph.addNode({ otype: 'Agent', pid: 'up', name: 'First', affiliation: 'Lab' });
      const rowId = graph.pidToRowId('up');

      clock.tick(100);
      graph.addNode({ otype: 'Agent', pid: 'up', name: 'Second' });
      expect(graph.pidToRowId('up')).toBe(rowId);
      expect(graph.getNode('up')).toMatchObject({
        tcreated: 100,
        tmodified: 200,
        name: 'Second',
        affiliation: 'Lab',
      });

      graph.addNode({ otype: 'Agent', pid: 'up', affiliation: null });
      expect(graph.getNode('up')).toMatchObject({ name: 'Second', affiliation: null });
    });

    it('refuses to change the otype of an existing pid', async () => {
      graph = await openMemoryGraph();
      graph.addNode({ otype: 'Agent', pid: 'fixed' });
      expect(() => graph.addNode({ otype: 'Location', pid: 'fixed' })).toThrowError(
        ValidationError,
      );
      expect(graph.getOtype('fixed')).toBe('Agent');
    });
  });

  it('decomposes nesting deeper than 1000 levels when no limit is set', async () => {
    graph = await openMemoryGraph();
    const root: NodeInput = { otype: 'Agent', pid: 'chain-0' };
    let tail = root;
    for (let level = 1; level <= 1500; level += 1) {
      const next: NodeInput = { otype: 'Agent', pid: `chain-${level}` };
      tail.knows = [next];
      tail = next;
    }

    expect(graph.addNode(root)).toBe('chain-0');
    expect(graph.objectCounts()).toEqual([
      { otype: 'Agent', count: 1501 },
      { otype: '_edge_', count: 1500 },
    ]);
    expect(graph.getRelations('chain-1499').all()).toEqual([
      { subject: 'chain-1499', predicate: 'knows', object: 'chain-1500' },
    ]);
  });

  describe('failures', () => {
    it('raises StructuralError past the depth limit and writes nothing', async () => {
      graph = await openMemoryGraph({ maxDecompositionDepth: 2 });
      const chain: NodeInput = {
        otype: 'Agent',
        pid: 'd0',
        knows: [
          {
            otype: 'Agent',
            pid: 'd1',
            knows: [{ otype: 'Agent', pid: 'd2', knows: [{ otype: 'Agent', pid: 'd3' }] }],
          },
        ],
      };
      expect(() => graph.addNode(chain)).toThrowError(StructuralError);
      expect(graph.objectCounts()).toEqual([]);
    });

    it('raises StructuralError when one pid is claimed with two otypes', async () => {
      graph = await openMemoryGraph();
      expect(() =>
        graph.addNode({ otype: 'Sample', pid: 'x', registrant: { otype: 'Agent', pid: 'x' } }),
      ).toThrowError(StructuralError);
    });

    it('raises ConfigError for an unknown otype', async () => {
      graph = await openMemoryGraph();
      expect(() => graph.addNode({ otype: 'Meteorite', pid: 'm' })).toThrowError(ConfigError);
    });

    it('raises ValidationError for undeclared literals, bad values and wrong targets', async () => {
      graph = await openMemoryGraph();
      expect(() => graph.addNode({ otype: 'Agent', pid: 'p', height: 3 })).toThrowError(
        'Agent has no field "height"',
      );
      expect(() => graph.addNode({ otype: 'Agent', pid: 'p', name: 5 })).toThrowError(
        ValidationError,
      );
      expect(() =>
        graph.addNode({ otype: 'Sample', pid: 's', registrant: { otype: 'Event', pid: 'e' } }),
      ).toThrowError('Sample.registrant references Agent, got Event');
      expect(() => graph.addNode({ otype: 'Agent', pid: 'p', row_id: 3 })).toThrowError(
        /reserved column/,
      );
      expect(() =>
        graph.addNode({ otype: 'Agent', pid: 'p', affiliation: { otype: 'Agent', pid: 'q' } }),
      ).toThrowError(ValidationError);
      expect(graph.objectCounts()).toEqual([]);
    });

    it('raises ConfigError before initialize()', async () => {
      graph = await FlatGraph.open();
      expect(() => graph.addNode({ otype: 'Agent' })).toThrowError(ConfigError);
      expect(() => graph.getNode('x')).toThrowError(/not initialized/);
    });
  });
});
