import { describe, it, expect, afterEach } from 'vitest';

import { ReferentialIntegrityError } from '@/errors.js';
import type { FlatGraph } from '@/flatGraph.js';
import type { NodeInput } from '@/types/schema.js';
import { addAgents, openMemoryGraph } from '../helpers/graph.js';

describe('end-to-end scenarios', () => {
  let graph: FlatGraph;

  afterEach(async () => {
    await graph.close();
  });

  it('a single reference becomes one triple and one root', async () => {
    graph = await openMemoryGraph();
    graph.addNode({ otype: 'Agent', pid: 'a', knows: [{ otype: 'Agent', pid: 'b' }] });
    expect(graph.getRelations().all()).toEqual([{ subject: 'a', predicate: 'knows', object: 'b' }]);
    expect(graph.getRootsForPid('b')).toEqual(['a']);
    expect(graph.getNodeIds('a')).toEqual(new Set(['a', 'b']));
  });

  it('an edge to a missing object is refused and leaves the graph unchanged', async () => {
    graph = await openMemoryGraph();
    addAgents(graph, 'a');
    expect(() => graph.addEdge('a', 'knows', ['z'])).toThrowError(ReferentialIntegrityError);
    expect(graph.objectCounts()).toEqual([{ otype: 'Agent', count: 1 }]);
  });

  it('a sub-object referenced twice is stored once and reached from both sides', async () => {
    graph = await openMemoryGraph();
    const site: NodeInput = { otype: 'Site', pid: 'site-1', elevation: 120.5 };
    graph.addNode({
      otype: 'Sample',
      pid: 's1',
      produced_by: { otype: 'Event', pid: 'e1', sampling_site: site },
    });
    graph.addNode({
      otype: 'Sample',
      pid: 's2',
      produced_by: { otype: 'Event', pid: 'e2', sampling_site: site },
    });
    expect(graph.getIds({ otype: 'Site' }).all()).toEqual([{ pid: 'site-1', otype: 'Site' }]);
    expect(graph.getRootsForPid('site-1')).toEqual(['s1', 'e1', 's2', 'e2']);
    expect(graph.getRootsForPid('site-1', { targetType: 'Sample' })).toEqual(['s1', 's2']);
  });

  it('traverses a cycle without repeating steps', async () => {
    graph = await openMemoryGraph();
    const a: NodeInput = { otype: 'Agent', pid: 'a' };
    const b: NodeInput = { otype: 'Agent', pid: 'b', knows: [a] };
    a.knows = [b];
    graph.addNode(a);
    expect(graph.breadthFirstTraversal('a').all()).toEqual([
      { subject: 'a', predicate: 'knows', object: 'b', depth: 1 },
      { subject: 'b', predicate: 'knows', object: 'a', depth: 2 },
    ]);
  });

  it('roots are a fixed point of the referrer relation', async () => {
    graph = await openMemoryGraph();
    addAgents(graph, 'a', 'b', 'c', 'd', 'x');
    graph.addEdge('a', 'knows', ['b']);
    graph.addEdge('b', 'knows', ['c', 'd']);
    graph.addEdge('d', 'knows', ['b']);
    graph.addEdge('x', 'likes', ['a']);

    const roots = new Set(graph.getRootsForPid('c'));
    expect(roots).toEqual(new Set(['a', 'b', 'd', 'x']));
    const referrers = new Set<string>();
    for (const pid of [...roots, 'c']) {
      for (const triple of graph.getRelations(undefined, undefined, pid)) referrers.add(triple.subject);
    }
    expect(referrers).toEqual(roots);
  });
});
