/**
 * flatgraph CLI
 *
 * Usage:
 *   flatgraph records <store> [--otype <type>] [--max <n>]
 *   flatgraph record <store> <pid> [--expand <depth>]
 *   flatgraph counts <store> [--predicates]
 *   flatgraph relations <store> [-s <subject>] [-p <predicate>] [-o <object>] [--graph <name>] [--max <n>]
 *   flatgraph roots <store> <pid> [--target-type <type>] [-p <predicate...>]
 *   flatgraph traverse <store> <pid> [-d <depth>] [-p <predicate...>]
 *   flatgraph closure <store> <pid> [--edges]
 */

import { existsSync } from 'node:fs';

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { FlatGraph } from '../flatGraph.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('expected a non-negative integer');
  }
  return n;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  return value;
}

async function withGraph(store: string, fn: (graph: FlatGraph) => void): Promise<void> {
  if (!existsSync(store)) throw new Error(`No store at ${store}`);
  const graph = await FlatGraph.open(store, { readonly: true });
  try {
    if (!graph.isInitialized) throw new Error(`${store} carries no graph metadata`);
    fn(graph);
  } finally {
    await graph.close();
  }
}

export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name('flatgraph')
    .description('Inspect a FlatGraph store')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  const guard =
    <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (error) {
        io.err(`flatgraph: ${error instanceof Error ? error.message : String(error)}`);
        setExitCode(1);
      }
    };

  program
    .command('records')
    .description('List pid and otype of every row, in row order')
    .argument('<store>', 'store file')
    .option('--otype <type>', 'only rows of this otype')
    .option('--max <n>', 'stop after n rows', parseCount)
    .action(
      guard(async (store: string, options: { otype?: string; max?: number }) => {
        await withGraph(store, (graph) => {
          for (const entry of graph.getIds({ otype: options.otype, maxrows: options.max })) {
            io.out(`${entry.pid}\t${entry.otype}`);
          }
        });
      }),
    );

  program
    .command('record')
    .description('Print one row as JSON')
    .argument('<store>', 'store file')
    .argument('<pid>', 'row pid')
    .option('-e, --expand <depth>', 'inline referenced nodes down to this depth', parseCount, 0)
    .action(
      guard(async (store: string, pid: string, options: { expand: number }) => {
        await withGraph(store, (graph) => {
          const node = graph.getNode(pid, options.expand);
          if (!node) throw new Error(`No row with pid ${pid}`);
          io.out(JSON.stringify(node, jsonReplacer, 2));
        });
      }),
    );

  program
    .command('counts')
    .description('Row counts per otype, or edge counts per predicate')
    .argument('<store>', 'store file')
    .option('--predicates', 'count edges by predicate')
    .action(
      guard(async (store: string, options: { predicates?: boolean }) => {
        await withGraph(store, (graph) => {
          if (options.predicates) {
            for (const row of graph.predicateCounts()) io.out(`${row.predicate}\t${row.count}`);
          } else {
            for (const row of graph.objectCounts()) io.out(`${row.otype}\t${row.count}`);
          }
        });
      }),
    );

  program
    .command('relations')
    .description('Subject, predicate, object triples matching a pattern')
    .argument('<store>', 'store file')
    .option('-s, --subject <pid>')
    .option('-p, --predicate <name>')
    .option('-o, --object <pid>')
    .option('--graph <name>', 'named graph')
    .option('--max <n>', 'stop after n triples', parseCount)
    .action(
      guard(
        async (
          store: string,
          options: { subject?: string; predicate?: string; object?: string; graph?: string; max?: number },
        ) => {
          await withGraph(store, (graph) => {
            const triples = graph.getRelations(options.subject, options.predicate, options.object, {
              namedGraph: options.graph,
              maxrows: options.max,
            });
            for (const triple of triples) {
              io.out(`${triple.subject}\t${triple.predicate}\t${triple.object}`);
            }
          });
        },
      ),
    );

  program
    .command('roots')
    .description('Subjects that reference a pid directly or indirectly')
    .argument('<store>', 'store file')
    .argument('<pid>', 'referenced pid')
    .option('--target-type <type>', 'only referrers of this otype')
    .option('-p, --predicate <names...>', 'follow only these predicates')
    .action(
      guard(
        async (store: string, pid: string, options: { targetType?: string; predicate?: string[] }) => {
          await withGraph(store, (graph) => {
            const roots = graph.getRootsForPid(pid, {
              targetType: options.targetType,
              predicates: options.predicate,
            });
            for (const root of roots) io.out(root);
          });
        },
      ),
    );

  program
    .command('traverse')
    .description('Breadth-first walk over outgoing edges')
    .argument('<store>', 'store file')
    .argument('<pid>', 'start pid')
    .option('-d, --depth <n>', 'hop limit', parseCount)
    .option('-p, --predicate <names...>', 'follow only these predicates')
    .action(
      guard(async (store: string, pid: string, options: { depth?: number; predicate?: string[] }) => {
        await withGraph(store, (graph) => {
          const steps = graph.breadthFirstTraversal(pid, {
            maxDepth: options.depth,
            predicates: options.predicate,
          });
          for (const step of steps) {
            io.out(`${step.depth}\t${step.subject}\t${step.predicate}\t${step.object}`);
          }
        });
      }),
    );

  program
    .command('closure')
    .description('Pids reachable from a pid through outgoing edges')
    .argument('<store>', 'store file')
    .argument('<pid>', 'start pid')
    .option('--edges', 'include the pids of connecting edges')
    .action(
      guard(async (store: string, pid: string, options: { edges?: boolean }) => {
        await withGraph(store, (graph) => {
          for (const id of graph.getNodeIds(pid, { includeEdges: options.edges })) io.out(id);
        });
      }),
    );

  return program;
}

/** Run the CLI with `argv` (arguments only, no node/script). Resolves to the exit code. */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
