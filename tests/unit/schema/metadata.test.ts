import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ConfigError } from '@/errors.js';
import {
  METADATA_TABLE,
  buildMetadata,
  descriptorsFromMetadata,
  readMetadata,
  writeMetadata,
} from '@/schema/metadata.js';
import { TypeRegistry } from '@/schema/typeRegistry.js';
import { Agent, Event } from '../../helpers/graph.js';

describe('graph metadata', () => {
  let db: Database.Database;
  let registry: TypeRegistry;

  beforeEach(() => {
    db = new Database(':memory:');
    registry = new TypeRegistry();
    registry.finalize([Agent, Event]);
  });

  afterEach(() => {
    db.close();
  });

  it('is absent on a fresh store', () => {
    expect(readMetadata(db)).toBeUndefined();
  });

  it('describes node types, references and column names', () => {
    const metadata = buildMetadata(registry);
    expect(metadata.version).toBe('1');
    expect(metadata.primaryKey).toBe('pid');
    expect(metadata.nodeTypes).toEqual({
      Agent: { name: 'string', affiliation: 'string' },
      Event: { result_time: 'timestamp' },
    });
    expect(metadata.references).toEqual({
      Agent: [{ name: 'knows', target: 'Agent', many: true }],
      Event: [
        { name: 'responsibility', target: 'Agent', many: true },
        { name: 'sampling_site', target: 'Site' },
      ],
    });
    expect(metadata.edgeFields).toEqual(['s', 'p', 'o', 'n']);
    expect(metadata.literalFields).toEqual(['name', 'affiliation', 'result_time']);
  });

  it('round-trips through the metadata table into the same descriptors', () => {
    writeMetadata(db, buildMetadata(registry));
    const metadata = readMetadata(db);
    expect(metadata).toBeDefined();
    if (!metadata) return;
    expect(descriptorsFromMetadata(metadata)).toEqual([Agent, Event]);

    const rebuilt = new TypeRegistry();
    rebuilt.finalize(descriptorsFromMetadata(metadata));
    expect(rebuilt.columns()).toEqual(registry.columns());
  });

  it('stores one JSON value per key', () => {
    writeMetadata(db, buildMetadata(registry));
    const row = db
      .prepare<[string], { value: string }>(`SELECT value FROM ${METADATA_TABLE} WHERE key = ?`)
      .get('edge_fields');
    expect(row?.value).toBe('["s","p","o","n"]');
  });

  it('rejects an unsupported version', () => {
    writeMetadata(db, buildMetadata(registry));
    db.prepare(`UPDATE ${METADATA_TABLE} SET value = ? WHERE key = 'version'`).run('"2"');
    expect(() => readMetadata(db)).toThrowError(ConfigError);
  });

  it('rejects an unknown literal type', () => {
    writeMetadata(db, buildMetadata(registry));
    db.prepare(`UPDATE ${METADATA_TABLE} SET value = ? WHERE key = 'node_types'`).run(
      JSON.stringify({ Agent: { name: 'varchar' } }),
    );
    expect(() => readMetadata(db)).toThrowError(/unknown type/);
  });
});
