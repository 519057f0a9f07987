/**
 * Side-channel metadata persisted next to the rows so a reader can reattach
 * to a store without registering types again.
 *
 * Stored as key/JSON-value pairs in `graph_meta`:
 * - version, primary_key
 * - node_types: { otype: { field: literal type } }
 * - references: { otype: [{ name, target?, many? }] }
 * - edge_fields, literal_fields
 */

import type Database from 'better-sqlite3';

import { ConfigError } from '../errors.js';
import {
  EDGE_FIELDS,
  LITERAL_FIELD_TYPES,
  isLiteralField,
  type FieldDeclaration,
  type LiteralFieldType,
  type TypeDescriptor,
} from '../types/schema.js';
import type { TypeRegistry } from './typeRegistry.js';

export const METADATA_TABLE = 'graph_meta';
export const METADATA_VERSION = '1';
export const PRIMARY_KEY_FIELD = 'pid';

export interface GraphMetadata {
  version: string;
  primaryKey: string;
  nodeTypes: Record<string, Record<string, LiteralFieldType>>;
  references: Record<string, Array<{ name: string; target?: string; many?: boolean }>>;
  /** Field order per type, literals and references interleaved as declared */
  fieldOrder: Record<string, string[]>;
  edgeFields: string[];
  literalFields: string[];
}

export function buildMetadata(registry: TypeRegistry): GraphMetadata {
  const nodeTypes: GraphMetadata['nodeTypes'] = {};
  const references: GraphMetadata['references'] = {};
  const fieldOrder: GraphMetadata['fieldOrder'] = {};
  for (const descriptor of registry.descriptorList()) {
    const literals: Record<string, LiteralFieldType> = {};
    const refs: GraphMetadata['references'][string] = [];
    for (const field of descriptor.fields) {
      if (isLiteralField(field)) {
        literals[field.name] = field.type;
      } else {
        refs.push({
          name: field.name,
          ...(field.target !== undefined ? { target: field.target } : {}),
          ...(field.many !== undefined ? { many: field.many } : {}),
        });
      }
    }
    nodeTypes[descriptor.name] = literals;
    references[descriptor.name] = refs;
    fieldOrder[descriptor.name] = descriptor.fields.map((field) => field.name);
  }
  return {
    version: METADATA_VERSION,
    primaryKey: PRIMARY_KEY_FIELD,
    nodeTypes,
    references,
    fieldOrder,
    edgeFields: [...EDGE_FIELDS],
    literalFields: registry.columns().map((column) => column.name),
  };
}

/** Rebuild the descriptors a metadata record was written from. */
export function descriptorsFromMetadata(metadata: GraphMetadata): TypeDescriptor[] {
  return Object.entries(metadata.nodeTypes).map(([name, literals]) => {
    const refs = metadata.references[name] ?? [];
    const byName = new Map<string, FieldDeclaration>();
    for (const [field, type] of Object.entries(literals)) byName.set(field, { name: field, type });
    for (const ref of refs) byName.set(ref.name, { ...ref, type: 'reference' });
    const order = metadata.fieldOrder[name] ?? [...byName.keys()];
    const fields = order.flatMap((field) => {
      const declaration = byName.get(field);
      return declaration ? [declaration] : [];
    });
    return { name, fields };
  });
}

export function ensureMetadataTable(db: Database.Database): void {
  db.exec(`CREATE TABLE IF NOT EXISTS ${METADATA_TABLE} (key TEXT PRIMARY KEY, value TEXT NOT NULL)`);
}

export function writeMetadata(db: Database.Database, metadata: GraphMetadata): void {
  ensureMetadataTable(db);
  const upsert = db.prepare<[string, string]>(
    `INSERT INTO ${METADATA_TABLE} (key, value) VALUES (?, ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
  );
  const entries: Array<[string, unknown]> = [
    ['version', metadata.version],
    ['primary_key', metadata.primaryKey],
    ['node_types', metadata.nodeTypes],
    ['references', metadata.references],
    ['field_order', metadata.fieldOrder],
    ['edge_fields', metadata.edgeFields],
    ['literal_fields', metadata.literalFields],
  ];
  db.transaction(() => {
    for (const [key, value] of entries) upsert.run(key, JSON.stringify(value));
  })();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

const LITERAL_TYPES = new Set<string>(LITERAL_FIELD_TYPES);

function isLiteralType(value: unknown): value is LiteralFieldType {
  return typeof value === 'string' && LITERAL_TYPES.has(value);
}

function parseNodeTypes(value: unknown): GraphMetadata['nodeTypes'] {
  if (!isRecord(value)) throw new ConfigError('Metadata node_types is malformed');
  const result: GraphMetadata['nodeTypes'] = {};
  for (const [otype, fields] of Object.entries(value)) {
    if (!isRecord(fields)) throw new ConfigError(`Metadata node_types.${otype} is malformed`);
    const literals: Record<string, LiteralFieldType> = {};
    for (const [field, type] of Object.entries(fields)) {
      if (!isLiteralType(type)) {
        throw new ConfigError(`Metadata node_types.${otype}.${field} has unknown type`);
      }
      literals[field] = type;
    }
    result[otype] = literals;
  }
  return result;
}

function parseReferences(value: unknown): GraphMetadata['references'] {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ConfigError('Metadata references is malformed');
  const result: GraphMetadata['references'] = {};
  for (const [otype, refs] of Object.entries(value)) {
    if (!Array.isArray(refs)) throw new ConfigError(`Metadata references.${otype} is malformed`);
    result[otype] = refs.map((ref: unknown) => {
      if (!isRecord(ref) || typeof ref.name !== 'string') {
        throw new ConfigError(`Metadata references.${otype} is malformed`);
      }
      return {
        name: ref.name,
        ...(typeof ref.target === 'string' ? { target: ref.target } : {}),
        ...(typeof ref.many === 'boolean' ? { many: ref.many } : {}),
      };
    });
  }
  return result;
}

function parseFieldOrder(value: unknown): GraphMetadata['fieldOrder'] {
  if (!isRecord(value)) return {};
  const result: GraphMetadata['fieldOrder'] = {};
  for (const [otype, order] of Object.entries(value)) {
    if (isStringList(order)) result[otype] = order;
  }
  return result;
}

/** Metadata of a store, or `undefined` when the store has none yet. */
export function readMetadata(db: Database.Database): GraphMetadata | undefined {
  const exists = db
    .prepare<[string], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`,
    )
    .get(METADATA_TABLE);
  if (!exists) return undefined;

  const rows = db
    .prepare<[], { key: string; value: string }>(`SELECT key, value FROM ${METADATA_TABLE}`)
    .all();
  if (rows.length === 0) return undefined;
  const raw = new Map<string, unknown>();
  for (const row of rows) {
    const parsed: unknown = JSON.parse(row.value);
    raw.set(row.key, parsed);
  }

  const version = raw.get('version');
  if (version !== METADATA_VERSION) {
    throw new ConfigError(`Unsupported metadata version ${String(version)}`);
  }
  const primaryKey = raw.get('primary_key');
  if (primaryKey !== PRIMARY_KEY_FIELD) {
    throw new ConfigError(`Unsupported primary key field ${String(primaryKey)}`);
  }
  const edgeFields = raw.get('edge_fields');
  const literalFields = raw.get('literal_fields');
  return {
    version: METADATA_VERSION,
    primaryKey: PRIMARY_KEY_FIELD,
    nodeTypes: parseNodeTypes(raw.get('node_types')),
    references: parseReferences(raw.get('references')),
    fieldOrder: parseFieldOrder(raw.get('field_order')),
    edgeFields: isStringList(edgeFields) ? edgeFields : [...EDGE_FIELDS],
    literalFields: isStringList(literalFields) ? literalFields : [],
  };
}
