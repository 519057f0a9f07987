/**
 * Type descriptors and the value shapes that flow through the graph.
 */

/** Reserved otype of edge rows. */
export const EDGE_OTYPE = '_edge_';

/** Columns every row carries. Types may not redeclare them. */
export const RESERVED_FIELDS = [
  'row_id',
  'pid',
  'tcreated',
  'tmodified',
  'otype',
  'label',
  'description',
  'altids',
  's',
  'p',
  'o',
  'n',
] as const;

export type ReservedField = (typeof RESERVED_FIELDS)[number];

/** Edge-only columns. */
export const EDGE_FIELDS = ['s', 'p', 'o', 'n'] as const;

export const LITERAL_FIELD_TYPES = [
  'string',
  'integer',
  'double',
  'boolean',
  'timestamp',
  'string[]',
  'integer[]',
  'double[]',
  'blob',
] as const;

export type LiteralFieldType = (typeof LITERAL_FIELD_TYPES)[number];

export interface LiteralFieldDeclaration {
  readonly name: string;
  readonly type: LiteralFieldType;
}

/** A field whose values are other nodes. Stored as an edge, never as a column. */
export interface ReferenceFieldDeclaration {
  readonly name: string;
  readonly type: 'reference';
  /** otype the referenced nodes must carry */
  readonly target?: string;
  /** values are lists; `getNode` expansion always yields an array */
  readonly many?: boolean;
}

export type FieldDeclaration = LiteralFieldDeclaration | ReferenceFieldDeclaration;

export interface TypeDescriptor {
  readonly name: string;
  readonly fields: readonly FieldDeclaration[];
}

export type FieldValueOf<T extends LiteralFieldType> = T extends 'string'
  ? string
  : T extends 'integer' | 'double'
    ? number
    : T extends 'boolean'
      ? boolean
      : T extends 'timestamp'
        ? Date
        : T extends 'string[]'
          ? string[]
          : T extends 'integer[]' | 'double[]'
            ? number[]
            : T extends 'blob'
              ? Uint8Array
              : never;

export type FieldValue =
  | string
  | number
  | boolean
  | Date
  | Uint8Array
  | string[]
  | number[];

/** Columns shared by every input, whatever its otype. */
export interface BaseNodeInput<TType extends string = string> {
  otype: TType;
  pid?: string;
  label?: string | null;
  description?: string | null;
  altids?: string[] | null;
}

/** Composite input accepted by `addNode`: literal fields plus nested node inputs. */
export interface NodeInput extends BaseNodeInput {
  [field: string]: FieldValue | NodeInput | NodeInput[] | null | undefined;
}

type DeclaredValue<F extends FieldDeclaration> = F extends LiteralFieldDeclaration
  ? FieldValueOf<F['type']> | null
  : F extends ReferenceFieldDeclaration
    ? F['many'] extends true
      ? NodeInput[]
      : NodeInput
    : never;

/**
 * Strongly typed input for a descriptor declared `as const`.
 *
 * @example
 * ```typescript
 * const Agent = { name: 'Agent', fields: [{ name: 'affiliation', type: 'string' }] } as const;
 * const agent: NodeOf<typeof Agent> = { otype: 'Agent', affiliation: 'Field Museum' };
 * ```
 */
export type NodeOf<D extends TypeDescriptor> = BaseNodeInput<D['name']> & {
  [F in D['fields'][number] as F['name']]?: DeclaredValue<F>;
};

export function isLiteralField(field: FieldDeclaration): field is LiteralFieldDeclaration {
  return field.type !== 'reference';
}

export function isNodeInput(value: unknown): value is NodeInput {
  if (value === null || typeof value !== 'object') return false;
  if (Array.isArray(value) || value instanceof Date || value instanceof Uint8Array) return false;
  return 'otype' in value && typeof value.otype === 'string';
}
