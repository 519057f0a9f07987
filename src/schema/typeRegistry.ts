/**
 * TypeRegistry - collects per-type field declarations and unifies them into
 * the column set of the shared relation.
 *
 * Lifecycle: register → finalize (once). After finalization the registry is
 * read-only; re-finalizing with the same descriptors is a no-op.
 */

import { ConfigError } from '../errors.js';
import {
  EDGE_OTYPE,
  LITERAL_FIELD_TYPES,
  RESERVED_FIELDS,
  isLiteralField,
  type FieldDeclaration,
  type LiteralFieldDeclaration,
  type LiteralFieldType,
  type ReferenceFieldDeclaration,
  type TypeDescriptor,
} from '../types/schema.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED = new Set<string>(RESERVED_FIELDS);
const LITERAL_TYPES = new Set<string>(LITERAL_FIELD_TYPES);

/** One extension column of the shared relation. */
export interface SchemaColumn {
  name: string;
  type: LiteralFieldType;
}

export interface RegisteredType {
  readonly descriptor: TypeDescriptor;
  readonly literals: ReadonlyMap<string, LiteralFieldDeclaration>;
  readonly references: ReadonlyMap<string, ReferenceFieldDeclaration>;
}

function cloneDescriptor(descriptor: TypeDescriptor): TypeDescriptor {
  return {
    name: descriptor.name,
    fields: descriptor.fields.map((field) => ({ ...field })),
  };
}

function sameField(a: FieldDeclaration, b: FieldDeclaration): boolean {
  if (a.name !== b.name || a.type !== b.type) return false;
  if (!isLiteralField(a) && !isLiteralField(b)) {
    return a.target === b.target && Boolean(a.many) === Boolean(b.many);
  }
  return true;
}

export function sameDescriptor(a: TypeDescriptor, b: TypeDescriptor): boolean {
  return (
    a.name === b.name &&
    a.fields.length === b.fields.length &&
    a.fields.every((field, index) => {
      const other = b.fields[index];
      return other !== undefined && sameField(field, other);
    })
  );
}

function validateDescriptor(descriptor: TypeDescriptor): void {
  if (typeof descriptor.name !== 'string' || descriptor.name.length === 0) {
    throw new ConfigError('Type name must be a non-empty string');
  }
  if (descriptor.name === EDGE_OTYPE) {
    throw new ConfigError(`Type name "${EDGE_OTYPE}" is reserved for edges`);
  }
  const seen = new Set<string>();
  for (const field of descriptor.fields) {
    if (!IDENTIFIER.test(field.name)) {
      throw new ConfigError(`Type ${descriptor.name}: "${field.name}" is not a valid field name`);
    }
    if (RESERVED.has(field.name)) {
      throw new ConfigError(
        `Type ${descriptor.name}: field "${field.name}" collides with a reserved column`,
      );
    }
    if (seen.has(field.name)) {
      throw new ConfigError(`Type ${descriptor.name}: field "${field.name}" is declared twice`);
    }
    seen.add(field.name);
    if (field.type !== 'reference' && !LITERAL_TYPES.has(field.type)) {
      throw new ConfigError(
        `Type ${descriptor.name}: field "${field.name}" has unknown type "${String(field.type)}"`,
      );
    }
  }
}

export class TypeRegistry {
  private readonly descriptors = new Map<string, TypeDescriptor>();
  private readonly types = new Map<string, RegisteredType>();
  private columnList: SchemaColumn[] = [];
  private finalized = false;

  get isFinalized(): boolean {
    return this.finalized;
  }

  registerType(descriptor: TypeDescriptor): void {
    if (this.finalized) {
      throw new ConfigError(`Cannot register type ${descriptor.name}: schema is already finalized`);
    }
    validateDescriptor(descriptor);
    const existing = this.descriptors.get(descriptor.name);
    if (existing) {
      if (sameDescriptor(existing, descriptor)) return;
      throw new ConfigError(`Type ${descriptor.name} is already registered with different fields`);
    }
    this.descriptors.set(descriptor.name, cloneDescriptor(descriptor));
  }

  /**
   * Merge every registered descriptor into one column set.
   *
   * With `descriptors` given, they are registered first; on an already
   * finalized registry they must equal the registered set exactly.
   */
  finalize(descriptors: readonly TypeDescriptor[] = []): void {
    if (this.finalized) {
      this.assertSameSet(descriptors);
      return;
    }
    const pending = new Map(this.descriptors);
    try {
      for (const descriptor of descriptors) {
        this.registerType(descriptor);
      }
      this.build();
    } catch (error) {
      // no partial schema: drop what this call registered
      this.descriptors.clear();
      for (const [name, descriptor] of pending) this.descriptors.set(name, descriptor);
      throw error;
    }
    this.finalized = true;
  }

  private assertSameSet(descriptors: readonly TypeDescriptor[]): void {
    if (descriptors.length === 0) return;
    const given = new Map<string, TypeDescriptor>();
    for (const descriptor of descriptors) given.set(descriptor.name, descriptor);
    const matches =
      given.size === this.descriptors.size &&
      [...given.values()].every((descriptor) => {
        const existing = this.descriptors.get(descriptor.name);
        return existing !== undefined && sameDescriptor(existing, descriptor);
      });
    if (!matches) {
      throw new ConfigError('Schema is already finalized with a different set of types');
    }
  }

  private build(): void {
    const columns = new Map<string, LiteralFieldType>();
    const referenceNames = new Map<string, string>();
    const types = new Map<string, RegisteredType>();

    for (const descriptor of this.descriptors.values()) {
      const literals = new Map<string, LiteralFieldDeclaration>();
      const references = new Map<string, ReferenceFieldDeclaration>();
      for (const field of descriptor.fields) {
        if (isLiteralField(field)) {
          const declared = columns.get(field.name);
          if (declared !== undefined && declared !== field.type) {
            throw new ConfigError(
              `Field "${field.name}" of ${descriptor.name} is ${field.type}, but another type declares it ${declared}`,
            );
          }
          const owner = referenceNames.get(field.name);
          if (owner !== undefined) {
            throw new ConfigError(
              `Field "${field.name}" of ${descriptor.name} is a literal, but ${owner} declares it a reference`,
            );
          }
          columns.set(field.name, field.type);
          literals.set(field.name, field);
        } else {
          if (columns.has(field.name)) {
            throw new ConfigError(
              `Field "${field.name}" of ${descriptor.name} is a reference, but another type declares it a literal`,
            );
          }
          referenceNames.set(field.name, descriptor.name);
          references.set(field.name, field);
        }
      }
      types.set(descriptor.name, { descriptor, literals, references });
    }

    for (const [name, type] of types) this.types.set(name, type);
    this.columnList = [...columns].map(([name, type]) => ({ name, type }));
  }

  /** Registered type by otype, finalized schemas only. */
  get(otype: string): RegisteredType | undefined {
    return this.types.get(otype);
  }

  require(otype: string): RegisteredType {
    const type = this.types.get(otype);
    if (!type) {
      throw new ConfigError(`Unknown otype "${otype}"; register it before initialize()`);
    }
    return type;
  }

  /** Extension columns in first-declaration order. */
  columns(): readonly SchemaColumn[] {
    return this.columnList;
  }

  columnType(name: string): LiteralFieldType | undefined {
    return this.columnList.find((column) => column.name === name)?.type;
  }

  descriptorList(): TypeDescriptor[] {
    return [...this.descriptors.values()].map(cloneDescriptor);
  }

  typeNames(): string[] {
    return [...this.descriptors.keys()];
  }
}
