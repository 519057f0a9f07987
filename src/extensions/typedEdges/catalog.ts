/**
 * EdgeTypeCatalog - the allowed (subject type, predicate, object type)
 * patterns of a graph, supplied by the caller.
 *
 * Edge types are never stored; they are inferred from the otypes of an
 * edge's endpoints.
 */

import { ConfigError } from '../../errors.js';

export interface EdgeTypeRule {
  subjectType: string;
  predicate: string;
  objectType: string;
  multivalued?: boolean;
  description?: string;
}

export interface EdgeType {
  /** `subjectType__predicate__objectType` */
  readonly key: string;
  readonly subjectType: string;
  readonly predicate: string;
  readonly objectType: string;
  readonly multivalued: boolean;
  readonly description: string;
}

export type EdgeTypeCheck = { valid: true } | { valid: false; reason: string };

export function edgeTypeKey(subjectType: string, predicate: string, objectType: string): string {
  return `${subjectType}__${predicate}__${objectType}`;
}

export function formatEdgeType(type: EdgeType): string {
  return `${type.subjectType} --${type.predicate}--> ${type.objectType}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isEdgeTypeRule(value: unknown): value is EdgeTypeRule {
  if (!isRecord(value)) return false;
  const { subjectType, predicate, objectType, multivalued, description } = value;
  return (
    typeof subjectType === 'string' &&
    subjectType.length > 0 &&
    typeof predicate === 'string' &&
    predicate.length > 0 &&
    typeof objectType === 'string' &&
    objectType.length > 0 &&
    (multivalued === undefined || typeof multivalued === 'boolean') &&
    (description === undefined || typeof description === 'string')
  );
}

export class EdgeTypeCatalog {
  private readonly types = new Map<string, EdgeType>();

  constructor(rules: readonly EdgeTypeRule[]) {
    for (const rule of rules) {
      if (!isEdgeTypeRule(rule)) {
        throw new ConfigError(`Invalid edge type rule: ${JSON.stringify(rule)}`);
      }
      const key = edgeTypeKey(rule.subjectType, rule.predicate, rule.objectType);
      if (this.types.has(key)) throw new ConfigError(`Edge type ${key} is declared twice`);
      this.types.set(key, {
        key,
        subjectType: rule.subjectType,
        predicate: rule.predicate,
        objectType: rule.objectType,
        multivalued: rule.multivalued ?? false,
        description: rule.description ?? '',
      });
    }
  }

  /** Build a catalog from parsed JSON (an array of rules). */
  static fromJson(value: unknown): EdgeTypeCatalog {
    if (!Array.isArray(value)) throw new ConfigError('Edge type catalog must be an array of rules');
    const rules = value.map((rule: unknown, index) => {
      if (!isEdgeTypeRule(rule)) throw new ConfigError(`Edge type rule #${index} is malformed`);
      return rule;
    });
    return new EdgeTypeCatalog(rules);
  }

  get size(): number {
    return this.types.size;
  }

  list(): EdgeType[] {
    return [...this.types.values()];
  }

  get(key: string): EdgeType | undefined {
    return this.types.get(key);
  }

  infer(subjectType: string, predicate: string, objectType: string): EdgeType | undefined {
    return this.types.get(edgeTypeKey(subjectType, predicate, objectType));
  }

  /** Check a concrete pattern against the rule named by `key`. */
  validate(key: string, subjectType: string, predicate: string, objectType: string): EdgeTypeCheck {
    const type = this.types.get(key);
    if (!type) return { valid: false, reason: `Unknown edge type: ${key}` };
    if (type.subjectType !== subjectType) {
      return {
        valid: false,
        reason: `Subject type mismatch: expected ${type.subjectType}, got ${subjectType}`,
      };
    }
    if (type.predicate !== predicate) {
      return {
        valid: false,
        reason: `Predicate mismatch: expected ${type.predicate}, got ${predicate}`,
      };
    }
    if (type.objectType !== objectType) {
      return {
        valid: false,
        reason: `Object type mismatch: expected ${type.objectType}, got ${objectType}`,
      };
    }
    return { valid: true };
  }

  bySubject(subjectType: string): EdgeType[] {
    return this.list().filter((type) => type.subjectType === subjectType);
  }

  byObject(objectType: string): EdgeType[] {
    return this.list().filter((type) => type.objectType === objectType);
  }

  byPredicate(predicate: string): EdgeType[] {
    return this.list().filter((type) => type.predicate === predicate);
  }
}
