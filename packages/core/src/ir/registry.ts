import { DuplicateTypeNameError } from '../types/errors.js';
import type { DiagnosticCollector } from '../diag/collector.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { structuralHash } from '../util/struct-hash.js';
import type { SchemaIR, TypeDefinition } from './types.js';

export interface NameLookup {
  has(name: string): boolean;
}

/**
 * First free name for `base`: every suffix is tried bare, then every suffix
 * with 1, 2, ... appended. An empty suffix list behaves like `['']`.
 */
export function resolveCollision(
  base: string,
  existing: NameLookup,
  suffixes: readonly string[] = []
): string {
  const options = suffixes.length > 0 ? suffixes : [''];
  for (let counter = 0; ; counter += 1) {
    for (const suffix of options) {
      const candidate = `${base}${suffix}${counter > 0 ? String(counter) : ''}`;
      if (!existing.has(candidate)) return candidate;
    }
  }
}

function irFingerprint(schema: SchemaIR): unknown {
  return {
    typeDecl: schema.typeDecl,
    properties: schema.properties.map((property) => ({
      jsonName: property.jsonName,
      typeDecl: property.schema.typeDecl,
      tags: property.constraints.tags,
    })),
    union: schema.unionElements.map((element) => element.typeName),
    discriminator: schema.discriminator,
    enumValues: schema.enumValues,
  };
}

/** Schema nodes decide equivalence; IR shape is the fallback for derived types */
function fingerprint(definition: TypeDefinition): string {
  const { source } = definition.schema;
  return structuralHash(
    source !== undefined ? { source } : { ir: irFingerprint(definition.schema) }
  ).digest;
}

export interface TypeRegistryOptions {
  suffixes?: readonly string[];
  diagnostics?: DiagnosticCollector;
}

export interface RegistryCheckpoint {
  readonly size: number;
}

/**
 * Names and definitions for one compilation. Never shared between
 * compilations.
 */
export class TypeRegistry implements NameLookup {
  private readonly definitions = new Map<string, TypeDefinition>();
  private readonly fingerprints = new Map<string, string>();
  private readonly reserved = new Set<string>();
  // insertion order of definitions, for rollback
  private readonly order: string[] = [];
  private readonly suffixes: readonly string[];
  private readonly diagnostics?: DiagnosticCollector;

  constructor(options: TypeRegistryOptions = {}) {
    this.suffixes = options.suffixes ?? [];
    this.diagnostics = options.diagnostics;
  }

  /** Keep `name` for a definition that will be registered later */
  reserve(name: string): void {
    this.reserved.add(name);
  }

  isReserved(name: string): boolean {
    return this.reserved.has(name);
  }

  has(name: string): boolean {
    return this.definitions.has(name) || this.reserved.has(name);
  }

  hasDefinition(name: string): boolean {
    return this.definitions.has(name);
  }

  get(name: string): TypeDefinition | undefined {
    return this.definitions.get(name);
  }

  /**
   * Register under the exact candidate name. An equivalent definition
   * already holding the name is reused; a different one is an error.
   *
   * @returns the name the definition is known by
   */
  register(definition: TypeDefinition): string {
    const existing = this.fingerprints.get(definition.name);
    const incoming = fingerprint(definition);
    if (existing === undefined) {
      this.store(definition, incoming);
      return definition.name;
    }
    if (existing === incoming) {
      this.diagnostics?.record({
        code: DIAGNOSTIC_CODES.TYPE_MERGED_EQUIVALENT,
        phase: DIAGNOSTIC_PHASES.RESOLVE,
        path: definition.schemaPath,
        details: { typeName: definition.name },
      });
      return definition.name;
    }
    throw new DuplicateTypeNameError(definition.name, definition.schemaPath);
  }

  /**
   * Register a derived (path-named) definition. Collisions with a different
   * schema move the definition to the next free name instead of failing.
   */
  claim(definition: TypeDefinition): string {
    const base = definition.name;
    const incoming = fingerprint(definition);
    const existing = this.fingerprints.get(base);
    if (existing === incoming) {
      return this.register(definition);
    }
    if (!this.has(base)) {
      this.store(definition, incoming);
      return base;
    }

    const name = resolveCollision(base, this, this.suffixes);
    this.store({ ...definition, name }, incoming);
    this.diagnostics?.record({
      code: DIAGNOSTIC_CODES.TYPE_RENAMED,
      phase: DIAGNOSTIC_PHASES.RESOLVE,
      path: definition.schemaPath,
      details: { from: base, to: name },
    });
    return name;
  }

  list(): TypeDefinition[] {
    return this.order.flatMap((name) => {
      const definition = this.definitions.get(name);
      return definition ? [definition] : [];
    });
  }

  get size(): number {
    return this.definitions.size;
  }

  checkpoint(): RegistryCheckpoint {
    return { size: this.order.length };
  }

  /** Forget every definition registered after the checkpoint */
  rollback(checkpoint: RegistryCheckpoint): void {
    const dropped = this.order.splice(checkpoint.size);
    for (const name of dropped) {
      this.definitions.delete(name);
      this.fingerprints.delete(name);
    }
  }

  private store(definition: TypeDefinition, digest: string): void {
    this.definitions.set(definition.name, definition);
    this.fingerprints.set(definition.name, digest);
    this.order.push(definition.name);
  }
}
