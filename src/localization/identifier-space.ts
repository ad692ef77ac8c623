/**
 * @module localization/identifier-space
 *
 * The closed set of diagnostic identifiers a catalog is read against.
 *
 * Identifiers are the positions `0..N-1` of the master definitions list; `N`
 * itself is the "not a diagnostic" sentinel. The table is immutable and is
 * injected into every producer and parser instead of living in a global, so
 * tests can build a small synthetic space:
 *
 * ```typescript
 * const space = IdentifierSpace.fromNames(['A', 'B', 'C']);
 * space.indexOf('B'); // 1
 * ```
 */

import type { DiagnosticDefinition, DiagnosticID } from '../types.js';

const NOT_A_DIAGNOSTIC = '<not a diagnostic>';

export class IdentifierSpace {
  private readonly names: readonly string[];
  private readonly indices: ReadonlyMap<string, DiagnosticID>;

  private constructor(names: readonly string[]) {
    const indices = new Map<string, DiagnosticID>();
    names.forEach((name, index) => {
      if (indices.has(name)) {
        throw new Error(`Duplicate diagnostic identifier '${name}'`);
      }
      indices.set(name, index);
    });
    this.names = Object.freeze([...names]);
    this.indices = indices;
  }

  static fromNames(names: readonly string[]): IdentifierSpace {
    return new IdentifierSpace(names);
  }

  static fromDefinitions(definitions: readonly DiagnosticDefinition[]): IdentifierSpace {
    return new IdentifierSpace(definitions.map(def => def.id));
  }

  /** Number of identifiers; also the value of the "unknown" sentinel. */
  get size(): number {
    return this.names.length;
  }

  get unknown(): DiagnosticID {
    return this.names.length;
  }

  indexOf(name: string): DiagnosticID | undefined {
    return this.indices.get(name);
  }

  nameOf(id: DiagnosticID): string | undefined {
    return this.has(id) ? this.names[id] : undefined;
  }

  has(id: DiagnosticID): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.names.length;
  }

  /** Suffix appended to localized text in debug mode, e.g. ` [unknown_type]`. */
  debugSuffix(id: DiagnosticID): string {
    const name = this.nameOf(id);
    return name === undefined ? NOT_A_DIAGNOSTIC : ` [${name}]`;
  }

  ids(): DiagnosticID[] {
    return this.names.map((_, index) => index);
  }
}
