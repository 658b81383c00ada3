// pattern: Functional Core

import { ECOSYSTEMS, type Ecosystem, type PackageReference } from "./types.js";

/**
 * Per-ecosystem deduplicated package identifiers. Reads are deterministic:
 * ecosystems in ECOSYSTEMS order, identifiers sorted.
 */
export class PackageSet {
  private readonly identifiers: Record<Ecosystem, Set<string>> = {
    npm: new Set(),
    pip: new Set(),
    uv: new Set(),
  };

  static from(references: Iterable<PackageReference>): PackageSet {
    const set = new PackageSet();
    for (const reference of references) {
      set.add(reference);
    }
    return set;
  }

  /**
   * @returns false when the reference was already present
   */
  add(reference: PackageReference): boolean {
    const bucket = this.identifiers[reference.ecosystem];
    if (bucket.has(reference.identifier)) {
      return false;
    }
    bucket.add(reference.identifier);
    return true;
  }

  has(reference: PackageReference): boolean {
    return this.identifiers[reference.ecosystem].has(reference.identifier);
  }

  get size(): number {
    return ECOSYSTEMS.reduce(
      (total, ecosystem) => total + this.identifiers[ecosystem].size,
      0
    );
  }

  identifiersFor(ecosystem: Ecosystem): string[] {
    return [...this.identifiers[ecosystem]].sort();
  }

  references(): PackageReference[] {
    return ECOSYSTEMS.flatMap(ecosystem =>
      this.identifiersFor(ecosystem).map(identifier => ({
        ecosystem,
        identifier,
      }))
    );
  }

  toJSON(): Record<Ecosystem, string[]> {
    return {
      npm: this.identifiersFor("npm"),
      pip: this.identifiersFor("pip"),
      uv: this.identifiersFor("uv"),
    };
  }
}
