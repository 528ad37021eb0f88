/**
 * Sketch Provider Registry
 *
 * Lookup table of sketch comparison capabilities, keyed by lower-cased
 * implementation name. Built once at startup and passed to the service;
 * there is no way to register a provider afterwards.
 */

import { HomologyError } from "../errors.js";
import type { SketchProvider } from "./sketch-interface.js";

export class SketchProviderRegistry {
  private readonly providers: ReadonlyMap<string, SketchProvider>;

  /**
   * @param providers - The providers to register
   * @throws Error if two providers share an implementation name, ignoring case
   */
  constructor(providers: Iterable<SketchProvider>) {
    const table = new Map<string, SketchProvider>();
    for (const provider of providers) {
      const key = provider.implementationName.toLowerCase();
      if (table.has(key)) {
        throw new Error(`Duplicate implementation: ${key}`);
      }
      table.set(key, provider);
    }
    this.providers = table;
  }

  /**
   * Get the provider for an implementation
   *
   * @throws HomologyError UNKNOWN_IMPLEMENTATION if it is not registered
   */
  get(implementationName: string): SketchProvider {
    const provider = this.providers.get(implementationName.toLowerCase());
    if (!provider) {
      throw new HomologyError(
        "UNKNOWN_IMPLEMENTATION",
        `No such implementation: ${implementationName}. Available implementations: ${this.implementationNames().join(", ")}`,
        { details: { implementation: implementationName } },
      );
    }
    return provider;
  }

  has(implementationName: string): boolean {
    return this.providers.has(implementationName.toLowerCase());
  }

  /**
   * Get the file extension expected by an implementation, if it has one.
   * This is a hint for naming files and is never used for validation.
   */
  expectedFileExtension(implementationName: string): string | undefined {
    return this.get(implementationName).expectedFileExtension;
  }

  implementationNames(): string[] {
    return [...this.providers.keys()].sort();
  }
}
