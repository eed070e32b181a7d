/**
 * Descriptor registry: stores block descriptors indexed by kind id.
 *
 * The registry is filled once (built-in catalog plus any extra catalogs)
 * and then frozen. A frozen registry is read-only and can be shared by any
 * number of concurrent decode / generate calls.
 */

import type { BlockCatalog } from "@blockscript/schema";
import { RegistryError, UnknownKindError } from "../errors.js";
import { descriptorFromCatalog } from "./descriptor.js";
import type { BlockDescriptor } from "./descriptor.js";

/** Read-only view of a registry, all the codec needs. */
export interface DescriptorLookup {
  find(kindId: string): BlockDescriptor | undefined;
}

/**
 * Stores block descriptors and retrieves them by kind id.
 */
export class DescriptorRegistry implements DescriptorLookup {
  private readonly descriptors = new Map<string, BlockDescriptor>();
  private frozen = false;

  /** Whether {@link freeze} has been called. */
  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Register a descriptor.
   *
   * @throws RegistryError if the registry is frozen or the id is taken
   */
  register(descriptor: BlockDescriptor): void {
    if (this.frozen) {
      throw new RegistryError(`Cannot register ${descriptor.id}: the registry is frozen`);
    }
    if (this.descriptors.has(descriptor.id)) {
      throw new RegistryError(`Block kind ${descriptor.id} is already registered`);
    }
    this.descriptors.set(descriptor.id, descriptor);
  }

  /** Register every block of a validated catalog, in catalog order. */
  registerCatalog(catalog: BlockCatalog): void {
    for (const block of catalog.blocks) {
      this.register(descriptorFromCatalog(block));
    }
  }

  /** Make the registry read-only. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  /**
   * Get a descriptor by kind id.
   *
   * @throws UnknownKindError if no descriptor has that id
   */
  get(kindId: string): BlockDescriptor {
    const descriptor = this.descriptors.get(kindId);
    if (descriptor === undefined) {
      throw new UnknownKindError(kindId);
    }
    return descriptor;
  }

  find(kindId: string): BlockDescriptor | undefined {
    return this.descriptors.get(kindId);
  }

  has(kindId: string): boolean {
    return this.descriptors.has(kindId);
  }

  /** All descriptors, in registration order. */
  list(): readonly BlockDescriptor[] {
    return [...this.descriptors.values()];
  }

  /** Distinct categories, in order of first appearance. */
  categories(): readonly string[] {
    return [...new Set(this.list().map((descriptor) => descriptor.category))];
  }

  /** Descriptors of one category, in registration order. */
  listByCategory(category: string): readonly BlockDescriptor[] {
    return this.list().filter((descriptor) => descriptor.category === category);
  }
}
