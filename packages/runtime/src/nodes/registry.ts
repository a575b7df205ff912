// Variant Registry - maps serialized tags to node variants
//
// Registries are built once from an explicit list of descriptors and are
// read-only afterwards. Supporting a new node kind means adding its
// descriptor to the list a registry is built from; collection code does not
// change.

import { nodeTagSchema, toFieldIssues } from '@nodeset/protocol';
import { DuplicateVariantError, MalformedFieldsError, UnknownVariantError } from '../errors.js';
import { point3Variant } from './point.js';
import { rectangleVariant } from './rectangle.js';
import type { GeometryNode, NodeVariant } from './variant.js';

/**
 * Read-only lookup from tag to variant, with tag-dispatched deserialization
 */
export type VariantRegistry = {
  get(type: string): NodeVariant | undefined;
  has(type: string): boolean;

  /**
   * All registered tags, in registration order
   */
  types(): string[];

  /**
   * Reconstruct a node from its tagged serialized form.
   *
   * @param value - A serialized node
   * @param key - Snapshot key the value was read from, used in error paths
   * @throws MalformedFieldsError if the tag is missing or the fields are invalid
   * @throws UnknownVariantError if no variant claims the tag
   */
  deserialize(value: unknown, key?: string): GeometryNode;
};

/**
 * Build a registry from an explicit list of variants.
 *
 * @throws DuplicateVariantError if two variants share a tag
 */
export function createVariantRegistry(variants: readonly NodeVariant[]): VariantRegistry {
  const byType = new Map<string, NodeVariant>();

  for (const variant of variants) {
    if (byType.has(variant.type)) {
      throw new DuplicateVariantError(variant.type);
    }
    byType.set(variant.type, variant);
  }

  return Object.freeze({
    get: (type: string) => byType.get(type),
    has: (type: string) => byType.has(type),
    types: () => Array.from(byType.keys()),
    deserialize(value: unknown, key?: string): GeometryNode {
      const tag = nodeTagSchema.safeParse(value);
      if (!tag.success) {
        throw new MalformedFieldsError('Serialized node has no variant tag', {
          issues: toFieldIssues(tag.error, key),
        });
      }

      const variant = byType.get(tag.data.type);
      if (!variant) {
        throw new UnknownVariantError(tag.data.type, key);
      }

      return variant.fromJSON(value, key);
    },
  });
}

/**
 * Built-in variants
 */
export const coreVariants: readonly NodeVariant[] = [point3Variant, rectangleVariant];

/**
 * Registry of the built-in variants, shared by collections that are not
 * given one explicitly.
 */
export const coreVariantRegistry = createVariantRegistry(coreVariants);
