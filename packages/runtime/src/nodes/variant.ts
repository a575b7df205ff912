// Node variant contract
//
// A node variant is any class whose instances report their own identifier,
// carry a runtime tag, and render themselves to a tagged serialized form.
// Each variant is paired with a descriptor that knows how to read that form back.

import type { z } from 'zod';
import type { FieldIssue, Id, SerializedNode } from '@nodeset/protocol';
import { toFieldIssues } from '@nodeset/protocol';
import { MalformedFieldsError } from '../errors.js';

/**
 * The polymorphic unit stored in a NodeCollection.
 */
export interface GeometryNode {
  /**
   * Identifier assigned at construction. Also the node's collection key.
   */
  readonly uuid: Id;

  /**
   * Discriminator written to the serialized form
   */
  readonly nodeType: string;

  toJSON(): SerializedNode;
}

/**
 * Constructor of a concrete variant. Typed retrieval matches instances of
 * exactly this class, not of its subclasses.
 */
export type NodeClass<T extends GeometryNode> = new (...args: never[]) => T;

/**
 * Registry entry for one concrete variant
 */
export type NodeVariant<T extends GeometryNode = GeometryNode> = {
  /** Tag matched against the serialized `type` field */
  readonly type: string;

  readonly nodeClass: NodeClass<T>;

  /**
   * Check a serialized entry against the variant's schema.
   * Returns every problem found; an empty list means the entry is valid.
   */
  validate(value: unknown): FieldIssue[];

  /**
   * Build a node from its serialized entry, keeping its identifier.
   *
   * @param path - Location of the entry, used to prefix issue paths
   * @throws MalformedFieldsError if the entry does not match the schema
   */
  fromJSON(value: unknown, path?: string): T;
};

/**
 * Definition accepted by defineVariant
 */
export type VariantDefinition<T extends GeometryNode, S> = {
  type: string;
  nodeClass: NodeClass<T>;
  schema: z.ZodType<S>;
  create(data: S): T;
};

/**
 * Build a variant descriptor from a zod schema and a factory.
 */
export function defineVariant<T extends GeometryNode, S>(
  definition: VariantDefinition<T, S>
): NodeVariant<T> {
  const { type, nodeClass, schema, create } = definition;

  return {
    type,
    nodeClass,
    validate(value) {
      const result = schema.safeParse(value);
      return result.success ? [] : toFieldIssues(result.error);
    },
    fromJSON(value, path) {
      const result = schema.safeParse(value);
      if (!result.success) {
        throw new MalformedFieldsError(`Malformed ${type} node`, {
          nodeType: type,
          issues: toFieldIssues(result.error, path),
        });
      }
      return create(result.data);
    },
  };
}
