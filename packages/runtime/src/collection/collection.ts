// Node Collection - identity-keyed storage for polymorphic geometry nodes
//
// The collection owns every node it stores and keys each one by the node's
// own identifier. It reads nothing from a node beyond `uuid` and `nodeType`;
// field mutation goes through the live reference returned by tryGetTypedMut.

import type { FieldIssue, Id, Snapshot } from '@nodeset/protocol';
import { isPlainObject } from '@nodeset/protocol';
import { MalformedFieldsError, SerializationError } from '../errors.js';
import { consoleLogger, type Logger } from '../logger.js';
import { coreVariantRegistry, type VariantRegistry } from '../nodes/registry.js';
import type { GeometryNode, NodeClass } from '../nodes/variant.js';

/**
 * Options for creating, deserializing or parsing a collection
 */
export type NodeCollectionOptions = {
  /**
   * Variants available for (de)serialization (defaults to the core variants)
   */
  registry?: VariantRegistry;

  /**
   * Logger for structured logging (defaults to consoleLogger)
   */
  logger?: Logger;
};

function compareIds(a: Id, b: Id): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class NodeCollection implements Iterable<[Id, GeometryNode]> {
  private readonly nodes = new Map<Id, GeometryNode>();
  private readonly registry: VariantRegistry;
  private readonly logger: Logger;

  constructor(options: NodeCollectionOptions = {}) {
    this.registry = options.registry ?? coreVariantRegistry;
    this.logger = options.logger ?? consoleLogger;
  }

  get size(): number {
    return this.nodes.size;
  }

  /**
   * Insert a node under its own identifier, replacing any node already
   * stored there.
   */
  push(node: GeometryNode): void {
    const previous = this.nodes.get(node.uuid);
    if (previous) {
      this.logger.debug('Replacing node', {
        id: node.uuid,
        previousType: previous.nodeType,
        nodeType: node.nodeType,
      });
    }
    this.nodes.set(node.uuid, node);
  }

  /**
   * Remove a node.
   *
   * @returns The removed node, or undefined if nothing was stored under `id`
   */
  remove(id: Id): GeometryNode | undefined {
    const node = this.nodes.get(id);
    if (!node) {
      this.logger.debug('Remove skipped, node not found', { id });
      return undefined;
    }
    this.nodes.delete(id);
    return node;
  }

  get(id: Id): GeometryNode | undefined {
    return this.nodes.get(id);
  }

  has(id: Id): boolean {
    return this.nodes.has(id);
  }

  /**
   * Stored identifiers in ascending order
   */
  ids(): Id[] {
    return Array.from(this.nodes.keys()).sort(compareIds);
  }

  /**
   * Get a node narrowed to a concrete variant.
   *
   * @returns The node, or undefined if `id` is absent or holds another variant
   */
  tryGetTyped<T extends GeometryNode>(id: Id, nodeClass: NodeClass<T>): Readonly<T> | undefined {
    return this.tryGetTypedMut(id, nodeClass);
  }

  /**
   * Get a node narrowed to a concrete variant, for mutation in place.
   *
   * Only an instance of exactly `nodeClass` matches; a subclass instance is
   * another variant.
   *
   * @returns The live node, or undefined if `id` is absent or holds another variant
   */
  tryGetTypedMut<T extends GeometryNode>(id: Id, nodeClass: NodeClass<T>): T | undefined {
    const node = this.nodes.get(id);
    if (node instanceof nodeClass && Object.getPrototypeOf(node) === nodeClass.prototype) {
      return node;
    }
    return undefined;
  }

  *[Symbol.iterator](): Iterator<[Id, GeometryNode]> {
    for (const id of this.ids()) {
      const node = this.nodes.get(id);
      if (node) {
        yield [id, node];
      }
    }
  }

  /**
   * Serialize every node to its tagged form, keyed by identifier.
   *
   * Entries are written in ascending identifier order. Each entry is checked
   * against its variant's schema before it is accepted.
   *
   * @throws SerializationError if any node cannot be represented; no snapshot
   *   is returned in that case
   */
  serialize(): Snapshot {
    const snapshot: Snapshot = {};

    for (const [id, node] of this) {
      const variant = this.registry.get(node.nodeType);
      if (!variant) {
        throw this.serializationFailure(id, node.nodeType, [
          { path: 'type', message: 'No variant registered for this node type' },
        ]);
      }

      const serialized = node.toJSON();
      const issues = variant.validate(serialized);
      if (issues.length > 0) {
        throw this.serializationFailure(id, node.nodeType, issues);
      }
      if (serialized.uuid !== id) {
        throw this.serializationFailure(id, node.nodeType, [
          { path: 'uuid', message: `Expected ${id}, received ${serialized.uuid}` },
        ]);
      }

      snapshot[id] = serialized;
    }

    this.logger.debug('Serialized collection', { nodeCount: this.nodes.size });
    return snapshot;
  }

  toJSON(): Snapshot {
    return this.serialize();
  }

  /**
   * Serialize to JSON text.
   *
   * @param space - Indentation passed to JSON.stringify
   */
  stringify(space?: number): string {
    return JSON.stringify(this.serialize(), null, space);
  }

  /**
   * Rebuild a collection from a snapshot.
   *
   * Entries are read in ascending key order and each is dispatched on its
   * tag through the registry. The first failing entry aborts the whole
   * operation.
   *
   * @throws MalformedFieldsError if the snapshot is not an object, an entry's
   *   fields are invalid, or an entry's uuid differs from its key
   * @throws UnknownVariantError if an entry's tag is not registered
   */
  static deserialize(snapshot: unknown, options: NodeCollectionOptions = {}): NodeCollection {
    const collection = new NodeCollection(options);

    try {
      if (!isPlainObject(snapshot)) {
        throw new MalformedFieldsError('Snapshot must be an object keyed by node id', {
          issues: [{ path: '(root)', message: 'Expected object' }],
        });
      }

      for (const key of Object.keys(snapshot).sort(compareIds)) {
        const node = collection.registry.deserialize(snapshot[key], key);
        if (node.uuid !== key) {
          throw new MalformedFieldsError('Node identifier does not match its snapshot key', {
            nodeType: node.nodeType,
            issues: [{ path: `${key}.uuid`, message: `Expected ${key}, received ${node.uuid}` }],
          });
        }
        collection.nodes.set(key, node);
      }
    } catch (error) {
      collection.logger.warn('Snapshot deserialization failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    collection.logger.debug('Deserialized snapshot', { nodeCount: collection.size });
    return collection;
  }

  /**
   * Rebuild a collection from JSON text.
   *
   * @throws MalformedFieldsError if the text is not valid JSON
   */
  static parse(text: string, options: NodeCollectionOptions = {}): NodeCollection {
    let snapshot: unknown;
    try {
      snapshot = JSON.parse(text);
    } catch (error) {
      throw new MalformedFieldsError('Snapshot is not valid JSON', {
        issues: [
          {
            path: '(root)',
            message: error instanceof Error ? error.message : 'Unknown parse error',
          },
        ],
      });
    }
    return NodeCollection.deserialize(snapshot, options);
  }

  private serializationFailure(
    id: Id,
    nodeType: string,
    issues: FieldIssue[]
  ): SerializationError {
    const error = new SerializationError(id, nodeType, issues);
    this.logger.warn('Collection serialization failed', { id, nodeType, issues });
    return error;
  }
}
