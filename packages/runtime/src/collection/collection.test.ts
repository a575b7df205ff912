// Tests for NodeCollection

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { Id } from '@nodeset/protocol';
import { MalformedFieldsError, SerializationError, UnknownVariantError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logger.js';
import { Point3, point3Variant } from '../nodes/point.js';
import { Rectangle } from '../nodes/rectangle.js';
import { coreVariants, createVariantRegistry } from '../nodes/registry.js';
import { defineVariant, type GeometryNode } from '../nodes/variant.js';
import { NodeCollection } from './collection.js';

// --- Test Fixtures ---

const POINT_ID = '11111111-1111-4111-8111-111111111111';
const RECT_ID = '22222222-2222-4222-8222-222222222222';
const ANCHOR_ID = '33333333-3333-4333-8333-333333333333';
const OTHER_ID = '44444444-4444-4444-8444-444444444444';

function createCollection(): NodeCollection {
  return new NodeCollection({ logger: silentLogger });
}

function createPoint(id: string, x = 0, y = 0, z = 0): Point3 {
  const point = new Point3(id);
  point.x = x;
  point.y = y;
  point.z = z;
  return point;
}

function createRectangle(): Rectangle {
  const rectangle = new Rectangle(RECT_ID);
  rectangle.anchor = createPoint(ANCHOR_ID, 1, 1, 0);
  rectangle.width = 10;
  rectangle.height = 20;
  return rectangle;
}

class LabeledPoint extends Point3 {
  label = 'origin';
}

// Writes a uuid that is not the one it is stored under
class DriftingNode implements GeometryNode {
  readonly nodeType = 'drifting';
  readonly uuid: Id;

  constructor(uuid: Id) {
    this.uuid = uuid;
  }

  toJSON() {
    return { type: this.nodeType, uuid: OTHER_ID };
  }
}

const driftingVariant = defineVariant({
  type: 'drifting',
  nodeClass: DriftingNode,
  schema: z.object({ type: z.literal('drifting'), uuid: z.string().uuid() }),
  create: (data) => new DriftingNode(data.uuid),
});

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

// --- Tests ---

describe('NodeCollection', () => {
  describe('push', () => {
    it('stores a node under its own identifier', () => {
      const nodes = createCollection();
      const point = createPoint(POINT_ID);

      nodes.push(point);

      expect(nodes.size).toBe(1);
      expect(nodes.has(POINT_ID)).toBe(true);
      expect(nodes.get(POINT_ID)).toBe(point);
    });

    it('replaces a node with the same identifier', () => {
      const logger = createCapturingLogger();
      const nodes = new NodeCollection({ logger });
      nodes.push(createPoint(POINT_ID, 1, 2, 3));

      nodes.push(createPoint(POINT_ID, 7, 8, 9));

      expect(nodes.size).toBe(1);
      expect(nodes.tryGetTyped(POINT_ID, Point3)?.toFields()).toEqual({
        x: 7,
        y: 8,
        z: 9,
        uuid: POINT_ID,
      });
      expect(logger.entries.map((entry) => entry.message)).toEqual(['Replacing node']);
    });

    it('replaces across variants', () => {
      const nodes = createCollection();
      nodes.push(createPoint(RECT_ID));

      nodes.push(createRectangle());

      expect(nodes.size).toBe(1);
      expect(nodes.tryGetTyped(RECT_ID, Point3)).toBeUndefined();
      expect(nodes.tryGetTyped(RECT_ID, Rectangle)?.width).toBe(10);
    });
  });

  describe('remove', () => {
    it('returns the removed node', () => {
      const nodes = createCollection();
      const point = createPoint(POINT_ID);
      nodes.push(point);

      expect(nodes.remove(POINT_ID)).toBe(point);
      expect(nodes.size).toBe(0);
      expect(nodes.has(POINT_ID)).toBe(false);
    });

    it('returns undefined when nothing is stored under the id', () => {
      const nodes = createCollection();
      nodes.push(createPoint(POINT_ID));

      expect(nodes.remove(OTHER_ID)).toBeUndefined();
      expect(nodes.size).toBe(1);
    });
  });

  describe('typed retrieval', () => {
    it('returns the node when the variant matches', () => {
      const nodes = createCollection();
      const rectangle = createRectangle();
      nodes.push(rectangle);

      expect(nodes.tryGetTyped(RECT_ID, Rectangle)).toBe(rectangle);
      expect(nodes.tryGetTypedMut(RECT_ID, Rectangle)).toBe(rectangle);
    });

    it('returns undefined for any other variant', () => {
      const nodes = createCollection();
      nodes.push(createRectangle());
      nodes.push(createPoint(POINT_ID));

      expect(nodes.tryGetTyped(RECT_ID, Point3)).toBeUndefined();
      expect(nodes.tryGetTypedMut(RECT_ID, Point3)).toBeUndefined();
      expect(nodes.tryGetTyped(POINT_ID, Rectangle)).toBeUndefined();
    });

    it('returns undefined for a missing id', () => {
      const nodes = createCollection();

      expect(nodes.tryGetTyped(OTHER_ID, Point3)).toBeUndefined();
      expect(nodes.tryGetTypedMut(OTHER_ID, Rectangle)).toBeUndefined();
    });

    it('does not match a subclass instance against its base class', () => {
      const nodes = createCollection();
      const labeled = new LabeledPoint(POINT_ID);
      nodes.push(labeled);

      expect(nodes.tryGetTyped(POINT_ID, Point3)).toBeUndefined();
      expect(nodes.tryGetTypedMut(POINT_ID, Point3)).toBeUndefined();
      expect(nodes.tryGetTyped(POINT_ID, LabeledPoint)).toBe(labeled);
    });

    it('keeps a pushed anchor separate from its rectangle', () => {
      const nodes = createCollection();
      const rectangle = createRectangle();
      nodes.push(rectangle);
      nodes.push(rectangle.anchor);

      const anchor = nodes.tryGetTypedMut(ANCHOR_ID, Point3);
      if (anchor) {
        anchor.x = 42;
      }

      expect(nodes.tryGetTyped(ANCHOR_ID, Point3)?.x).toBe(42);
      expect(rectangle.anchor.x).toBe(1);
    });

    it('mutates the stored node through the mutable reference', () => {
      const nodes = createCollection();
      nodes.push(createRectangle());

      const rectangle = nodes.tryGetTypedMut(RECT_ID, Rectangle);
      if (rectangle) {
        rectangle.width = 42;
      }

      expect(nodes.tryGetTyped(RECT_ID, Rectangle)?.width).toBe(42);
    });
  });

  describe('iteration', () => {
    it('lists ids and entries in ascending order', () => {
      const nodes = createCollection();
      nodes.push(createPoint(OTHER_ID));
      nodes.push(createPoint(POINT_ID));
      nodes.push(createRectangle());

      expect(nodes.ids()).toEqual([POINT_ID, RECT_ID, OTHER_ID]);
      expect(Array.from(nodes, ([id, node]) => [id, node.nodeType])).toEqual([
        [POINT_ID, 'point3'],
        [RECT_ID, 'rectangle'],
        [OTHER_ID, 'point3'],
      ]);
    });
  });

  describe('serialize', () => {
    it('writes each node under its identifier with its tag', () => {
      const nodes = createCollection();
      nodes.push(createRectangle());
      nodes.push(createPoint(POINT_ID, 1, 2, 3));

      expect(nodes.serialize()).toEqual({
        [POINT_ID]: { type: 'point3', x: 1, y: 2, z: 3, uuid: POINT_ID },
        [RECT_ID]: {
          type: 'rectangle',
          anchor: { x: 1, y: 1, z: 0, uuid: ANCHOR_ID },
          width: 10,
          height: 20,
          uuid: RECT_ID,
        },
      });
    });

    it('produces the same text regardless of insertion order', () => {
      const first = createCollection();
      first.push(createPoint(POINT_ID));
      first.push(createRectangle());
      const second = createCollection();
      second.push(createRectangle());
      second.push(createPoint(POINT_ID));

      expect(first.stringify()).toBe(second.stringify());
      expect(Object.keys(second.serialize())).toEqual([POINT_ID, RECT_ID]);
    });

    it('serializes an empty collection to an empty object', () => {
      expect(createCollection().serialize()).toEqual({});
    });

    it('fails with SerializationError on a non-finite number', () => {
      const logger = createCapturingLogger();
      const nodes = new NodeCollection({ logger });
      nodes.push(createPoint(POINT_ID, Number.POSITIVE_INFINITY));

      const error = catchError(() => nodes.serialize());

      expect(error).toBeInstanceOf(SerializationError);
      if (error instanceof SerializationError) {
        expect(error.code).toBe('SERIALIZATION_FAILURE');
        expect(error.nodeId).toBe(POINT_ID);
        expect(error.nodeType).toBe('point3');
        expect(error.issues.map((issue) => issue.path)).toEqual(['x']);
      }
      expect(logger.entries.map((entry) => entry.level)).toEqual(['warn']);
    });

    it('fails with SerializationError for a variant missing from the registry', () => {
      const nodes = new NodeCollection({
        registry: createVariantRegistry([point3Variant]),
        logger: silentLogger,
      });
      nodes.push(createRectangle());

      const error = catchError(() => nodes.serialize());

      expect(error).toBeInstanceOf(SerializationError);
      if (error instanceof SerializationError) {
        expect(error.nodeType).toBe('rectangle');
        expect(error.issues.map((issue) => issue.path)).toEqual(['type']);
      }
    });

    it('fails with SerializationError when an entry names another identifier', () => {
      const nodes = new NodeCollection({
        registry: createVariantRegistry([...coreVariants, driftingVariant]),
        logger: silentLogger,
      });
      nodes.push(new DriftingNode(POINT_ID));

      const error = catchError(() => nodes.serialize());

      expect(error).toBeInstanceOf(SerializationError);
      if (error instanceof SerializationError) {
        expect(error.nodeId).toBe(POINT_ID);
        expect(error.nodeType).toBe('drifting');
        expect(error.issues).toEqual([
          { path: 'uuid', message: `Expected ${POINT_ID}, received ${OTHER_ID}` },
        ]);
      }
    });

    it('backs JSON.stringify', () => {
      const nodes = createCollection();
      nodes.push(createRectangle());

      expect(JSON.stringify(nodes)).toBe(nodes.stringify());
    });
  });

  describe('deserialize', () => {
    it('round-trips identifiers, variants and fields', () => {
      const nodes = createCollection();
      nodes.push(createRectangle());
      nodes.push(createPoint(POINT_ID, 1.5, -2, 3));

      const copy = NodeCollection.deserialize(nodes.serialize(), { logger: silentLogger });

      expect(copy.ids()).toEqual(nodes.ids());
      expect(copy.get(POINT_ID)).toBeInstanceOf(Point3);
      expect(copy.get(RECT_ID)).toBeInstanceOf(Rectangle);
      expect(copy.tryGetTyped(POINT_ID, Point3)?.toFields()).toEqual({
        x: 1.5,
        y: -2,
        z: 3,
        uuid: POINT_ID,
      });
      expect(copy.serialize()).toEqual(nodes.serialize());
    });

    it('fails with UnknownVariantError for an unregistered tag', () => {
      const error = catchError(() =>
        NodeCollection.deserialize(
          { [OTHER_ID]: { type: 'circle', radius: 1, uuid: OTHER_ID } },
          { logger: silentLogger }
        )
      );

      expect(error).toBeInstanceOf(UnknownVariantError);
      if (error instanceof UnknownVariantError) {
        expect(error.key).toBe(OTHER_ID);
      }
    });

    it('fails as a whole when any entry is malformed', () => {
      const logger = createCapturingLogger();
      const snapshot = {
        [POINT_ID]: { type: 'point3', x: 0, y: 0, z: 0, uuid: POINT_ID },
        [RECT_ID]: { type: 'rectangle', width: 10, height: 20, uuid: RECT_ID },
      };

      const error = catchError(() => NodeCollection.deserialize(snapshot, { logger }));

      expect(error).toBeInstanceOf(MalformedFieldsError);
      if (error instanceof MalformedFieldsError) {
        expect(error.nodeType).toBe('rectangle');
        expect(error.issues.map((issue) => issue.path)).toEqual([`${RECT_ID}.anchor`]);
      }
      expect(logger.entries.map((entry) => entry.message)).toEqual([
        'Snapshot deserialization failed',
      ]);
    });

    it('rejects an entry whose uuid differs from its key', () => {
      const error = catchError(() =>
        NodeCollection.deserialize(
          { [OTHER_ID]: { type: 'point3', x: 0, y: 0, z: 0, uuid: POINT_ID } },
          { logger: silentLogger }
        )
      );

      expect(error).toBeInstanceOf(MalformedFieldsError);
      if (error instanceof MalformedFieldsError) {
        expect(error.issues).toEqual([
          { path: `${OTHER_ID}.uuid`, message: `Expected ${OTHER_ID}, received ${POINT_ID}` },
        ]);
      }
    });

    it('rejects a snapshot that is not an object', () => {
      expect(() => NodeCollection.deserialize([], { logger: silentLogger })).toThrow(
        MalformedFieldsError
      );
      expect(() => NodeCollection.deserialize(null, { logger: silentLogger })).toThrow(
        MalformedFieldsError
      );
    });

    it('keeps the given registry for later serialization', () => {
      const registry = createVariantRegistry([point3Variant]);
      const copy = NodeCollection.deserialize(
        { [POINT_ID]: { type: 'point3', x: 0, y: 0, z: 0, uuid: POINT_ID } },
        { registry, logger: silentLogger }
      );

      copy.push(createRectangle());

      expect(() => copy.serialize()).toThrow(SerializationError);
    });
  });

  describe('parse', () => {
    it('reads the text written by stringify', () => {
      const nodes = createCollection();
      nodes.push(createRectangle());

      const copy = NodeCollection.parse(nodes.stringify(2), { logger: silentLogger });

      expect(copy.tryGetTyped(RECT_ID, Rectangle)?.anchor.toFields()).toEqual({
        x: 1,
        y: 1,
        z: 0,
        uuid: ANCHOR_ID,
      });
    });

    it('fails with MalformedFieldsError on invalid JSON', () => {
      const error = catchError(() => NodeCollection.parse('{"nodes":', { logger: silentLogger }));

      expect(error).toBeInstanceOf(MalformedFieldsError);
      if (error instanceof MalformedFieldsError) {
        expect(error.issues.map((issue) => issue.path)).toEqual(['(root)']);
      }
    });
  });
});
