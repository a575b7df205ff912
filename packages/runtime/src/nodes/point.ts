// Point3 - a point in three-dimensional space

import type { Id, Point3Fields, SerializedPoint3 } from '@nodeset/protocol';
import { point3Schema } from '@nodeset/protocol';
import { generateId } from './ids.js';
import { defineVariant, type GeometryNode } from './variant.js';

export class Point3 implements GeometryNode {
  readonly nodeType = 'point3';
  readonly uuid: Id;

  x = 0;
  y = 0;
  z = 0;

  /**
   * Create a point at the origin.
   *
   * @param uuid - Identifier to keep; a fresh one is generated when omitted
   */
  constructor(uuid: Id = generateId()) {
    this.uuid = uuid;
  }

  static fromFields(fields: Point3Fields): Point3 {
    const point = new Point3(fields.uuid);
    point.x = fields.x;
    point.y = fields.y;
    point.z = fields.z;
    return point;
  }

  /**
   * Copy this point by value. The copy keeps the identifier.
   */
  clone(): Point3 {
    return Point3.fromFields(this.toFields());
  }

  /**
   * Untagged fields, for embedding inside another node.
   */
  toFields(): Point3Fields {
    return { x: this.x, y: this.y, z: this.z, uuid: this.uuid };
  }

  toJSON(): SerializedPoint3 {
    return { type: this.nodeType, ...this.toFields() };
  }
}

export const point3Variant = defineVariant({
  type: 'point3',
  nodeClass: Point3,
  schema: point3Schema,
  create: (data) => Point3.fromFields(data),
});
