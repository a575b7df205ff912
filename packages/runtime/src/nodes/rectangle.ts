// Rectangle - an axis-aligned rectangle anchored at a point

import type { Id, SerializedRectangle } from '@nodeset/protocol';
import { rectangleSchema } from '@nodeset/protocol';
import { generateId } from './ids.js';
import { Point3 } from './point.js';
import { defineVariant, type GeometryNode } from './variant.js';

export class Rectangle implements GeometryNode {
  readonly nodeType = 'rectangle';
  readonly uuid: Id;

  width = 0;
  height = 0;

  private anchorPoint: Point3;

  constructor(uuid: Id = generateId()) {
    this.uuid = uuid;
    this.anchorPoint = new Point3();
  }

  /**
   * The anchor is owned by value: reading returns a copy and assigning
   * stores one. Use moveAnchor to change it in place.
   */
  get anchor(): Point3 {
    return this.anchorPoint.clone();
  }

  set anchor(point: Point3) {
    this.anchorPoint = point.clone();
  }

  moveAnchor(x: number, y: number, z: number): void {
    this.anchorPoint.x = x;
    this.anchorPoint.y = y;
    this.anchorPoint.z = z;
  }

  toJSON(): SerializedRectangle {
    return {
      type: this.nodeType,
      anchor: this.anchorPoint.toFields(),
      width: this.width,
      height: this.height,
      uuid: this.uuid,
    };
  }
}

export const rectangleVariant = defineVariant({
  type: 'rectangle',
  nodeClass: Rectangle,
  schema: rectangleSchema,
  create: (data) => {
    const rectangle = new Rectangle(data.uuid);
    rectangle.anchor = Point3.fromFields(data.anchor);
    rectangle.width = data.width;
    rectangle.height = data.height;
    return rectangle;
  },
});
