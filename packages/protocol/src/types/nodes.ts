// Serialized node types - the tagged wire form of geometry nodes

import type { Id, JsonValue } from './common.js';

/**
 * Tags of the built-in node variants
 */
export type CoreNodeType = 'point3' | 'rectangle';

/**
 * The tagged form every node variant serializes to.
 *
 * `type` names the concrete variant. `uuid` duplicates the snapshot key
 * the node is stored under; the two must agree.
 */
export type SerializedNode = {
  type: string;
  uuid: Id;
  [field: string]: JsonValue;
};

/**
 * Untagged point fields, as embedded by value inside another node.
 */
export type Point3Fields = {
  x: number;
  y: number;
  z: number;
  uuid: Id;
};

export type SerializedPoint3 = {
  type: 'point3';
  x: number;
  y: number;
  z: number;
  uuid: Id;
};

export type SerializedRectangle = {
  type: 'rectangle';

  /**
   * The anchor is owned by value, so it is written untagged
   */
  anchor: Point3Fields;

  width: number;
  height: number;
  uuid: Id;
};

/**
 * A whole collection at one instant, keyed by node identifier.
 */
export type Snapshot = {
  [id: Id]: SerializedNode;
};
