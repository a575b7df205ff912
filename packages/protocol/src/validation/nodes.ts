// Serialized Node Validation
//
// zod schemas for the tagged wire form of the built-in node variants.
// The runtime parses every incoming entry through these before constructing
// a node, and re-checks outgoing entries before they enter a snapshot.

import { z } from 'zod';
import type { FieldIssue } from '../types/common.js';
import type {
  CoreNodeType,
  Point3Fields,
  SerializedPoint3,
  SerializedRectangle,
} from '../types/nodes.js';

/**
 * Core node types defined in the protocol
 */
export const CORE_NODE_TYPES: readonly CoreNodeType[] = ['point3', 'rectangle'] as const;

/**
 * Check if a node type is a core type
 */
export function isCoreNodeType(type: string): type is CoreNodeType {
  return (CORE_NODE_TYPES as readonly string[]).includes(type);
}

// Finite only: NaN and +/-Infinity have no JSON form
const coordinate = z.number().finite();

const identifier = z.string().uuid();

const point3FieldShape = {
  x: coordinate,
  y: coordinate,
  z: coordinate,
  uuid: identifier,
};

export const point3FieldsSchema: z.ZodType<Point3Fields> = z.object(point3FieldShape);

export const point3Schema: z.ZodType<SerializedPoint3> = z.object({
  type: z.literal('point3'),
  ...point3FieldShape,
});

export const rectangleSchema: z.ZodType<SerializedRectangle> = z.object({
  type: z.literal('rectangle'),
  anchor: point3FieldsSchema,
  width: coordinate,
  height: coordinate,
  uuid: identifier,
});

/**
 * Only the discriminator. Used to pick a variant before its own schema runs.
 */
export const nodeTagSchema = z.object({ type: z.string().min(1) }).passthrough();

/**
 * Narrow to a non-null, non-array object. Says nothing about the values inside.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten zod issues into dotted field paths.
 *
 * @param prefix - Path of the validated value within a larger document
 */
export function toFieldIssues(error: z.ZodError, prefix?: string): FieldIssue[] {
  return error.issues.map((issue) => {
    const relative = issue.path.join('.');
    const path = [prefix, relative].filter((part) => part).join('.');
    return { path: path || '(root)', message: issue.message };
  });
}
