// Snapshot Differ
//
// Structural diff of two JSON trees. Composites present on both sides are
// walked; only leaves and one-sided subtrees produce records. Array elements
// are matched by index, so reordering an array reads as pairwise
// modifications rather than moves.
//
// Nothing here knows about nodes. Two snapshots line up because the
// collection writes each node under its identifier.

import type { ChangePath, ChangeRecord, JsonObject, JsonValue } from '@nodeset/protocol';

/**
 * Options for diffSnapshots
 */
export type DiffOptions = {
  /**
   * Report leaves that are equal on both sides (default: true)
   */
  includeUnchanged?: boolean;
};

/**
 * Compare two snapshots and list every change, in traversal order.
 *
 * Object keys are visited in ascending code-unit order, so the result does
 * not depend on the key order of either input.
 *
 * @param before - The older snapshot
 * @param after - The newer snapshot
 */
export function diffSnapshots(
  before: JsonValue,
  after: JsonValue,
  options: DiffOptions = {}
): ChangeRecord[] {
  const includeUnchanged = options.includeUnchanged ?? true;
  const records: ChangeRecord[] = [];

  const emit = (record: ChangeRecord) => {
    if (record.type !== 'unchanged' || includeUnchanged) {
      records.push(record);
    }
  };

  walk(before, after, [], emit);
  return records;
}

function walk(
  before: JsonValue,
  after: JsonValue,
  path: ChangePath,
  emit: (record: ChangeRecord) => void
): void {
  if (Array.isArray(before) && Array.isArray(after) && !isEmpty(before, after)) {
    const length = Math.max(before.length, after.length);
    for (let i = 0; i < length; i++) {
      const childPath = [...path, i];
      if (i >= after.length) {
        emit({ type: 'removed', path: childPath, value: before[i] });
      } else if (i >= before.length) {
        emit({ type: 'added', path: childPath, value: after[i] });
      } else {
        walk(before[i], after[i], childPath, emit);
      }
    }
    return;
  }

  if (isJsonObject(before) && isJsonObject(after) && !isEmpty(before, after)) {
    const keys = Array.from(new Set([...Object.keys(before), ...Object.keys(after)])).sort();
    for (const key of keys) {
      const childPath = [...path, key];
      const inBefore = Object.hasOwn(before, key);
      const inAfter = Object.hasOwn(after, key);
      if (inBefore && inAfter) {
        walk(before[key], after[key], childPath, emit);
      } else if (inBefore) {
        emit({ type: 'removed', path: childPath, value: before[key] });
      } else {
        emit({ type: 'added', path: childPath, value: after[key] });
      }
    }
    return;
  }

  // Leaf: scalars, empty composites, or composites of different kinds
  if (deepEqual(before, after)) {
    emit({ type: 'unchanged', path, value: after });
  } else {
    emit({ type: 'modified', path, oldValue: before, newValue: after });
  }
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when both composites have no children
 */
function isEmpty(before: JsonValue[] | JsonObject, after: JsonValue[] | JsonObject): boolean {
  return Object.keys(before).length === 0 && Object.keys(after).length === 0;
}

/**
 * Structural equality over JSON values.
 */
export function deepEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;

  return aKeys.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
}
