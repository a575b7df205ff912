// Change records produced by diffing two snapshots

import type { JsonValue } from './common.js';

/**
 * One step from a parent value to a child: an object key or an array index
 */
export type PathSegment = string | number;

/**
 * Location of a value inside a snapshot tree. The root is `[]`.
 */
export type ChangePath = PathSegment[];

/**
 * Types of changes that can occur between snapshots
 */
export type ChangeType = 'added' | 'removed' | 'modified' | 'unchanged';

/**
 * A value present only in the newer snapshot
 */
export type AddedChange = {
  type: 'added';
  path: ChangePath;
  value: JsonValue;
};

/**
 * A value present only in the older snapshot
 */
export type RemovedChange = {
  type: 'removed';
  path: ChangePath;
  value: JsonValue;
};

/**
 * A leaf equal in both snapshots
 */
export type UnchangedChange = {
  type: 'unchanged';
  path: ChangePath;
  value: JsonValue;
};

/**
 * A leaf replaced wholesale
 */
export type ModifiedChange = {
  type: 'modified';
  path: ChangePath;
  oldValue: JsonValue;
  newValue: JsonValue;
};

export type ChangeRecord = AddedChange | RemovedChange | UnchangedChange | ModifiedChange;

/**
 * Counts per change type over a diff run
 */
export type ChangeSummary = {
  /** Whether anything was added, removed or modified */
  hasChanges: boolean;
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
};
