// Snapshot diffing and change reporting

export { diffSnapshots, deepEqual, type DiffOptions } from './snapshot-diff.js';
export { formatPath, formatChange, summarizeChanges, describeChanges } from './format.js';
