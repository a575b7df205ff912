// @nodeset/protocol
// Wire types and validation for serialized geometry nodes and snapshot diffs

export * from './types/index.js';
export * from './validation/nodes.js';
