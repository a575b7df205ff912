// Re-export all protocol types

export * from './common.js';
export * from './nodes.js';
export * from './changes.js';
