// @nodeset/runtime
// Node collections, variant registry and snapshot diffing

// Error types
export {
  NodesetError,
  UnknownVariantError,
  MalformedFieldsError,
  SerializationError,
  DuplicateVariantError,
} from './errors.js';

// Loggers
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogData,
} from './logger.js';

// Node variants
export {
  // Contract
  defineVariant,
  generateId,
  type GeometryNode,
  type NodeClass,
  type NodeVariant,
  type VariantDefinition,
  // Built-in variants
  Point3,
  point3Variant,
  Rectangle,
  rectangleVariant,
  // Registry
  createVariantRegistry,
  coreVariants,
  coreVariantRegistry,
  type VariantRegistry,
} from './nodes/index.js';

// Collection
export { NodeCollection, type NodeCollectionOptions } from './collection/index.js';

// Snapshot diffing
export {
  diffSnapshots,
  deepEqual,
  formatPath,
  formatChange,
  summarizeChanges,
  describeChanges,
  type DiffOptions,
} from './diff/index.js';
