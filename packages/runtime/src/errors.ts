// Runtime error types

import type { FieldIssue } from '@nodeset/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class NodesetError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'NodesetError';
    this.code = code;
  }
}

/**
 * Error when a serialized node carries a tag no registered variant claims.
 */
export class UnknownVariantError extends NodesetError {
  readonly nodeType: string;
  readonly key?: string;

  constructor(nodeType: string, key?: string) {
    super(
      'UNKNOWN_VARIANT',
      key === undefined
        ? `Unknown node variant "${nodeType}"`
        : `Unknown node variant "${nodeType}" at entry ${key}`
    );
    this.name = 'UnknownVariantError';
    this.nodeType = nodeType;
    this.key = key;
  }
}

/**
 * Error when serialized data is recognized but its fields are missing or invalid.
 */
export class MalformedFieldsError extends NodesetError {
  /** Tag of the variant being read, when one was recognized */
  readonly nodeType?: string;
  readonly issues: FieldIssue[];

  constructor(message: string, options: { nodeType?: string; issues: FieldIssue[] }) {
    const detail = options.issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    super('MALFORMED_FIELDS', detail ? `${message} (${detail})` : message);
    this.name = 'MalformedFieldsError';
    this.nodeType = options.nodeType;
    this.issues = options.issues;
  }
}

/**
 * Error when a node cannot be rendered to the snapshot format.
 */
export class SerializationError extends NodesetError {
  readonly nodeId: string;
  readonly nodeType: string;
  readonly issues: FieldIssue[];

  constructor(nodeId: string, nodeType: string, issues: FieldIssue[]) {
    super(
      'SERIALIZATION_FAILURE',
      `Node ${nodeId} (${nodeType}) cannot be serialized: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'SerializationError';
    this.nodeId = nodeId;
    this.nodeType = nodeType;
    this.issues = issues;
  }
}

/**
 * Error when two variants claim the same tag in one registry.
 */
export class DuplicateVariantError extends NodesetError {
  readonly nodeType: string;

  constructor(nodeType: string) {
    super('DUPLICATE_VARIANT', `Node variant already registered: ${nodeType}`);
    this.name = 'DuplicateVariantError';
    this.nodeType = nodeType;
  }
}
