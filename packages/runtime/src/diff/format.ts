// Human-readable reporting for change records

import type { ChangePath, ChangeRecord, ChangeSummary, JsonValue } from '@nodeset/protocol';

/**
 * Render a path as `id.anchor.x`, with `[i]` for array indices.
 */
export function formatPath(path: ChangePath): string {
  if (path.length === 0) {
    return '(root)';
  }

  return path.reduce<string>((out, segment) => {
    if (typeof segment === 'number') {
      return `${out}[${segment}]`;
    }
    return out ? `${out}.${segment}` : segment;
  }, '');
}

function formatValue(value: JsonValue): string {
  return JSON.stringify(value);
}

/**
 * One line per record, e.g. `modified 3f1c....x: 0 -> 50`
 */
export function formatChange(record: ChangeRecord): string {
  const path = formatPath(record.path);
  switch (record.type) {
    case 'added':
      return `added ${path}: ${formatValue(record.value)}`;
    case 'removed':
      return `removed ${path}: ${formatValue(record.value)}`;
    case 'unchanged':
      return `unchanged ${path}: ${formatValue(record.value)}`;
    case 'modified':
      return `modified ${path}: ${formatValue(record.oldValue)} -> ${formatValue(record.newValue)}`;
  }
}

/**
 * Count records per change type.
 */
export function summarizeChanges(records: ChangeRecord[]): ChangeSummary {
  const summary: ChangeSummary = {
    hasChanges: false,
    added: 0,
    removed: 0,
    modified: 0,
    unchanged: 0,
  };

  for (const record of records) {
    summary[record.type]++;
  }
  summary.hasChanges = summary.added + summary.removed + summary.modified > 0;

  return summary;
}

/**
 * Short description of a diff, e.g. `1 added, 2 modified`.
 */
export function describeChanges(records: ChangeRecord[]): string {
  const { hasChanges, added, removed, modified } = summarizeChanges(records);
  if (!hasChanges) {
    return 'No changes';
  }

  const parts: string[] = [];
  if (added > 0) parts.push(`${added} added`);
  if (removed > 0) parts.push(`${removed} removed`);
  if (modified > 0) parts.push(`${modified} modified`);
  return parts.join(', ');
}
