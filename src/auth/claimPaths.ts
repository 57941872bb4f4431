import type { ClaimSet } from './codec.js';

export const DEFAULT_AUTHORITIES_PATHS = ['authorities', 'roles'];

export function parseList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  const unique = new Set<string>();
  for (const entry of raw.split(/[|,]/)) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return [...unique];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Walks a dot-separated claim path. `*` fans out over every member of the
 * current object, so `resource_access.*.roles` yields one value per client.
 */
export function collectValues(node: unknown, segments: string[], index = 0): unknown[] {
  if (node === undefined || node === null) {
    return [];
  }

  if (index >= segments.length) {
    return [node];
  }

  if (!isRecord(node)) {
    return [];
  }

  const segment = segments[index];

  if (segment === '*') {
    const values: unknown[] = [];
    for (const value of Object.values(node)) {
      values.push(...collectValues(value, segments, index + 1));
    }
    return values;
  }

  if (!Object.prototype.hasOwnProperty.call(node, segment)) {
    return [];
  }

  return collectValues(node[segment], segments, index + 1);
}

export function resolveAuthorities(claims: ClaimSet, paths: readonly string[]): Set<string> {
  const authorities = new Set<string>();

  for (const path of paths) {
    for (const entry of collectValues(claims, path.split('.'))) {
      if (typeof entry === 'string' && entry.length > 0) {
        authorities.add(entry);
      } else if (Array.isArray(entry)) {
        for (const item of entry) {
          if (typeof item === 'string' && item.length > 0) {
            authorities.add(item);
          }
        }
      }
    }
  }

  return authorities;
}
