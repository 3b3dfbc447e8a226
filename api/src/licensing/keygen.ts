/**
 * License key generation.
 *
 * Default format: XXXX-XXXX-XXXX-XXXX over uppercase letters and digits
 * without I, O, 0 and 1. Characters are drawn with crypto.randomInt.
 */

import { randomInt } from 'node:crypto';

export const UNAMBIGUOUS_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

export interface KeyFormat {
  groups: number;
  groupLength: number;
  separator: string;
  prefix?: string;
  alphabet: string;
}

export const DEFAULT_KEY_FORMAT: KeyFormat = {
  groups: 4,
  groupLength: 4,
  separator: '-',
  alphabet: UNAMBIGUOUS_ALPHABET,
};

export class KeyGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyGenerationError';
  }
}

export function generateKey(format: KeyFormat = DEFAULT_KEY_FORMAT): string {
  const groups: string[] = [];
  for (let g = 0; g < format.groups; g++) {
    let group = '';
    for (let i = 0; i < format.groupLength; i++) {
      group += format.alphabet.charAt(randomInt(format.alphabet.length));
    }
    groups.push(group);
  }
  const body = groups.join(format.separator);
  return format.prefix ? `${format.prefix}${format.separator}${body}` : body;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function matchesKeyFormat(key: string, format: KeyFormat = DEFAULT_KEY_FORMAT): boolean {
  const chars = `[${escapeRegExp(format.alphabet)}]{${format.groupLength}}`;
  const sep = escapeRegExp(format.separator);
  const body = Array.from({ length: format.groups }, () => chars).join(sep);
  const prefix = format.prefix ? `${escapeRegExp(format.prefix)}${sep}` : '';
  return new RegExp(`^${prefix}${body}$`).test(key);
}

// ============================================
// Client-supplied formats
// ============================================

export type KeyFormatResult = { ok: true; format: KeyFormat } | { ok: false; error: string };

function intInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Validate an optional `format` object from a request body. Missing fields
 * take the default format's values; the alphabet is not configurable.
 */
export function parseKeyFormat(input: unknown): KeyFormatResult {
  if (input === undefined || input === null) return { ok: true, format: DEFAULT_KEY_FORMAT };
  if (typeof input !== 'object' || Array.isArray(input)) {
    return { ok: false, error: 'format must be an object' };
  }

  const groups = 'groups' in input ? input.groups : DEFAULT_KEY_FORMAT.groups;
  const groupLength = 'group_length' in input ? input.group_length : DEFAULT_KEY_FORMAT.groupLength;
  const separator = 'separator' in input ? input.separator : DEFAULT_KEY_FORMAT.separator;
  const rawPrefix = 'prefix' in input ? input.prefix : undefined;

  if (!intInRange(groups, 1, 8)) return { ok: false, error: 'format.groups must be between 1 and 8' };
  if (!intInRange(groupLength, 2, 16)) {
    return { ok: false, error: 'format.group_length must be between 2 and 16' };
  }
  if (typeof separator !== 'string' || !/^[^A-Za-z0-9\s]?$/.test(separator)) {
    return { ok: false, error: 'format.separator must be a single non-alphanumeric character' };
  }

  let prefix: string | undefined;
  if (rawPrefix !== undefined) {
    if (typeof rawPrefix !== 'string' || !/^[A-Z0-9]{1,12}$/.test(rawPrefix)) {
      return { ok: false, error: 'format.prefix must be 1-12 uppercase letters or digits' };
    }
    prefix = rawPrefix;
  }

  return {
    ok: true,
    format: {
      groups,
      groupLength,
      separator,
      alphabet: UNAMBIGUOUS_ALPHABET,
      ...(prefix !== undefined ? { prefix } : {}),
    },
  };
}
