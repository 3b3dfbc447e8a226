import * as fs from "node:fs";

import {
  bulkCreate,
  createKey,
  generateKeys,
  getKey,
  listKeys,
  reinstateKey,
  revokeKey,
  setValidity,
  type GenerateOptions,
} from "../lib/api.js";
import { resolveConfig } from "../lib/config.js";
import { fmt, keyDetail, keyLine } from "../lib/format.js";

export function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 0) {
    throw new Error(`Invalid number of days: ${value}`);
  }
  return days;
}

/** One key per line; blank lines and `#` comments are ignored. */
export function readKeyFile(file: string): string[] {
  return fs
    .readFileSync(file, "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export async function keysListCommand(options: { json?: boolean }): Promise<void> {
  const keys = await listKeys(resolveConfig());

  if (options.json) {
    console.log(JSON.stringify(keys, null, 2));
    return;
  }

  console.log(fmt.header(`License keys (${keys.length})`));
  for (const key of keys) {
    console.log(keyLine(key));
  }
}

export async function keysShowCommand(key: string): Promise<void> {
  console.log(keyDetail(await getKey(resolveConfig(), key)));
}

export async function keysCreateCommand(key: string, options: { days: string }): Promise<void> {
  const created = await createKey(resolveConfig(), key, parseDays(options.days));
  console.log(fmt.success(`Created ${created.key} (${created.valid_for_days} days from first use)`));
}

export async function keysRevokeCommand(key: string): Promise<void> {
  await revokeKey(resolveConfig(), key);
  console.log(fmt.success(`Revoked ${key}`));
}

export async function keysReinstateCommand(key: string): Promise<void> {
  await reinstateKey(resolveConfig(), key);
  console.log(fmt.success(`Reinstated ${key}`));
}

export async function keysSetValidityCommand(key: string, days: string): Promise<void> {
  const updated = await setValidity(resolveConfig(), key, parseDays(days));
  const expiry = updated.expires_on ? `, now expires on ${updated.expires_on}` : "";
  console.log(fmt.success(`${key} is valid for ${updated.valid_for_days} days${expiry}`));
}

export async function keysBulkCommand(file: string, options: { days: string }): Promise<void> {
  const keys = readKeyFile(file);
  const result = await bulkCreate(resolveConfig(), keys, parseDays(options.days));

  console.log(fmt.success(`Created ${result.created.length} key(s)`));
  if (result.skipped.length > 0) {
    console.log(fmt.warn(`Skipped ${result.skipped.length} duplicate key(s)`));
  }
}

export async function keysGenerateCommand(
  count: string,
  options: { days: string; groups?: string; groupLength?: string; separator?: string; prefix?: string },
): Promise<void> {
  const n = Number(count);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid count: ${count}`);
  }

  const format: GenerateOptions = {};
  if (options.groups !== undefined) format.groups = Number(options.groups);
  if (options.groupLength !== undefined) format.groupLength = Number(options.groupLength);
  if (options.separator !== undefined) format.separator = options.separator;
  if (options.prefix !== undefined) format.prefix = options.prefix;

  const keys = await generateKeys(resolveConfig(), n, parseDays(options.days), format);
  for (const key of keys) {
    console.log(key);
  }
}
