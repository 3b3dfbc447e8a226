import chalk from "chalk";

import type { LicenseKey } from "./api.js";

export const fmt = {
  /**
   * Bold header with "═" double-line border
   */
  header(title: string): string {
    const line = "═".repeat(60);
    return `\n${chalk.bold(line)}\n  ${chalk.bold(title)}\n${chalk.bold(line)}`;
  },

  success(msg: string): string {
    return `${chalk.green("✓")} ${msg}`;
  },

  error(msg: string): string {
    return `${chalk.red("✗")} ${msg}`;
  },

  warn(msg: string): string {
    return `${chalk.yellow("⚠")} ${msg}`;
  },

  /**
   * Dim label with value
   */
  label(key: string, val: string): string {
    return `${chalk.dim(key)} ${val}`;
  },
};

export type KeyState = "revoked" | "unused" | "expired" | "bound";

const STATE_COLORS: Record<KeyState, (text: string) => string> = {
  revoked: chalk.red,
  unused: chalk.cyan,
  expired: chalk.yellow,
  bound: chalk.green,
};

function utcToday(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * `today` is a UTC YYYY-MM-DD date; a key stays valid through its
 * `expires_on` day.
 */
export function keyState(key: LicenseKey, today: string = utcToday()): KeyState {
  if (key.revoked) return "revoked";
  if (!key.used_on_device) return "unused";
  if (key.expires_on && key.expires_on < today) return "expired";
  return "bound";
}

export function keyStatus(key: LicenseKey, today?: string): string {
  const state = keyState(key, today);
  return STATE_COLORS[state](state);
}

/**
 * One line per key: key, status, device, expiry. Columns are padded before
 * coloring so escape codes do not count toward the width.
 */
export function keyLine(key: LicenseKey, today?: string): string {
  const state = keyState(key, today);
  const device = key.used_on_device ?? "-";
  const expiry = key.expires_on ?? `${key.valid_for_days}d after first use`;
  return `${key.key.padEnd(24)} ${STATE_COLORS[state](state.padEnd(8))} ${device.padEnd(24)} ${expiry}`;
}

export function keyDetail(key: LicenseKey): string {
  return [
    fmt.label("Key:        ", key.key),
    fmt.label("Status:     ", keyStatus(key)),
    fmt.label("Valid days: ", String(key.valid_for_days)),
    fmt.label("Created:    ", key.creation_date),
    fmt.label("Issued:     ", key.issuance_date ?? "-"),
    fmt.label("Device:     ", key.used_on_device ?? "-"),
    fmt.label("Expires on: ", key.expires_on ?? "-"),
  ].join("\n");
}
