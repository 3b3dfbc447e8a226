#!/usr/bin/env node

import { program } from "commander";
import { configCommand } from "./commands/config.js";
import { validateCommand } from "./commands/validate.js";
import {
  keysBulkCommand,
  keysCreateCommand,
  keysGenerateCommand,
  keysListCommand,
  keysReinstateCommand,
  keysRevokeCommand,
  keysSetValidityCommand,
  keysShowCommand,
} from "./commands/keys.js";

function fail(error: unknown): never {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
}

function run(action: () => Promise<void> | void): Promise<void> {
  return Promise.resolve()
    .then(action)
    .catch(fail);
}

program
  .name("keybind")
  .description("Device-bound license key administration")
  .version("1.0.0");

program
  .command("config")
  .description("Show or save the API URL and admin token")
  .option("--url <url>", "License server base URL")
  .option("--token <token>", "Admin bearer token")
  .action((options: { url?: string; token?: string }) => run(() => configCommand(options)));

program
  .command("validate <key> <device>")
  .description("Validate a key for a device (binds the key on first use)")
  .action((key: string, device: string) => run(() => validateCommand(key, device)));

const keys = program.command("keys").description("Manage license keys");

keys
  .command("list")
  .description("List all keys, newest first")
  .option("--json", "Print raw JSON")
  .action((options: { json?: boolean }) => run(() => keysListCommand(options)));

keys
  .command("show <key>")
  .description("Show one key")
  .action((key: string) => run(() => keysShowCommand(key)));

keys
  .command("create <key>")
  .description("Create a key")
  .option("-d, --days <days>", "Validity window in days from first use", "30")
  .action((key: string, options: { days: string }) => run(() => keysCreateCommand(key, options)));

keys
  .command("revoke <key>")
  .description("Revoke a key")
  .action((key: string) => run(() => keysRevokeCommand(key)));

keys
  .command("reinstate <key>")
  .description("Reinstate a revoked key")
  .action((key: string) => run(() => keysReinstateCommand(key)));

keys
  .command("set-validity <key> <days>")
  .description("Change a key's validity window")
  .action((key: string, days: string) => run(() => keysSetValidityCommand(key, days)));

keys
  .command("bulk <file>")
  .description("Create keys from a file (one per line); existing keys are skipped")
  .option("-d, --days <days>", "Validity window in days from first use", "30")
  .action((file: string, options: { days: string }) => run(() => keysBulkCommand(file, options)));

keys
  .command("generate <count>")
  .description("Generate and create random keys")
  .option("-d, --days <days>", "Validity window in days from first use", "30")
  .option("--groups <n>", "Number of character groups")
  .option("--group-length <n>", "Characters per group")
  .option("--separator <char>", "Group separator")
  .option("--prefix <prefix>", "Fixed prefix before the first group")
  .action(
    (
      count: string,
      options: { days: string; groups?: string; groupLength?: string; separator?: string; prefix?: string },
    ) => run(() => keysGenerateCommand(count, options)),
  );

program.parseAsync().catch(fail);
