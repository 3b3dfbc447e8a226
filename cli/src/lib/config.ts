import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

export const CONFIG_DIR = path.join(os.homedir(), ".keybind");
export const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");
export const DEFAULT_API_URL = "http://localhost:8787";

export interface Config {
  apiUrl?: string;
  adminToken?: string;
  configuredAt?: string;
}

export interface ResolvedConfig {
  apiUrl: string;
  adminToken?: string;
}

export function configExists(): boolean {
  return fs.existsSync(CONFIG_FILE);
}

export function loadConfig(): Config | null {
  if (!configExists()) {
    return null;
  }

  try {
    const content = fs.readFileSync(CONFIG_FILE, "utf-8");
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== "object" || parsed === null) return null;
    const config: Config = {};
    if ("apiUrl" in parsed && typeof parsed.apiUrl === "string") config.apiUrl = parsed.apiUrl;
    if ("adminToken" in parsed && typeof parsed.adminToken === "string") {
      config.adminToken = parsed.adminToken;
    }
    if ("configuredAt" in parsed && typeof parsed.configuredAt === "string") {
      config.configuredAt = parsed.configuredAt;
    }
    return config;
  } catch {
    return null;
  }
}

export function saveConfig(config: Config): void {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true });
  }

  fs.writeFileSync(CONFIG_FILE, JSON.stringify(config, null, 2), { mode: 0o600 });
}

/**
 * Environment variables win over the config file.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const file = loadConfig() ?? {};
  const apiUrl = (env.KEYBIND_API_URL || file.apiUrl || DEFAULT_API_URL).replace(/\/+$/, "");
  const adminToken = env.KEYBIND_ADMIN_TOKEN || file.adminToken;
  return adminToken ? { apiUrl, adminToken } : { apiUrl };
}
