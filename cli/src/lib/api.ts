import type { ResolvedConfig } from "./config.js";

export interface LicenseKey {
  key: string;
  revoked: boolean;
  valid_for_days: number;
  creation_date: string;
  issuance_date: string | null;
  used_on_device: string | null;
  expires_on: string | null;
}

export interface ValidationResult {
  valid: boolean;
  message: string;
  status: number;
}

export interface BulkCreateResult {
  created: string[];
  skipped: string[];
}

export interface GenerateOptions {
  groups?: number;
  groupLength?: number;
  separator?: string;
  prefix?: string;
}

export class ApiRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
  }
}

async function errorMessage(response: Response): Promise<string> {
  const body: unknown = await response.json().catch(() => null);
  if (typeof body === "object" && body !== null) {
    if ("error" in body && typeof body.error === "string") return body.error;
    if ("message" in body && typeof body.message === "string") return body.message;
  }
  return response.statusText || `API request failed: ${response.status}`;
}

async function fetchApi<T>(
  config: ResolvedConfig,
  endpoint: string,
  init: { method?: string; body?: unknown; admin?: boolean } = {},
): Promise<T> {
  const headers: Record<string, string> = {};
  if (init.body !== undefined) headers["Content-Type"] = "application/json";
  if (init.admin) {
    if (!config.adminToken) {
      throw new ApiRequestError(401, "No admin token configured (set KEYBIND_ADMIN_TOKEN)");
    }
    headers.Authorization = `Bearer ${config.adminToken}`;
  }

  const response = await fetch(`${config.apiUrl}${endpoint}`, {
    method: init.method ?? "GET",
    headers,
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  });

  if (!response.ok) {
    throw new ApiRequestError(response.status, await errorMessage(response));
  }

  return response.json() as Promise<T>;
}

function keyPath(key: string): string {
  return `/v1/admin/keys/${encodeURIComponent(key)}`;
}

/**
 * Denials are answers, not failures: 4xx responses carrying `valid` are
 * returned as results.
 */
export async function validateKey(
  config: ResolvedConfig,
  key: string,
  deviceId: string,
): Promise<ValidationResult> {
  const response = await fetch(`${config.apiUrl}/v1/licenses/validate`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ key, device_id: deviceId }),
  });

  const body: unknown = await response.json().catch(() => null);
  if (
    typeof body === "object" &&
    body !== null &&
    "valid" in body &&
    typeof body.valid === "boolean" &&
    "message" in body &&
    typeof body.message === "string"
  ) {
    return { valid: body.valid, message: body.message, status: response.status };
  }
  throw new ApiRequestError(response.status, response.statusText || "Unexpected response");
}

export async function listKeys(config: ResolvedConfig): Promise<LicenseKey[]> {
  const result = await fetchApi<{ keys: LicenseKey[] }>(config, "/v1/admin/keys", { admin: true });
  return result.keys;
}

export async function getKey(config: ResolvedConfig, key: string): Promise<LicenseKey> {
  return fetchApi<LicenseKey>(config, keyPath(key), { admin: true });
}

export async function createKey(
  config: ResolvedConfig,
  key: string,
  validForDays: number,
): Promise<LicenseKey> {
  return fetchApi<LicenseKey>(config, "/v1/admin/keys", {
    method: "POST",
    body: { key, valid_for_days: validForDays },
    admin: true,
  });
}

export async function revokeKey(config: ResolvedConfig, key: string): Promise<LicenseKey> {
  return fetchApi<LicenseKey>(config, `${keyPath(key)}/revoke`, { method: "POST", admin: true });
}

export async function reinstateKey(config: ResolvedConfig, key: string): Promise<LicenseKey> {
  return fetchApi<LicenseKey>(config, `${keyPath(key)}/reinstate`, { method: "POST", admin: true });
}

export async function setValidity(
  config: ResolvedConfig,
  key: string,
  validForDays: number,
): Promise<LicenseKey> {
  return fetchApi<LicenseKey>(config, keyPath(key), {
    method: "PATCH",
    body: { valid_for_days: validForDays },
    admin: true,
  });
}

export async function bulkCreate(
  config: ResolvedConfig,
  keys: string[],
  validForDays: number,
): Promise<BulkCreateResult> {
  return fetchApi<BulkCreateResult>(config, "/v1/admin/keys/bulk", {
    method: "POST",
    body: { keys, valid_for_days: validForDays },
    admin: true,
  });
}

export async function generateKeys(
  config: ResolvedConfig,
  count: number,
  validForDays: number,
  format: GenerateOptions = {},
): Promise<string[]> {
  const wireFormat: Record<string, unknown> = {};
  if (format.groups !== undefined) wireFormat.groups = format.groups;
  if (format.groupLength !== undefined) wireFormat.group_length = format.groupLength;
  if (format.separator !== undefined) wireFormat.separator = format.separator;
  if (format.prefix !== undefined) wireFormat.prefix = format.prefix;

  const result = await fetchApi<{ keys: string[] }>(config, "/v1/admin/keys/generate", {
    method: "POST",
    body: {
      count,
      valid_for_days: validForDays,
      ...(Object.keys(wireFormat).length > 0 ? { format: wireFormat } : {}),
    },
    admin: true,
  });
  return result.keys;
}
