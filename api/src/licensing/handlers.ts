/**
 * License Key Handlers
 *
 * 1 public validation endpoint + 7 admin endpoints. Admin endpoints call the
 * injected AdminGuard first; the guard either returns the caller or the
 * Response to send back.
 */

import {
  DAYS_ERROR,
  isValidDays,
  type AdminOperations,
  type AdminError,
  type AdminResult,
} from './admin.js';
import { parseKeyFormat } from './keygen.js';
import { toPublicRecord } from './policy.js';
import type { ValidationService } from './service.js';
import type { LicenseRecord, LicenseValidationResponse } from './types.js';

// ============================================
// Types
// ============================================

export interface AdminPrincipal {
  sub: string;
}

export type AdminGuard = (request: Request) => Promise<AdminPrincipal | Response>;

export interface LicensingContext {
  validation: ValidationService;
  admin: AdminOperations;
  requireAdmin: AdminGuard;
}

/** Applied when a create request leaves out valid_for_days. */
export const DEFAULT_VALID_FOR_DAYS = 30;

type JsonBody = Record<string, unknown>;

// ============================================
// Response helpers
// ============================================

export const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, PATCH, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json', ...corsHeaders },
  });
}

export function errorResponse(message: string, status: number): Response {
  return jsonResponse({ error: message }, status);
}

const ADMIN_ERROR_STATUS: Record<AdminError['kind'], number> = {
  bad_request: 400,
  not_found: 404,
  conflict: 409,
};

function adminResponse<T>(
  result: AdminResult<T>,
  render: (value: T) => unknown,
  status = 200,
): Response {
  if (!result.ok) return errorResponse(result.error.message, ADMIN_ERROR_STATUS[result.error.kind]);
  return jsonResponse(render(result.value), status);
}

const renderRecord = (record: LicenseRecord) => toPublicRecord(record);

// ============================================
// Body parsing
// ============================================

function isJsonBody(value: unknown): value is JsonBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonBody(request: Request): Promise<JsonBody | Response> {
  try {
    const body: unknown = await request.json();
    if (!isJsonBody(body)) return errorResponse('Invalid JSON body', 400);
    return body;
  } catch {
    return errorResponse('Invalid JSON body', 400);
  }
}

/** JSON by default; HTML forms post application/x-www-form-urlencoded. */
async function readValidationBody(request: Request): Promise<JsonBody | Response> {
  const contentType = request.headers.get('content-type') ?? '';
  if (
    contentType.includes('application/x-www-form-urlencoded') ||
    contentType.includes('multipart/form-data')
  ) {
    try {
      const form = await request.formData();
      const body: JsonBody = {};
      for (const [name, value] of form.entries()) {
        if (typeof value === 'string') body[name] = value;
      }
      return body;
    } catch {
      return errorResponse('Invalid form body', 400);
    }
  }
  return readJsonBody(request);
}

function stringField(body: JsonBody, name: string): string {
  const value = body[name];
  return typeof value === 'string' ? value : '';
}

function daysField(body: JsonBody): number | Response {
  const value = body.valid_for_days;
  if (value === undefined) return DEFAULT_VALID_FOR_DAYS;
  if (!isValidDays(value)) return errorResponse(DAYS_ERROR, 400);
  return value;
}

function keyListField(body: JsonBody): string[] | Response {
  const value = body.keys;
  if (typeof value === 'string') return value.split(/[\s,]+/);
  if (Array.isArray(value) && value.every((k): k is string => typeof k === 'string')) {
    return value;
  }
  return errorResponse('keys must be an array of strings or a newline-separated string', 400);
}

// ============================================
// Public: Validate License
// ============================================

export async function handleLicenseValidate(
  ctx: LicensingContext,
  request: Request,
): Promise<Response> {
  const body = await readValidationBody(request);
  if (body instanceof Response) return body;

  const outcome = await ctx.validation.validate(stringField(body, 'key'), stringField(body, 'device_id'));
  const payload: LicenseValidationResponse = { valid: outcome.granted, message: outcome.message };
  return jsonResponse(payload, outcome.status);
}

// ============================================
// Admin: List / Detail
// ============================================

export async function handleAdminListKeys(
  ctx: LicensingContext,
  request: Request,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  const records = await ctx.admin.listKeys();
  return jsonResponse({ keys: records.map(renderRecord), total: records.length });
}

export async function handleAdminKeyDetail(
  ctx: LicensingContext,
  request: Request,
  key: string,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  return adminResponse(await ctx.admin.getKey(key), renderRecord);
}

// ============================================
// Admin: Create
// ============================================

export async function handleAdminCreateKey(
  ctx: LicensingContext,
  request: Request,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  const body = await readJsonBody(request);
  if (body instanceof Response) return body;

  const days = daysField(body);
  if (days instanceof Response) return days;

  const result = await ctx.admin.createKey(stringField(body, 'key'), days, adminOrError.sub);
  return adminResponse(result, renderRecord, 201);
}

export async function handleAdminBulkCreate(
  ctx: LicensingContext,
  request: Request,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  const body = await readJsonBody(request);
  if (body instanceof Response) return body;

  const keys = keyListField(body);
  if (keys instanceof Response) return keys;
  const days = daysField(body);
  if (days instanceof Response) return days;

  const result = await ctx.admin.bulkCreate(keys, days, adminOrError.sub);
  return adminResponse(result, (value) => value, 201);
}

export async function handleAdminGenerateKeys(
  ctx: LicensingContext,
  request: Request,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  const body = await readJsonBody(request);
  if (body instanceof Response) return body;

  const count = body.count;
  if (typeof count !== 'number') return errorResponse('count is required', 400);
  const days = daysField(body);
  if (days instanceof Response) return days;
  const format = parseKeyFormat(body.format);
  if (!format.ok) return errorResponse(format.error, 400);

  const result = await ctx.admin.generateUniqueKeys(count, days, format.format, adminOrError.sub);
  return adminResponse(result, (records) => ({ keys: records.map((r) => r.key) }), 201);
}

// ============================================
// Admin: Revoke / Reinstate / Modify validity
// ============================================

export async function handleAdminRevokeKey(
  ctx: LicensingContext,
  request: Request,
  key: string,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  return adminResponse(await ctx.admin.revokeKey(key, adminOrError.sub), renderRecord);
}

export async function handleAdminReinstateKey(
  ctx: LicensingContext,
  request: Request,
  key: string,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  return adminResponse(await ctx.admin.reinstateKey(key, adminOrError.sub), renderRecord);
}

export async function handleAdminModifyValidity(
  ctx: LicensingContext,
  request: Request,
  key: string,
): Promise<Response> {
  const adminOrError = await ctx.requireAdmin(request);
  if (adminOrError instanceof Response) return adminOrError;

  const body = await readJsonBody(request);
  if (body instanceof Response) return body;
  if (body.valid_for_days === undefined) return errorResponse('valid_for_days is required', 400);

  const days = daysField(body);
  if (days instanceof Response) return days;

  return adminResponse(await ctx.admin.modifyValidity(key, days, adminOrError.sub), renderRecord);
}
