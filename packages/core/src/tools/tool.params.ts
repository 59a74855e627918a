import { ToolArgumentError } from './tool.types.js';

type Params = Record<string, unknown>;

export function requireString(tool: string, params: Params, key: string): string {
  const value = String(params[key] ?? '').trim();
  if (!value) {
    throw new ToolArgumentError(tool, `"${key}" is required`);
  }
  return value;
}

export function optionalString(params: Params, key: string, fallback: string): string {
  const value = String(params[key] ?? '').trim();
  return value || fallback;
}

/** Accepts numbers and numeric strings, since models send both. */
export function optionalNumber(
  tool: string,
  params: Params,
  key: string,
  fallback: number,
  { min = 0, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {},
): number {
  const raw = params[key];
  if (raw === undefined || raw === null || raw === '') return fallback;
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ToolArgumentError(tool, `"${key}" must be a number between ${min} and ${max}`);
  }
  return value;
}

export function optionalBoolean(params: Params, key: string, fallback: boolean): boolean {
  const raw = params[key];
  if (typeof raw === 'boolean') return raw;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return fallback;
}

/** Accepts an array, or a comma-separated string. */
export function stringList(tool: string, params: Params, key: string): string[] {
  const raw = params[key];
  const items = Array.isArray(raw) ? raw.map(String) : String(raw ?? '').split(',');
  const cleaned = items.map((item) => item.trim()).filter((item) => item.length > 0);
  if (cleaned.length === 0) {
    throw new ToolArgumentError(tool, `"${key}" must list at least one value`);
  }
  return cleaned;
}
