/**
 * Environment variable parsing.
 *
 * Unset or empty variables yield `undefined` so zod defaults apply;
 * malformed values throw instead of silently falling back.
 *
 * @module utils/env
 */

export function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseFloatEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseBoolEnv(name: string): boolean | undefined {
  const raw = process.env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`Invalid boolean env var ${name}: "${process.env[name]}"`);
}

export function stringEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}
