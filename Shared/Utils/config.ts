/**
 * Environment variable helpers shared by the service configs.
 */

import { homedir } from 'node:os';

/** Expand a leading `~` to the home directory. */
export function expandPath(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return p.replace('~', homedir());
  }
  return p;
}

export function getEnvBoolean(key: string): boolean | undefined;
export function getEnvBoolean(key: string, defaultValue: boolean): boolean;
export function getEnvBoolean(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const normalized = value.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return defaultValue;
}

/**
 * Collect the given env vars into an object, dropping unset ones so that
 * schema defaults apply.
 */
export function pickEnv(mapping: Record<string, string>): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(mapping)) {
    const value = process.env[envKey];
    if (value !== undefined && value !== '') {
      picked[field] = value;
    }
  }
  return picked;
}
