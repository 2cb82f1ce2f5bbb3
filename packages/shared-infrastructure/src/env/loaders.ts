/**
 * Environment loading helpers shared by the CLI and the HTTP service.
 * Configuration values are read once at startup; core modules receive them as plain objects.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parseEnv } from 'node:util';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  values: Record<string, string>;
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
  overriddenKeys: string[];
}

/**
 * Parse `.env` style files in order. Earlier files win unless `override` is set;
 * values already present in `process.env` are kept unless `override` is set.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvSummary {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = (options.files && options.files.length > 0 ? options.files : ['.env']).map(
    (file) => (isAbsolute(file) ? file : resolve(cwd, file)),
  );
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const values: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();
  const overriddenKeys = new Set<string>();

  for (const file of files) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }
    loadedFiles.push(file);
    const parsed = parseEnv(readFileSync(file, 'utf8'));

    for (const [key, value] of Object.entries(parsed)) {
      if (value === undefined) continue;
      if (override || values[key] === undefined) {
        values[key] = value;
      }
      if (!assignToProcess) continue;

      const alreadySet = process.env[key] !== undefined;
      if (alreadySet && !override) continue;
      if (alreadySet) {
        overriddenKeys.add(key);
      } else {
        assignedKeys.add(key);
      }
      process.env[key] = value;
    }
  }

  return {
    values,
    loadedFiles,
    missingFiles,
    assignedKeys: [...assignedKeys],
    overriddenKeys: [...overriddenKeys],
  };
}

export function readBool(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v === '1' || v.toLowerCase() === 'true';
}

export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isInteger(n) ? n : def;
}

export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/** First non-empty value among several variable names. */
export function readFirstString(names: string[], def?: string): string | undefined {
  for (const name of names) {
    const value = readString(name);
    if (value !== undefined) return value;
  }
  return def;
}
