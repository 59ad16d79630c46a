import { homedir } from 'node:os';
import { resolve } from 'node:path';

/**
 * Resolve environment variables in strings
 * Supports ${VAR_NAME} syntax
 *
 * @param value - String that may contain ${VAR_NAME} placeholders
 * @returns String with environment variables resolved
 */
export function resolveEnv(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const envValue = process.env[varName];
    if (envValue === undefined) {
      throw new Error(`Environment variable "${varName}" is not set`);
    }
    return envValue;
  });
}

/**
 * Recursively resolve environment variables in every string of a parsed config tree
 */
export function resolveEnvRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnv(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvRecursive(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvRecursive(value);
    }
    return result;
  }

  return obj;
}

/**
 * Expand a leading `~` and ${VAR} placeholders, then make the path absolute
 */
export function expandPath(path: string): string {
  let expanded = resolveEnv(path);
  if (expanded === '~') {
    expanded = homedir();
  } else if (expanded.startsWith('~/')) {
    expanded = `${homedir()}${expanded.slice(1)}`;
  }
  return resolve(expanded);
}
