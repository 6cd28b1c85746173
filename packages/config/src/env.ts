/**
 * Centralized environment variable loader
 *
 * Locates the workspace root and loads .env deterministically.
 * Provides diagnostics and validation without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  requiredKeys: Array<{ key: string; present: boolean; maskedValue?: string; length?: number; source?: string }>;
  warnings: string[];
}

export interface EnvInitResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>; // Maps key -> source file ('.env' or '.env.local')
}

const ROOT_PACKAGE_NAME = 'research-digest';

function isWorkspaceManifest(content: string): boolean {
  try {
    const pkg: unknown = JSON.parse(content);
    if (typeof pkg !== 'object' || pkg === null) return false;
    return 'workspaces' in pkg || ('name' in pkg && pkg.name === ROOT_PACKAGE_NAME);
  } catch {
    // Unparseable package.json is not a workspace root
    return false;
  }
}

/**
 * Find repository root by walking up from current directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && isWorkspaceManifest(readFileSync(packageJsonPath, 'utf-8'))) {
      return current;
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break; // Reached filesystem root
    current = parent;
  }

  return resolve(startPath);
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSecretKey(key: string): boolean {
  return key.includes('TOKEN') || key.includes('SECRET') || key.includes('PASSWORD') || key.includes('KEY');
}

/**
 * Check if value contains unprintable characters (common Windows CRLF issues)
 */
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

// Guard to ensure dotenv is only loaded once
let cachedResult: EnvInitResult | null = null;

function loadFile(
  path: string,
  label: string,
  keysLoaded: string[],
  keySources: Record<string, string>
): boolean {
  const result = config({ path, override: true });
  const hasParsedValues = !!(result.parsed && Object.keys(result.parsed).length > 0);
  const loaded = !result.error || hasParsedValues;

  for (const [key, value] of Object.entries(result.parsed ?? {})) {
    if (isBlank(value)) continue;
    keySources[key] = label;
    if (!keysLoaded.includes(key)) {
      keysLoaded.push(key);
    }
  }

  if (!loaded && result.error) {
    console.warn(`[env] Warning: Error loading ${label} file: ${result.error.message}`);
  }
  return loaded;
}

/**
 * Initialize environment variables
 * Must be called before any code reads process.env
 *
 * Loads <repo-root>/.env, then <repo-root>/.env.local (overrides .env).
 * A non-empty variable already in the environment is never replaced by an empty one.
 */
export function initEnv(envFileOverride?: string): EnvInitResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && !isBlank(value)) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadFile(envFilePath, '.env', keysLoaded, keySources);
  } else {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    if (isBlank(process.env[key])) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };

  return cachedResult;
}

/**
 * Get environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(requiredKeys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources ?? {};

  const requiredKeysStatus = requiredKeys.map((key) => {
    const value = process.env[key];
    if (!value || isBlank(value)) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.trim().length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  for (const key of requiredKeys) {
    const value = process.env[key];
    if (!value) continue;
    if (isSecretKey(key) && hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists,
    requiredKeys: requiredKeysStatus,
    warnings,
  };
}
