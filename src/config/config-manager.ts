/**
 * Unified Configuration Loader
 *
 * Loads, merges, and validates configuration from user-level
 * (~/.config/trace-digest/config.json) and project-level
 * (.trace-digest/config.json) sources.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_CONFIG } from '../defaults.js';
import { getConfigPath, getProjectDir } from '../paths.js';
import { UserConfigSchema, type ResolvedConfig, type ValidatedUserConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
  /** Values applied on top of the file sources (e.g. from CLI flags) */
  overrides?: ValidatedUserConfig;
}

export interface ConfigLoadResult {
  /** Merged config with defaults applied */
  config: ResolvedConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

// =============================================================================
// LOADER
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isPlainObject(parsed)) {
      warnings.push(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      );
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Validate a merged object. Keys that fail validation are reported and
 * dropped so the remaining keys still apply.
 */
function validate(merged: Record<string, unknown>, warnings: string[]): ValidatedUserConfig {
  const first = UserConfigSchema.safeParse(merged);
  if (first.success) {
    return first.data;
  }

  const cleaned = { ...merged };
  for (const issue of first.error.issues) {
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        warnings.push(`config validation: unknown key "${key}"`);
        delete cleaned[key];
      }
      continue;
    }
    const key = issue.path[0];
    warnings.push(`config validation: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    if (typeof key === 'string') {
      delete cleaned[key];
    }
  }

  const second = UserConfigSchema.safeParse(cleaned);
  return second.success ? second.data : {};
}

/**
 * Load configuration from user-level and project-level sources.
 *
 * Priority: defaults ← user ← project ← overrides.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false, overrides = {} } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  let projectRaw: Record<string, unknown> | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  const validated = validate({ ...userRaw, ...projectRaw }, warnings);
  const config: ResolvedConfig = { ...DEFAULT_CONFIG };
  for (const layer of [validated, overrides]) {
    Object.assign(
      config,
      Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined)),
    );
  }

  return { config, sources, warnings };
}
