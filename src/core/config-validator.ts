import type { ValidationIssue, ValidationResult } from '../types/validation.js';

const KNOWN_KEYS = new Set(['tool', 'profiles', 'compileArgs', 'syncArgs']);
const PROFILE_PATH_KEYS = ['spec', 'lock'] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function validateProfiles(
  profiles: Record<string, unknown>,
  issues: ValidationIssue[],
): void {
  for (const [name, profile] of Object.entries(profiles)) {
    if (!isRecord(profile)) {
      issues.push({
        severity: 'error',
        code: 'PROFILE_INVALID',
        message: `Profile "${name}" must be an object with "spec" and "lock"`,
        path: `profiles.${name}`,
      });
      continue;
    }

    for (const key of PROFILE_PATH_KEYS) {
      const path = profile[key];
      if (typeof path !== 'string' || path.trim() === '') {
        issues.push({
          severity: 'error',
          code: 'PROFILE_PATH_INVALID',
          message: `Profile "${name}" needs a non-empty "${key}" path`,
          path: `profiles.${name}.${key}`,
        });
      }
    }
  }
}

/**
 * Check a parsed reqlock.json document. Unknown top-level keys are
 * reported as warnings and do not make the config invalid.
 */
export function validateConfig(raw: unknown): ValidationResult {
  const issues: ValidationIssue[] = [];

  if (!isRecord(raw)) {
    issues.push({
      severity: 'error',
      code: 'CONFIG_NOT_OBJECT',
      message: 'Config must be a JSON object',
    });
    return { valid: false, issues };
  }

  if (
    raw.tool !== undefined &&
    (typeof raw.tool !== 'string' || raw.tool.trim() === '')
  ) {
    issues.push({
      severity: 'error',
      code: 'TOOL_INVALID',
      message: '"tool" must be a non-empty string',
      path: 'tool',
    });
  }

  if (raw.profiles !== undefined) {
    if (isRecord(raw.profiles)) {
      validateProfiles(raw.profiles, issues);
    } else {
      issues.push({
        severity: 'error',
        code: 'PROFILES_INVALID',
        message: '"profiles" must be an object keyed by profile name',
        path: 'profiles',
      });
    }
  }

  for (const key of ['compileArgs', 'syncArgs']) {
    if (raw[key] !== undefined && !isStringArray(raw[key])) {
      issues.push({
        severity: 'error',
        code: 'ARGS_INVALID',
        message: `"${key}" must be an array of strings`,
        path: key,
      });
    }
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      issues.push({
        severity: 'warning',
        code: 'UNKNOWN_KEY',
        message: `Unknown config key "${key}" is ignored`,
        path: key,
      });
    }
  }

  return {
    valid: !issues.some((issue) => issue.severity === 'error'),
    issues,
  };
}
