/**
 * Environment Variable Schema & Validation
 *
 * Central registry of the environment variables read by the detector.
 * Provides validation, documentation, and a CLI summary.
 */

export interface EnvVarDef {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: 'string' | 'number';
  /** Default value (as string, since env vars are always strings) */
  default?: string;
  /** Human-readable description */
  description: string;
  /** Category for grouping in CLI output */
  category: EnvCategory;
  /** Minimum value for numbers */
  min?: number;
  /** Regex pattern for string validation */
  pattern?: RegExp;
}

export type EnvCategory = 'logging' | 'io';

export const ENV_CATEGORIES: readonly EnvCategory[] = ['io', 'logging'];

/**
 * Complete schema of all environment variables used across the codebase.
 */
export const ENV_SCHEMA: EnvVarDef[] = [
  // ---- I/O ----
  {
    name: 'ENCDETECT_MAX_FILE_BYTES',
    type: 'number',
    default: '67108864',
    description: 'Largest file the loader reads into memory, in bytes (0 disables the limit)',
    category: 'io',
    min: 0,
  },

  // ---- Logging ----
  {
    name: 'ENCDETECT_LOG_LEVEL',
    type: 'string',
    default: 'warn',
    description: 'Logging level (debug, info, warn, error, silent)',
    category: 'logging',
    pattern: /^(debug|info|warn|error|silent)$/,
  },
  {
    name: 'ENCDETECT_LOG_FORMAT',
    type: 'string',
    default: 'text',
    description: 'Log output format (text or json)',
    category: 'logging',
    pattern: /^(text|json)$/,
  },
];

// ---------------------------------------------------------------------------
// Lookup helpers
// ---------------------------------------------------------------------------

const schemaByName: Map<string, EnvVarDef> = new Map(
  ENV_SCHEMA.map(def => [def.name, def])
);

/**
 * Look up a single env var definition by name.
 */
export function getEnvDef(name: string): EnvVarDef | undefined {
  return schemaByName.get(name);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean;
  warnings: string[];
}

/**
 * Validate the given environment against the schema.
 * Type mismatches and out-of-range values produce warnings.
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): ValidationResult {
  const warnings: string[] = [];

  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];

    // Skip further checks if not set
    if (raw === undefined || raw === '') {
      continue;
    }

    switch (def.type) {
      case 'number': {
        const num = Number(raw);
        if (isNaN(num)) {
          warnings.push(`${def.name} should be a number but got "${raw}"`);
        } else if (def.min !== undefined && num < def.min) {
          warnings.push(`${def.name}=${raw} is below minimum ${def.min}`);
        }
        break;
      }
      case 'string': {
        if (def.pattern && !def.pattern.test(raw)) {
          warnings.push(`${def.name}="${raw}" does not match expected pattern ${def.pattern}`);
        }
        break;
      }
    }
  }

  return {
    valid: warnings.length === 0,
    warnings,
  };
}

// ---------------------------------------------------------------------------
// Summary / CLI output
// ---------------------------------------------------------------------------

const CATEGORY_LABELS: Record<EnvCategory, string> = {
  io: 'File Loading',
  logging: 'Logging',
};

/**
 * Generate a formatted summary of the environment variables for CLI output.
 */
export function getEnvSummary(
  env: Record<string, string | undefined> = process.env,
  category?: EnvCategory
): string {
  const lines: string[] = [];
  const validation = validateEnv(env);

  lines.push('Encoding Detector Environment Configuration');
  lines.push('='.repeat(50));

  for (const cat of ENV_CATEGORIES) {
    if (category && cat !== category) continue;
    const defs = ENV_SCHEMA.filter(def => def.category === cat);
    if (defs.length === 0) continue;

    lines.push('');
    lines.push(`[${CATEGORY_LABELS[cat]}]`);

    for (const def of defs) {
      const raw = env[def.name];
      const isSet = raw !== undefined && raw !== '';
      const displayValue = isSet
        ? raw
        : def.default !== undefined ? `(default: ${def.default})` : '(not set)';

      const status = isSet ? '*' : ' ';
      lines.push(`  ${status} ${def.name}=${displayValue}`);
      lines.push(`    ${def.description}`);
    }
  }

  if (validation.warnings.length > 0) {
    lines.push('');
    lines.push('-'.repeat(50));
    lines.push('');
    lines.push('Warnings:');
    for (const warn of validation.warnings) {
      lines.push(`  ? ${warn}`);
    }
  }

  lines.push('');
  const setCount = ENV_SCHEMA.filter(d => {
    const v = env[d.name];
    return v !== undefined && v !== '';
  }).length;
  lines.push(`${setCount}/${ENV_SCHEMA.length} variables set`);
  lines.push('Legend: * = set');

  return lines.join('\n');
}
