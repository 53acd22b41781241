import * as fs from 'node:fs';
import * as yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { type CacheEngineConfig, type CacheEngineConfigInput, CacheEngineConfigSchema } from './schema';

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

const fieldDescriptions: Record<string, string> = {
  singleSuffix: 'Namespace suffix that separates single-item views from collection views',
  keyDelimiter: 'Separator placed between a logical key and its namespace suffix',
  logFetchErrors: 'Whether failed refreshes are also logged at warning level',
};

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
    let message = issue.message;

    if (issue.code === 'invalid_type') {
      message = `Expected ${issue.expected}, but received ${issue.received}`;
    } else if (issue.code === 'unrecognized_keys') {
      message = `Unrecognized key(s): ${issue.keys.join(', ')}`;
    } else if (issue.code === 'too_small' && issue.type === 'string') {
      message = 'Must not be empty';
    }

    const context = fieldDescriptions[path];
    return context ? `${path}: ${message}\n    → ${context}` : `${path}: ${message}`;
  });
}

function parseConfig(input: unknown, sourcePath?: string): CacheEngineConfig {
  const parsed = CacheEngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const message = `Configuration validation failed${sourcePath ? ` for ${sourcePath}` : ''}`;
    throw new ConfigValidationError(message, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function resolveEngineConfig(input?: CacheEngineConfigInput): CacheEngineConfig {
  return parseConfig(input ?? {});
}

export function validateFromString(yamlContent: string, sourcePath?: string): CacheEngineConfig {
  let parsedYaml: unknown;

  try {
    parsedYaml = yaml.load(yamlContent);
  } catch (error) {
    const message = `Invalid YAML syntax${sourcePath ? ` in ${sourcePath}` : ''}`;
    throw new ConfigValidationError(message, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  // An empty document means "all defaults"
  return parseConfig(parsedYaml ?? {}, sourcePath);
}

export function validateFromFile(configPath: string): CacheEngineConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigValidationError(`Configuration file not found: ${configPath}`);
  }

  const fileContent = fs.readFileSync(configPath, 'utf8');
  return validateFromString(fileContent, configPath);
}

export function validateDefaults(config: CacheEngineConfig): string[] {
  const warnings: string[] = [];

  if (config.singleSuffix.includes(config.keyDelimiter)) {
    warnings.push(
      `The single suffix '${config.singleSuffix}' contains the key delimiter '${config.keyDelimiter}', composite keys may be ambiguous`
    );
  }

  if (config.keyDelimiter.trim().length === 0) {
    warnings.push('The key delimiter is whitespace only, composite keys will be hard to read in logs');
  }

  return warnings;
}
