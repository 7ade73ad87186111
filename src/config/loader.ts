import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { WrError, ErrorCode, errorMessage } from '../lib/errors.js';
import { configSchema, type WrConfig } from './schema.js';

// ── Error formatting ──

export function formatConfigError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `✗ ${path}: ${issue.message}` : `✗ ${issue.message}`;
    })
    .join('\n');
}

// ── Public API ──

/** Parse wr.yml content. An empty document is an empty config. */
export function parseConfigYaml(content: string): WrConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new WrError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Invalid YAML: ${errorMessage(err)}`,
      'Check wr.yml for syntax errors (indentation, colons, etc.)',
    );
  }

  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new WrError(
      ErrorCode.CONFIG_VALIDATION_ERROR,
      formatConfigError(result.error),
      'Fix the issues above and try again',
    );
  }

  return result.data;
}

/** Load and validate a wr.yml file. Throws WrError on failure. */
export function loadConfig(filePath: string): WrConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new WrError(
      ErrorCode.CONFIG_NOT_FOUND,
      `Config file '${filePath}' not found.`,
      'Create a wr.yml in the project root or pass --config <path>',
    );
  }

  return parseConfigYaml(content);
}
