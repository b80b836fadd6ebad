/**
 * YAML parsing with limits for configuration files.
 *
 * Guards against alias bombs via maxAliasCount, deep nesting and oversized
 * input. Configuration is operator-supplied, so the limits are small.
 */

import { parse as yamlParse } from 'yaml';

export const YAML_LIMITS = {
  /** Maximum number of aliases to resolve */
  MAX_ALIAS_COUNT: 10,
  /** Maximum nesting depth for parsed structures */
  MAX_DEPTH: 20,
  /** Maximum size of input in characters */
  MAX_INPUT_SIZE: 1024 * 1024,
} as const;

export interface YamlLimits {
  maxAliasCount?: number;
  maxDepth?: number;
  maxInputSize?: number;
}

function validateDepth(value: unknown, maxDepth: number, currentDepth = 0): void {
  if (currentDepth > maxDepth) {
    throw new Error(`YAML nesting depth exceeds maximum of ${maxDepth}`);
  }

  if (Array.isArray(value)) {
    for (const item of value) {
      validateDepth(item, maxDepth, currentDepth + 1);
    }
  } else if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      validateDepth(child, maxDepth, currentDepth + 1);
    }
  }
}

/**
 * Parse YAML within the given limits.
 *
 * @throws Error if the document is malformed or exceeds a limit
 */
export function parseYamlSecure(content: string, limits: YamlLimits = {}): unknown {
  const maxAliasCount = limits.maxAliasCount ?? YAML_LIMITS.MAX_ALIAS_COUNT;
  const maxDepth = limits.maxDepth ?? YAML_LIMITS.MAX_DEPTH;
  const maxInputSize = limits.maxInputSize ?? YAML_LIMITS.MAX_INPUT_SIZE;

  if (content.length > maxInputSize) {
    throw new Error(
      `YAML input size (${content.length} characters) exceeds maximum of ${maxInputSize}`
    );
  }

  const parsed: unknown = yamlParse(content, { maxAliasCount });
  validateDepth(parsed, maxDepth);
  return parsed;
}
