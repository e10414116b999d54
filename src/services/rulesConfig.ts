/**
 * Rules configuration loader
 *
 * Reads the commercial rules file ({ "rules": [...] }).
 */

import { readFile } from 'node:fs/promises';
import { rulesFileSchema } from '../types/rules.js';
import type { Rule } from '../types/rules.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export function parseRules(raw: unknown, source = 'rules'): Rule[] {
  const result = rulesFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid ${source}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`
    );
  }
  return result.data.rules;
}

/**
 * Load the rules file; a missing file means no rules
 */
export async function loadRules(path: string): Promise<Rule[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn({ path }, 'Rules file not found, running without rules');
      return [];
    }
    throw new ConfigurationError(`Cannot read rules ${path}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Rules file ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  const rules = parseRules(raw, path);
  logger.info({ path, rules: rules.length }, 'Rules loaded');
  return rules;
}
