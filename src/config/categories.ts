import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { CategoryLabel, CategoryRules } from '../types/index.js';
import { normalizeExtension } from '../types/index.js';
import { categoryLabelSchema } from '../services/Classifier.js';
import { ConfigurationError, errnoCode, toError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';
import defaultCategories from './default-categories.json';

const rulesFileSchema = z.record(z.string(), z.array(z.string()));

/**
 * Validate a `label -> extensions[]` object and build CategoryRules.
 * Every problem is reported at load time, never per file.
 */
export function parseCategoryRules(raw: unknown): CategoryRules {
  const parsed = rulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Category rules must map each label to a list of extensions', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const rules = new Map<CategoryLabel, ReadonlySet<string>>();
  const owners = new Map<string, CategoryLabel>();

  for (const [rawLabel, rawExtensions] of Object.entries(parsed.data)) {
    const label = categoryLabelSchema.safeParse(rawLabel);
    if (!label.success) {
      throw new ConfigurationError(`Invalid category label: "${rawLabel}"`, {
        label: rawLabel,
        issues: label.error.issues.map((issue) => issue.message),
      });
    }

    if (rawExtensions.length === 0) {
      throw new ConfigurationError(`Category "${label.data}" has no extensions`, { label: label.data });
    }

    const extensions = new Set<string>();
    for (const rawExtension of rawExtensions) {
      const extension = normalizeExtension(rawExtension);
      if (extension === '' || extension === '.') {
        throw new ConfigurationError(`Category "${label.data}" contains an empty extension`, {
          label: label.data,
        });
      }

      const owner = owners.get(extension);
      if (owner !== undefined && owner !== label.data) {
        throw new ConfigurationError(
          `Extension ${extension} is claimed by both "${owner}" and "${label.data}"`,
          { extension, categories: [owner, label.data] }
        );
      }

      owners.set(extension, label.data);
      extensions.add(extension);
    }

    if (rules.has(label.data)) {
      throw new ConfigurationError(`Category "${label.data}" is defined twice`, { label: label.data });
    }
    rules.set(label.data, extensions);
  }

  if (rules.size === 0) {
    throw new ConfigurationError('Category rules are empty');
  }

  return rules;
}

export function getDefaultCategoryRules(): CategoryRules {
  return parseCategoryRules(defaultCategories);
}

/**
 * Rules from a JSON file, or the built-in table when no path is given.
 */
export async function loadCategoryRules(rulesPath: string | null): Promise<CategoryRules> {
  const logger = getLogger();

  if (rulesPath === null) {
    const rules = getDefaultCategoryRules();
    logger.info({ categories: rules.size }, 'Using built-in category rules');
    return rules;
  }

  let content: string;
  try {
    content = await readFile(rulesPath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConfigurationError(`Category rules file does not exist: ${rulesPath}`, { rulesPath });
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Category rules file is not valid JSON: ${rulesPath}`, {
      rulesPath,
      reason: toError(error).message,
    });
  }

  const rules = parseCategoryRules(raw);
  logger.info({ rulesPath, categories: rules.size }, 'Category rules loaded');
  return rules;
}
