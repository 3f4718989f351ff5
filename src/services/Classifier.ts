import { extname } from 'path';
import { z } from 'zod';
import type { CategoryLabel, CategoryRules } from '../types/index.js';
import { FALLBACK_CATEGORY } from '../types/index.js';
import type { FileMetadata } from '../models/FileMetadata.js';
import { ClassificationError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

/**
 * Maps file metadata to the folder it belongs in.
 */
export interface ClassificationModel {
  predictCategory(metadata: FileMetadata): Promise<CategoryLabel>;
}

/**
 * An external predictor. Its output is untrusted and validated before use.
 */
export interface PredictiveModel {
  predict(metadata: FileMetadata): unknown;
}

export type ClassifierConfig =
  | { kind: 'rules'; rules: CategoryRules }
  | { kind: 'external'; model: PredictiveModel; name?: string };

/** A label is used as a directory name under the target root. */
export const categoryLabelSchema = z
  .string()
  .trim()
  .min(1, 'Category label must not be empty')
  .refine((label) => !/[\\/]/.test(label), 'Category label must not contain path separators')
  .refine((label) => label !== '.' && label !== '..', 'Category label must not be . or ..');

/**
 * Category for a file name under a static extension table.
 * First matching category in rule order wins; no match gives "Others".
 */
export function classify(metadata: Pick<FileMetadata, 'name'>, rules: CategoryRules): CategoryLabel {
  const extension = extname(metadata.name).toLowerCase();

  for (const [category, extensions] of rules) {
    if (extensions.has(extension)) {
      return category;
    }
  }

  return FALLBACK_CATEGORY;
}

export class RuleTableModel implements ClassificationModel {
  private readonly rules: CategoryRules;

  constructor(rules: CategoryRules) {
    this.rules = rules;
  }

  async predictCategory(metadata: FileMetadata): Promise<CategoryLabel> {
    return classify(metadata, this.rules);
  }
}

/**
 * Adapts an external predictor to the ClassificationModel contract.
 * A failing predictor or an unusable label is a ClassificationError, never a fallback.
 */
export class ExternalModelClassifier implements ClassificationModel {
  private readonly model: PredictiveModel;
  private readonly name: string;

  constructor(model: PredictiveModel, name = 'external') {
    this.model = model;
    this.name = name;
  }

  async predictCategory(metadata: FileMetadata): Promise<CategoryLabel> {
    let prediction: unknown;

    try {
      prediction = await this.model.predict(metadata);
    } catch (error) {
      throw new ClassificationError(
        `Model ${this.name} failed to classify ${metadata.name}`,
        { model: this.name, file: metadata.path },
        error
      );
    }

    const result = categoryLabelSchema.safeParse(prediction);
    if (!result.success) {
      throw new ClassificationError(
        `Model ${this.name} returned an invalid category for ${metadata.name}`,
        {
          model: this.name,
          file: metadata.path,
          prediction: typeof prediction === 'string' ? prediction : typeof prediction,
          issues: result.error.issues.map((issue) => issue.message),
        }
      );
    }

    getLogger().debug({ model: this.name, file: metadata.path, category: result.data }, 'Model prediction');
    return result.data;
  }
}

/**
 * Files by modification day, as `YYYY-MM-DD` in local time.
 */
export class ModificationDateModel implements ClassificationModel {
  async predictCategory(metadata: FileMetadata): Promise<CategoryLabel> {
    const date = metadata.modifiedAt;
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
  }
}

export function createClassificationModel(config: ClassifierConfig): ClassificationModel {
  switch (config.kind) {
    case 'rules':
      return new RuleTableModel(config.rules);
    case 'external':
      return new ExternalModelClassifier(config.model, config.name);
  }
}
