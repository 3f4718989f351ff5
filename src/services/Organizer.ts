import { mkdir, readdir } from 'fs/promises';
import { basename, join } from 'path';
import type { CategoryLabel } from '../types/index.js';
import { CollisionPolicy, OperationType } from '../types/index.js';
import { readFileMetadata } from '../models/FileMetadata.js';
import type { FileMetadata } from '../models/FileMetadata.js';
import type { ClassificationModel } from './Classifier.js';
import type { OperationSink } from './OperationLog.js';
import { isDirectory, moveEntry, resolveDestination } from '../lib/fsUtils.js';
import {
  ClassificationError,
  FileOperationError,
  NotFoundError,
  TidyError,
  toError,
} from '../lib/errors.js';
import { createChildLogger, getLogger } from '../lib/logger.js';

export interface OrganizerOptions {
  collisionPolicy: CollisionPolicy;
}

export interface Relocation {
  source: string;
  destination: string;
  category: CategoryLabel;
}

export interface OrganizeFailure {
  path: string;
  message: string;
}

export interface OrganizeResult {
  moved: Relocation[];
  failed: OrganizeFailure[];
}

const DEFAULT_OPTIONS: OrganizerOptions = {
  collisionPolicy: CollisionPolicy.RENAME,
};

export class Organizer {
  private model: ClassificationModel;
  private operations: OperationSink;
  private options: OrganizerOptions;
  private logger = getLogger();

  constructor(
    model: ClassificationModel,
    operations: OperationSink,
    options: Partial<OrganizerOptions> = {}
  ) {
    this.model = model;
    this.operations = operations;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Relocate every regular file directly inside `sourceDir` into `targetDir/<category>/`.
   *
   * Per-file I/O failures are recorded in the result and do not stop the batch.
   * A ClassificationError aborts the batch.
   */
  async organize(sourceDir: string, targetDir: string): Promise<OrganizeResult> {
    if (!(await isDirectory(sourceDir))) {
      this.logger.error({ sourceDir }, 'Source directory does not exist');
      throw new NotFoundError(`Source directory does not exist: ${sourceDir}`, { sourceDir });
    }

    await mkdir(targetDir, { recursive: true });

    const result: OrganizeResult = { moved: [], failed: [] };
    const entries = await readdir(sourceDir, { withFileTypes: true });

    this.logger.info({ sourceDir, targetDir, entries: entries.length }, 'Organizing directory');

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }

      const filePath = join(sourceDir, entry.name);

      try {
        result.moved.push(await this.organizeFile(filePath, targetDir));
      } catch (error) {
        if (error instanceof ClassificationError) {
          this.logger.error({ filePath, error }, 'Classification failed, aborting');
          throw error;
        }

        const err = toError(error);
        this.logger.error(
          { source: filePath, targetDir, error: err, context: err instanceof TidyError ? err.context : undefined },
          'Failed to organize file'
        );
        result.failed.push({ path: filePath, message: err.message });
      }
    }

    this.logger.info(
      { sourceDir, moved: result.moved.length, failed: result.failed.length },
      'File organization completed'
    );
    return result;
  }

  /**
   * Classify one file and move it into its category folder.
   * The category folder is created when missing; a concurrent create counts as success.
   */
  async organizeFile(filePath: string, targetDir: string): Promise<Relocation> {
    const logger = createChildLogger({ filePath });

    let metadata: FileMetadata;
    try {
      metadata = await readFileMetadata(filePath);
    } catch (error) {
      throw new FileOperationError(`Cannot read ${filePath}`, { source: filePath }, error);
    }

    const category = await this.model.predictCategory(metadata);
    const categoryDir = join(targetDir, category);

    let destination: string | null;
    try {
      await mkdir(categoryDir, { recursive: true });
      destination = await resolveDestination(categoryDir, basename(filePath), this.options.collisionPolicy);
    } catch (error) {
      throw new FileOperationError(
        `Cannot prepare category folder ${categoryDir}`,
        { source: filePath, target: categoryDir },
        error
      );
    }

    if (destination === null) {
      throw new FileOperationError(
        `Destination already holds ${basename(filePath)}`,
        { source: filePath, target: categoryDir, policy: this.options.collisionPolicy }
      );
    }

    try {
      await moveEntry(filePath, destination);
    } catch (error) {
      throw new FileOperationError(
        `Error moving ${filePath} to ${destination}`,
        { source: filePath, target: destination },
        error
      );
    }

    logger.info({ destination, category, mimeType: metadata.mimeType }, 'File organized');

    // The file already sits at `destination`; a log failure does not undo that
    try {
      await this.operations.record(OperationType.MOVE, {
        source: filePath,
        target: destination,
        category,
      });
    } catch (error) {
      logger.error({ destination, category, error: toError(error) }, 'Move succeeded but could not be recorded');
    }

    return { source: filePath, destination, category };
  }
}
