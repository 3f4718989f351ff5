import { calculateFileChecksum } from '../lib/checksum.js';
import { filesHaveSameContent, isDirectory, walkFiles } from '../lib/fsUtils.js';
import { NotFoundError, toError } from '../lib/errors.js';
import { createChildLogger, getLogger } from '../lib/logger.js';
import type { DuplicateReport } from '../models/DuplicateReport.js';
import { createDuplicateReport } from '../models/DuplicateReport.js';

export interface DuplicateDetectorOptions {
  /**
   * Compare bytes before reporting a digest match, so a hash collision
   * between different contents is not reported.
   */
  confirmContent: boolean;
}

const DEFAULT_OPTIONS: DuplicateDetectorOptions = {
  confirmContent: true,
};

export class DuplicateDetector {
  private options: DuplicateDetectorOptions;
  private logger = getLogger();

  constructor(options: Partial<DuplicateDetectorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Report every file whose content matches a file seen earlier in the walk.
   * Each duplicate points at the first file seen with that content.
   */
  async findDuplicates(directory: string): Promise<DuplicateReport> {
    if (!(await isDirectory(directory))) {
      this.logger.error({ directory }, 'Directory does not exist');
      throw new NotFoundError(`Directory does not exist: ${directory}`, { directory });
    }

    const report = createDuplicateReport();
    // digest -> first path of each distinct content carrying that digest
    const index = new Map<string, string[]>();

    const recordError = (path: string, error: Error) => {
      createChildLogger({ filePath: path }).error({ error }, 'Skipping unreadable entry');
      report.errors.push({ path, message: error.message });
    };

    for await (const filePath of walkFiles(directory, recordError)) {
      report.filesScanned++;

      let digest: string;
      try {
        digest = await calculateFileChecksum(filePath, 'md5');
      } catch (error) {
        recordError(filePath, toError(error));
        continue;
      }

      const originals = index.get(digest);
      if (!originals) {
        index.set(digest, [filePath]);
        continue;
      }

      let originalPath: string | null;
      try {
        originalPath = await this.findOriginal(filePath, originals);
      } catch (error) {
        recordError(filePath, toError(error));
        continue;
      }

      if (originalPath === null) {
        this.logger.warn({ filePath, digest }, 'Digest collision with different content');
        originals.push(filePath);
        continue;
      }

      this.logger.info({ duplicate: filePath, original: originalPath }, 'Duplicate found');
      report.duplicates.push({ path: filePath, originalPath });
    }

    if (report.duplicates.length === 0) {
      this.logger.info({ directory, filesScanned: report.filesScanned }, 'No duplicate files found');
    } else {
      this.logger.info(
        { directory, filesScanned: report.filesScanned, duplicates: report.duplicates.length },
        'Duplicate files found'
      );
    }

    return report;
  }

  private async findOriginal(filePath: string, originals: string[]): Promise<string | null> {
    if (!this.options.confirmContent) {
      return originals[0] ?? null;
    }

    for (const candidate of originals) {
      if (await filesHaveSameContent(filePath, candidate)) {
        return candidate;
      }
    }
    return null;
  }
}

export async function findDuplicates(
  directory: string,
  options: Partial<DuplicateDetectorOptions> = {}
): Promise<DuplicateReport> {
  return new DuplicateDetector(options).findDuplicates(directory);
}
