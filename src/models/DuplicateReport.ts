export interface DuplicatePair {
  /** File found later in the walk */
  path: string;

  /** First file seen with the same content */
  originalPath: string;
}

export interface FingerprintError {
  path: string;
  message: string;
}

export interface DuplicateReport {
  /** In discovery order */
  duplicates: DuplicatePair[];

  /** Files skipped because they could not be read */
  errors: FingerprintError[];

  filesScanned: number;
}

export function createDuplicateReport(): DuplicateReport {
  return {
    duplicates: [],
    errors: [],
    filesScanned: 0,
  };
}
