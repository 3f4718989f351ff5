// ============================================================================
// Enums
// ============================================================================

export enum CollisionPolicy {
  RENAME = 'rename',
  OVERWRITE = 'overwrite',
  SKIP = 'skip'
}

export enum OperationType {
  MOVE = 'move',
  COPY = 'copy',
  DELETE = 'delete',
  ENCRYPT = 'encrypt',
  DECRYPT = 'decrypt',
  CREATE_DIRECTORY = 'create_directory',
  DELETE_DIRECTORY = 'delete_directory',
  RENAME_DIRECTORY = 'rename_directory',
  CREATE_TEXT_FILE = 'create_text_file',
  CREATE_WORD_FILE = 'create_word_file',
  CREATE_VIDEO_FILE = 'create_video_file',
  COMPRESS_DIRECTORY = 'compress_directory',
  DECOMPRESS_FILE = 'decompress_file'
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface OrganizerConfig {
  sourceDir: string;
  targetDir: string;
  categoryRulesPath: string | null;
  collisionPolicy: CollisionPolicy;
  watch: boolean;
}

export interface MonitoringConfig {
  watchPath: string;
  stabilityThreshold: number;
  pollInterval: number;
  ignoreHidden: boolean;
}

export interface StorageConfig {
  operationLogPath: string;
  encryptionKeyPath: string;
}

export interface DuplicateConfig {
  confirmContent: boolean;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  pretty: boolean;
}

export interface AppConfig {
  organizer: OrganizerConfig;
  monitoring: MonitoringConfig;
  storage: StorageConfig;
  duplicates: DuplicateConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Categories
// ============================================================================

export type CategoryLabel = string;

/** Ordered label -> lowercase extensions (with leading dot). */
export type CategoryRules = ReadonlyMap<CategoryLabel, ReadonlySet<string>>;

export const FALLBACK_CATEGORY: CategoryLabel = 'Others';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

// ============================================================================
// Helpers
// ============================================================================

export function isCollisionPolicy(value: string): value is CollisionPolicy {
  return Object.values<string>(CollisionPolicy).includes(value);
}

/**
 * Build CategoryRules from a plain record, normalizing extensions.
 * Keeps the record's key order.
 */
export function createCategoryRules(
  record: Record<CategoryLabel, readonly string[]>
): CategoryRules {
  const rules = new Map<CategoryLabel, ReadonlySet<string>>();
  for (const [label, extensions] of Object.entries(record)) {
    rules.set(label, new Set(extensions.map(normalizeExtension)));
  }
  return rules;
}

export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  if (lower === '') {
    return lower;
  }
  return lower.startsWith('.') ? lower : `.${lower}`;
}
