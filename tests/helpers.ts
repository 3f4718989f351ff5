import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { OperationSink } from '../src/services/OperationLog.js';

export interface RecordedOperation {
  operation: string;
  details: Record<string, string>;
}

/**
 * In-memory OperationSink for asserting what was recorded.
 */
export class RecordingSink implements OperationSink {
  readonly entries: RecordedOperation[] = [];

  async record(operation: string, details: Record<string, string>): Promise<void> {
    this.entries.push({ operation, details });
  }
}

/**
 * Fresh temporary directory
 */
export function createTempDir(prefix = 'tidyfs-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

/**
 * Write a file, creating parent directories as needed
 */
export function writeTestFile(filePath: string, content: string | Buffer): string {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

/**
 * Poll until `condition` holds or the timeout elapses
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout = 5000,
  interval = 20
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await sleep(interval);
  }

  throw new Error(`Condition not met within ${timeout}ms`);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * A promise plus the functions that settle it
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}
