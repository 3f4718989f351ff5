import { watch, type FSWatcher } from 'chokidar';
import { basename, resolve } from 'path';
import { EventEmitter } from 'events';
import type { MonitoringConfig } from '../types/index.js';
import { getLogger, createChildLogger } from '../lib/logger.js';
import { toError } from '../lib/errors.js';

export interface CreationEvent {
  /** Absolute path of the new entry */
  path: string;

  isDirectory: boolean;
}

export interface CreationHandlers {
  onCreated: (event: CreationEvent) => void;
  onError: (error: Error) => void;
}

export type Unsubscribe = () => Promise<void>;

/**
 * Source of creation notifications for a single directory (non-recursive).
 */
export interface CreationEventSource {
  subscribe(handlers: CreationHandlers): Promise<Unsubscribe>;
}

export interface FileMonitorEvents {
  created: (event: CreationEvent) => void;
  error: (error: Error) => void;
}

export declare interface FileMonitor {
  on<U extends keyof FileMonitorEvents>(
    event: U,
    listener: FileMonitorEvents[U]
  ): this;
  off<U extends keyof FileMonitorEvents>(
    event: U,
    listener: FileMonitorEvents[U]
  ): this;
  emit<U extends keyof FileMonitorEvents>(
    event: U,
    ...args: Parameters<FileMonitorEvents[U]>
  ): boolean;
}

/**
 * chokidar-backed creation notifications for the top level of `watchPath`.
 */
export class FileMonitor extends EventEmitter implements CreationEventSource {
  private watcher: FSWatcher | null = null;
  private config: MonitoringConfig;
  private watchPath: string;
  private logger = getLogger();

  constructor(config: MonitoringConfig) {
    super();
    this.config = config;
    this.watchPath = resolve(config.watchPath);
  }

  /**
   * Start monitoring; resolves once the initial scan is done and events are live.
   */
  start(): Promise<void> {
    if (this.watcher) {
      return Promise.resolve();
    }

    this.logger.info({ watchPath: this.watchPath }, 'Starting file monitor');

    const watcher = watch(this.watchPath, {
      ignored: (path: string) => this.isIgnored(path),
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: this.config.stabilityThreshold,
        pollInterval: this.config.pollInterval,
      },
    });
    this.watcher = watcher;

    watcher
      .on('add', (path) => this.handleCreated(path, false))
      .on('addDir', (path) => this.handleCreated(path, true))
      .on('error', (error) => this.handleError(toError(error)));

    return new Promise((resolve) => {
      watcher.once('ready', () => {
        this.logger.info('File monitor ready');
        resolve();
      });
    });
  }

  /**
   * Stop monitoring
   */
  async stop(): Promise<void> {
    if (!this.watcher) {
      return;
    }

    this.logger.info('Stopping file monitor');
    await this.watcher.close();
    this.watcher = null;
    this.logger.info('File monitor stopped');
  }

  async subscribe(handlers: CreationHandlers): Promise<Unsubscribe> {
    this.on('created', handlers.onCreated);
    this.on('error', handlers.onError);
    await this.start();

    return async () => {
      this.off('created', handlers.onCreated);
      this.off('error', handlers.onError);
      await this.stop();
    };
  }

  private isIgnored(path: string): boolean {
    if (resolve(path) === this.watchPath) {
      return false;
    }
    return this.config.ignoreHidden && basename(path).startsWith('.');
  }

  private handleCreated(path: string, isDirectory: boolean): void {
    const absolutePath = resolve(path);
    if (absolutePath === this.watchPath) {
      return;
    }

    createChildLogger({ filePath: absolutePath }).debug({ isDirectory }, 'Entry created');
    this.emit('created', { path: absolutePath, isDirectory });
  }

  private handleError(error: Error): void {
    this.logger.error({ error }, 'File monitor error');
    // EventEmitter throws on an unhandled 'error'
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
