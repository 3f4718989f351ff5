import { EventChannel } from '../lib/channel.js';
import { ClassificationError, errnoCode, toError } from '../lib/errors.js';
import { createChildLogger, getLogger } from '../lib/logger.js';
import type { CreationEvent, CreationEventSource, Unsubscribe } from './FileMonitor.js';
import type { OrganizeFailure, OrganizeResult, Organizer } from './Organizer.js';

/**
 * Watch mode: files created in the source directory are organized one at a time,
 * in arrival order, until the signal aborts.
 *
 * On abort the subscription is torn down, the relocation in flight finishes and
 * events still queued are dropped. A ClassificationError ends the task and
 * rejects `run()`.
 */
export class WatchTask {
  private source: CreationEventSource;
  private organizer: Organizer;
  private targetDir: string;
  private logger = getLogger();

  constructor(source: CreationEventSource, organizer: Organizer, targetDir: string) {
    this.source = source;
    this.organizer = organizer;
    this.targetDir = targetDir;
  }

  async run(signal: AbortSignal): Promise<OrganizeResult> {
    const result: OrganizeResult = { moved: [], failed: [] };

    if (signal.aborted) {
      return result;
    }

    const channel = new EventChannel<CreationEvent>();
    const onAbort = () => {
      this.logger.info('Stop requested, closing watch');
      channel.close();
    };

    // Listen before subscribing: a stop may arrive while the source is still starting
    signal.addEventListener('abort', onAbort, { once: true });
    let unsubscribe: Unsubscribe | null = null;

    try {
      unsubscribe = await this.source.subscribe({
        onCreated: (event) => {
          if (!channel.push(event)) {
            this.logger.debug({ filePath: event.path }, 'Watch closed, event dropped');
          }
        },
        onError: (error) => {
          this.logger.error({ error }, 'Change notification error');
        },
      });

      this.logger.info({ targetDir: this.targetDir }, 'Watching for new files');

      for await (const event of channel) {
        if (signal.aborted) {
          break;
        }
        await this.handleEvent(event, result);
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      channel.close();
      if (unsubscribe) {
        await unsubscribe();
      }
      this.logger.info({ moved: result.moved.length, failed: result.failed.length }, 'Watch stopped');
    }

    return result;
  }

  private async handleEvent(event: CreationEvent, result: OrganizeResult): Promise<void> {
    const logger = createChildLogger({ filePath: event.path });

    if (event.isDirectory) {
      logger.debug('Directory created, ignoring');
      return;
    }

    logger.info('New file detected');

    try {
      result.moved.push(await this.organizer.organizeFile(event.path, this.targetDir));
    } catch (error) {
      if (error instanceof ClassificationError) {
        logger.error({ error }, 'Classification failed, stopping watch');
        throw error;
      }

      const err = toError(error);
      const failure: OrganizeFailure = { path: event.path, message: err.message };

      if (errnoCode(err.cause) === 'ENOENT') {
        logger.warn('File disappeared before it could be organized');
      } else {
        logger.error({ error: err }, 'Failed to organize new file');
      }
      result.failed.push(failure);
    }
  }
}
