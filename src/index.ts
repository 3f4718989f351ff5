import { getConfig } from './config/config.js';
import { loadCategoryRules } from './config/categories.js';
import { initLogger, getLogger } from './lib/logger.js';
import { OperationLog } from './services/OperationLog.js';
import { createClassificationModel } from './services/Classifier.js';
import { Organizer } from './services/Organizer.js';
import { FileMonitor } from './services/FileMonitor.js';
import { WatchTask } from './services/WatchTask.js';

const shutdownController = new AbortController();

async function main(): Promise<void> {
  const config = getConfig();

  initLogger(config.logging);
  const logger = getLogger();

  logger.info('tidyfs starting...');
  logger.info({ config: {
    sourceDir: config.organizer.sourceDir,
    targetDir: config.organizer.targetDir,
    collisionPolicy: config.organizer.collisionPolicy,
    operationLog: config.storage.operationLogPath,
    watch: config.organizer.watch,
  }}, 'Configuration loaded');

  // Everything that can fail at setup is resolved before any file moves
  const rules = await loadCategoryRules(config.organizer.categoryRulesPath);
  const model = createClassificationModel({ kind: 'rules', rules });
  const operationLog = await OperationLog.open(config.storage.operationLogPath);

  try {
    const organizer = new Organizer(model, operationLog, {
      collisionPolicy: config.organizer.collisionPolicy,
    });

    const initial = await organizer.organize(config.organizer.sourceDir, config.organizer.targetDir);
    logger.info({ moved: initial.moved.length, failed: initial.failed.length }, 'Initial pass complete');

    if (!config.organizer.watch || shutdownController.signal.aborted) {
      return;
    }

    const monitor = new FileMonitor(config.monitoring);
    const task = new WatchTask(monitor, organizer, config.organizer.targetDir);
    const watched = await task.run(shutdownController.signal);

    logger.info({ moved: watched.moved.length, failed: watched.failed.length }, 'Watch session complete');
  } finally {
    await operationLog.close();
    logger.info('Operation log closed');
  }
}

// Graceful shutdown: stop accepting events, let the current move finish
function shutdown(signal: string): void {
  getLogger().info({ signal }, 'Shutting down gracefully...');
  shutdownController.abort();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

main()
  .then(() => {
    getLogger().info('Shutdown complete');
  })
  .catch((error: unknown) => {
    getLogger().fatal({ error }, 'tidyfs stopped with an error');
    process.exitCode = 1;
  });
