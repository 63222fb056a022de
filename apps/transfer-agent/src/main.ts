import { parseTransferCommand } from './cli.js';
import { loadTransferAgentConfig } from './config.js';
import { createTransferDatabase } from './db.js';
import { describeError, formatLogEntry, TransferLog, type LogEntry } from './log/transfer-log.js';
import { createHttpTransferGateway } from './runtime/http-transfer-gateway.js';
import { createTransferCoordinator } from './runtime/transfer-coordinator.js';
import { TransferJob } from './runtime/transfer-job.js';
import { createTransferFileStore } from './storage/transfer-files.js';

function writeLogEntry(entry: LogEntry): void {
  const line = formatLogEntry(entry);
  if (entry.level === 'warn' || entry.level === 'error') {
    console.error(line);
    return;
  }
  console.log(line);
}

async function bootstrap(): Promise<void> {
  const config = loadTransferAgentConfig();
  const command = parseTransferCommand(process.argv.slice(2));

  const log = new TransferLog(config.log);
  log.on('entry', writeLogEntry);

  const files = createTransferFileStore(config.transfersRootPath, log);
  files.ensureStagingRoot();

  const database = createTransferDatabase(config.sqlitePath, files.behaviors);
  database.initialize();

  const gateway = createHttpTransferGateway(
    { rootPath: files.rootPath, ...config.gateway },
    {
      log,
      onError: (error) => {
        log.error('gateway', `Transfer processing failed: ${error.message}`, { details: error.stack });
        process.exitCode = 1;
      },
    },
  );

  const coordinator = createTransferCoordinator({
    gateway,
    repository: database,
    config: {
      maxActiveTransfers: config.maxActiveTransfers,
      transferPreferences: config.transferPreferences,
    },
    log,
  });

  if (command) {
    const job = new TransferJob(command, files.behaviors);
    job.onStatusChanged((previous, next) => {
      log.info('agent', `${previous} -> ${next}`, { transferId: job.id });
    });
    database.insert(job);
    database.commit();
    coordinator.enqueue(job);
  }

  let closed = false;
  const close = (): void => {
    if (closed) {
      return;
    }
    closed = true;
    database.close();
  };

  // In-flight rows stay as they are and are requeued on the next start.
  process.once('SIGINT', () => {
    log.info('agent', 'Shutting down');
    gateway.close();
    coordinator
      .drain()
      .then(close)
      .catch((error: unknown) => {
        log.error('agent', `Shutdown failed: ${describeError(error)}`);
        process.exitCode = 1;
      });
  });

  process.once('beforeExit', close);
}

bootstrap().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
