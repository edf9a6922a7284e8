#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { loadConfig, type Config } from './config/index.js';
import { configureLogging, createLogger } from './utils/logger.js';
import type { NoteSession } from './ports/NotesPort.js';
import { McpNotesAdapter } from './adapters/obsidian/McpNotesAdapter.js';
import { VaultNotesAdapter } from './adapters/obsidian/VaultNotesAdapter.js';
import { LocalExportSource } from './adapters/exports/LocalExportSource.js';
import { DailyNoteService } from './core/daily/DailyNoteService.js';
import { loadDailyNoteTemplate } from './core/daily/template.js';
import { ImportService } from './core/import/ImportService.js';
import { createTimestampResolver } from './core/import/timestampResolver.js';
import { ImportJob } from './scheduler/ImportJob.js';
import { scheduleImport } from './scheduler/index.js';

function createNoteSession(config: Config): NoteSession {
  return config.notesBackend === 'vault' ? new VaultNotesAdapter(config) : new McpNotesAdapter(config);
}

async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    createLogger({ component: 'index' }).fatal({ error }, 'Invalid configuration');
    process.exit(1);
  }
  configureLogging(config.logLevel);
  const logger = createLogger({ component: 'index' });
  logger.info({ backend: config.notesBackend, exportFolder: config.exportFolder }, 'Starting daily note import');

  const notes = createNoteSession(config);
  try {
    await notes.connect();
  } catch (error) {
    logger.fatal({ error }, 'Could not open note service session');
    process.exit(1);
  }

  try {
    const template = await loadDailyNoteTemplate(notes, config.templatePath);
    const dailyNotes = new DailyNoteService(notes, {
      dailyNotesFolder: config.dailyNotesFolder,
      sectionHeading: config.noteSectionHeading,
      template,
    });
    const importService = new ImportService(
      new LocalExportSource(config),
      dailyNotes,
      createTimestampResolver(config.noteDateSource, config.timezone),
      { dryRun: config.dryRun }
    );
    const job = new ImportJob(importService);

    if (!config.importSchedule) {
      const summary = await job.run();
      await notes.close();
      process.exitCode = summary && summary.failed > 0 ? 2 : 0;
      return;
    }

    const task = scheduleImport(job, config.importSchedule, config.timezone);
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      task.stop();
      notes.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, 'Failed to close note service session');
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.fatal({ error }, 'Import aborted');
    await notes.close().catch((closeError: unknown) => {
      logger.error({ error: closeError }, 'Failed to close note service session');
    });
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
