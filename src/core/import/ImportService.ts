import type { ExportFile, ExportSourcePort } from '../../ports/ExportSourcePort.js';
import type { DailyNoteService } from '../daily/DailyNoteService.js';
import type { ContentRules } from '../content/contentRules.js';
import type { TimestampResolver } from './timestampResolver.js';
import { processExportContent } from '../content/exportTextProcessor.js';
import { createLogger } from '../../utils/logger.js';

export type ImportStatus = 'imported' | 'empty' | 'failed' | 'dry-run';

export interface ImportResult {
  file: string;
  status: ImportStatus;
  notePath?: string;
  error?: string;
}

export interface ImportSummary {
  processed: number;
  failed: number;
  skipped: number;
  results: ImportResult[];
}

export interface ImportServiceOptions {
  dryRun?: boolean;
  contentRules?: Partial<ContentRules>;
}

export class ImportService {
  private readonly logger = createLogger({ service: 'ImportService' });

  constructor(
    private readonly exports: ExportSourcePort,
    private readonly dailyNotes: DailyNoteService,
    private readonly resolveTimestamp: TimestampResolver,
    private readonly options: ImportServiceOptions = {}
  ) {}

  /** Imports every pending export, one file at a time. */
  async run(): Promise<ImportSummary> {
    const logger = this.logger.child({ method: 'run' });
    const files = await this.exports.listPending();
    logger.info({ pending: files.length, dryRun: this.options.dryRun ?? false }, 'Starting import');

    const results: ImportResult[] = [];
    for (const file of files) {
      results.push(await this.importFile(file));
    }

    const summary: ImportSummary = {
      processed: results.filter((result) => result.status === 'imported').length,
      failed: results.filter((result) => result.status === 'failed').length,
      skipped: results.filter((result) => result.status === 'empty' || result.status === 'dry-run').length,
      results,
    };
    logger.info(
      { processed: summary.processed, failed: summary.failed, skipped: summary.skipped },
      'Import finished'
    );
    return summary;
  }

  /** Failures are logged and reported in the result; the export is left in place. */
  async importFile(file: ExportFile): Promise<ImportResult> {
    const logger = this.logger.child({ method: 'importFile', file: file.name });

    try {
      const raw = await this.exports.read(file);
      const content = processExportContent(raw, this.options.contentRules);

      if (!content) {
        if (!this.options.dryRun) {
          await this.exports.markProcessed(file);
        }
        logger.info('Export has no text; skipping');
        return { file: file.name, status: 'empty' };
      }

      const timestamp = this.resolveTimestamp(file);
      const notePath = this.dailyNotes.notePathFor(timestamp);

      if (this.options.dryRun) {
        logger.info({ notePath, content }, 'Dry run; daily note left untouched');
        return { file: file.name, status: 'dry-run', notePath };
      }

      await this.dailyNotes.ensureDailyNote(timestamp);
      await this.dailyNotes.appendToSection(notePath, content);

      try {
        await this.exports.markProcessed(file);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(
          { error, notePath },
          'Export appended to daily note but not marked processed; the next run will append it again'
        );
        return {
          file: file.name,
          status: 'failed',
          notePath,
          error: `Appended to ${notePath} but not marked processed (next run will append it again): ${reason}`,
        };
      }

      logger.info({ notePath, contentLength: content.length }, 'Imported export');
      return { file: file.name, status: 'imported', notePath };
    } catch (error) {
      logger.error({ error }, 'Failed to import export');
      return {
        file: file.name,
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
