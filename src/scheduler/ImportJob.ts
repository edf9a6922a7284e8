import type { ImportService, ImportSummary } from '../core/import/ImportService.js';
import { createLogger } from '../utils/logger.js';

export class ImportJob {
  private readonly logger = createLogger({ job: 'ImportJob' });
  private running = false;

  constructor(private readonly importService: ImportService) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Resolves to null when a previous run is still in progress. */
  async run(): Promise<ImportSummary | null> {
    const logger = this.logger.child({ method: 'run' });
    if (this.running) {
      logger.warn('Previous import still running; skipping');
      return null;
    }

    this.running = true;
    try {
      return await this.importService.run();
    } catch (error) {
      logger.error({ error }, 'Import run failed');
      throw error;
    } finally {
      this.running = false;
    }
  }
}
