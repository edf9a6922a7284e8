import { readdir, readFile, rename, stat } from 'node:fs/promises';
import { join, extname } from 'node:path';
import type { ExportFile, ExportSourcePort } from '../../ports/ExportSourcePort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { ExportSourceError } from '../../utils/errors.js';

export class LocalExportSource implements ExportSourcePort {
  private readonly logger = createLogger({ adapter: 'LocalExportSource' });
  private readonly exportFolder: string;
  private readonly validExtensions: Set<string>;
  private readonly processedSuffix: string;

  constructor(config: Pick<Config, 'exportFolder' | 'validExtensions' | 'processedSuffix'>) {
    this.exportFolder = config.exportFolder;
    this.validExtensions = new Set(config.validExtensions.map((ext) => ext.toLowerCase()));
    this.processedSuffix = config.processedSuffix;
  }

  async listPending(): Promise<ExportFile[]> {
    const logger = this.logger.child({ method: 'listPending', folder: this.exportFolder });

    try {
      const entries = await readdir(this.exportFolder, { withFileTypes: true });
      const files: ExportFile[] = [];

      for (const entry of entries) {
        if (!entry.isFile() || !this.isPendingExport(entry.name)) {
          continue;
        }
        const path = join(this.exportFolder, entry.name);
        const fileStat = await stat(path);
        files.push({ name: entry.name, path, modifiedAt: fileStat.mtime });
      }

      files.sort((a, b) => a.name.localeCompare(b.name));
      logger.debug({ count: files.length }, 'Listed pending exports');
      return files;
    } catch (error) {
      logger.error({ error }, 'Failed to list exports');
      throw new ExportSourceError(`Failed to list exports in ${this.exportFolder}`, { cause: error });
    }
  }

  async read(file: ExportFile): Promise<string> {
    try {
      return await readFile(file.path, 'utf8');
    } catch (error) {
      throw new ExportSourceError(`Failed to read export ${file.name}`, { cause: error });
    }
  }

  async markProcessed(file: ExportFile): Promise<void> {
    const logger = this.logger.child({ method: 'markProcessed', file: file.name });
    const target = `${file.path}${this.processedSuffix}`;

    try {
      await rename(file.path, target);
      logger.debug({ target }, 'Marked export as processed');
    } catch (error) {
      logger.error({ error }, 'Failed to mark export as processed');
      throw new ExportSourceError(`Failed to mark export ${file.name} as processed`, { cause: error });
    }
  }

  isPendingExport(name: string): boolean {
    if (name.startsWith('.') || name.endsWith(this.processedSuffix)) {
      return false;
    }
    return this.validExtensions.has(extname(name).toLowerCase());
  }
}
