import { mkdir, readFile, appendFile, writeFile, stat } from 'node:fs/promises';
import { dirname, resolve, relative, isAbsolute, sep } from 'node:path';
import type { NoteSession, PatchContentParams } from '../../ports/NotesPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { NotesError } from '../../utils/errors.js';
import { patchMarkdownSection } from './markdownSection.js';

/** Note service backed by direct access to the vault folder on disk. */
export class VaultNotesAdapter implements NoteSession {
  private readonly logger = createLogger({ adapter: 'VaultNotesAdapter' });
  private readonly vaultPath: string;

  constructor(config: Pick<Config, 'obsidianVaultPath'>) {
    if (!config.obsidianVaultPath) {
      throw new NotesError('OBSIDIAN_VAULT_PATH is not configured');
    }
    this.vaultPath = resolve(config.obsidianVaultPath);
  }

  async connect(): Promise<void> {
    const logger = this.logger.child({ method: 'connect' });
    try {
      const vaultStat = await stat(this.vaultPath);
      if (!vaultStat.isDirectory()) {
        throw new NotesError(`Vault path is not a directory: ${this.vaultPath}`);
      }
    } catch (error) {
      if (error instanceof NotesError) {
        throw error;
      }
      throw new NotesError(`Vault not accessible: ${this.vaultPath}`, { cause: error });
    }
    logger.info({ vaultPath: this.vaultPath }, 'Using vault on disk');
  }

  async close(): Promise<void> {
    // Nothing held open
  }

  async getFileContents(notePath: string): Promise<string | null> {
    const logger = this.logger.child({ method: 'getFileContents', path: notePath });
    try {
      return await readFile(this.resolveNotePath(notePath), 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.debug('Note not found');
        return null;
      }
      logger.error({ error }, 'Failed to read note');
      throw new NotesError(`Failed to read note: ${notePath}`, { cause: error });
    }
  }

  async appendContent(notePath: string, content: string): Promise<void> {
    const logger = this.logger.child({ method: 'appendContent', path: notePath });
    const fullPath = this.resolveNotePath(notePath);

    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await appendFile(fullPath, content, 'utf8');
      logger.debug({ contentLength: content.length }, 'Appended to note');
    } catch (error) {
      logger.error({ error }, 'Failed to append to note');
      throw new NotesError(`Failed to append to note: ${notePath}`, { cause: error });
    }
  }

  async patchContent(params: PatchContentParams): Promise<void> {
    const logger = this.logger.child({ method: 'patchContent', path: params.path, target: params.target });
    if (params.targetType !== 'heading') {
      throw new NotesError(`Patching by ${params.targetType} is not supported for vault notes`);
    }

    const existing = await this.getFileContents(params.path);
    if (existing === null) {
      throw new NotesError(`Note not found: ${params.path}`);
    }

    const patched = patchMarkdownSection(existing, params.target, params.operation, params.content);
    if (patched === null) {
      throw new NotesError(`Heading "${params.target}" not found in ${params.path}`);
    }

    try {
      await writeFile(this.resolveNotePath(params.path), patched, 'utf8');
      logger.debug({ operation: params.operation }, 'Patched note');
    } catch (error) {
      logger.error({ error }, 'Failed to patch note');
      throw new NotesError(`Failed to patch note: ${params.path}`, { cause: error });
    }
  }

  private resolveNotePath(notePath: string): string {
    const fullPath = resolve(this.vaultPath, notePath);
    const relativePath = relative(this.vaultPath, fullPath);
    if (relativePath === '..' || relativePath.startsWith(`..${sep}`) || isAbsolute(relativePath)) {
      throw new NotesError(`Note path escapes the vault: ${notePath}`);
    }
    return fullPath;
  }
}
