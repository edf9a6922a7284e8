import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { NoteServicePort } from '../../ports/NotesPort.js';
import type { NoteTimestamp } from './noteTimestamp.js';
import { TemplateError } from '../../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const templatesDir = join(__dirname, '../../../templates');

export const BUNDLED_TEMPLATE = 'daily-note.md';

export function renderTemplate(template: string, timestamp: NoteTimestamp): string {
  return template.replaceAll('{{date}}', timestamp.date).replaceAll('{{time}}', timestamp.time);
}

export async function loadBundledTemplate(name: string = BUNDLED_TEMPLATE): Promise<string> {
  const filePath = join(templatesDir, name);
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    throw new TemplateError(`Bundled template not readable: ${name}`, { cause: error });
  }
}

/**
 * Reads the daily note template from the vault, or the bundled one when no
 * vault path is configured.
 */
export async function loadDailyNoteTemplate(
  notes: NoteServicePort,
  templatePath?: string
): Promise<string> {
  if (!templatePath) {
    return loadBundledTemplate();
  }

  const template = await notes.getFileContents(templatePath);
  if (template === null) {
    throw new TemplateError(`Daily note template not found: ${templatePath}`);
  }
  if (template.trim() === '') {
    throw new TemplateError(`Daily note template is empty: ${templatePath}`);
  }
  return template;
}
