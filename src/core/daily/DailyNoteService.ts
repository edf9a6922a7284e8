import type { NoteServicePort } from '../../ports/NotesPort.js';
import type { NoteTimestamp } from './noteTimestamp.js';
import { renderTemplate } from './template.js';
import { createLogger } from '../../utils/logger.js';

export interface DailyNoteOptions {
  dailyNotesFolder: string;
  sectionHeading: string;
  template: string;
}

export interface EnsuredDailyNote {
  path: string;
  created: boolean;
}

export class DailyNoteService {
  private readonly logger = createLogger({ service: 'DailyNoteService' });

  constructor(
    private readonly notes: NoteServicePort,
    private readonly options: DailyNoteOptions
  ) {}

  notePathFor(timestamp: NoteTimestamp): string {
    return `${this.options.dailyNotesFolder}/${timestamp.date}.md`;
  }

  /** Creates the daily note from the template when it does not exist yet. */
  async ensureDailyNote(timestamp: NoteTimestamp): Promise<EnsuredDailyNote> {
    const logger = this.logger.child({ method: 'ensureDailyNote', date: timestamp.date });
    const path = this.notePathFor(timestamp);

    const existing = await this.notes.getFileContents(path);
    if (existing !== null) {
      return { path, created: false };
    }

    await this.notes.appendContent(path, renderTemplate(this.options.template, timestamp));
    logger.info({ path }, 'Created daily note from template');
    return { path, created: true };
  }

  async appendToSection(path: string, content: string): Promise<void> {
    await this.notes.patchContent({
      path,
      targetType: 'heading',
      target: this.options.sectionHeading,
      operation: 'append',
      content: `\n${content}\n`,
    });
    this.logger.debug(
      { method: 'appendToSection', path, heading: this.options.sectionHeading, contentLength: content.length },
      'Appended to daily note section'
    );
  }
}
