import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ImportService } from '../../core/import/ImportService.js';
import { DailyNoteService } from '../../core/daily/DailyNoteService.js';
import type { ExportFile, ExportSourcePort } from '../../ports/ExportSourcePort.js';
import type { NoteServicePort } from '../../ports/NotesPort.js';
import type { TimestampResolver } from '../../core/import/timestampResolver.js';

describe('ImportService', () => {
  const first: ExportFile = { name: 'a.txt', path: '/exports/a.txt', modifiedAt: new Date('2024-03-15T08:00:00Z') };
  const second: ExportFile = { name: 'b.txt', path: '/exports/b.txt', modifiedAt: new Date('2024-03-15T09:00:00Z') };
  const resolveTimestamp: TimestampResolver = () => ({ date: '2024-03-15', time: '09:30' });
  let exportSource: ExportSourcePort;
  let notes: NoteServicePort;
  let dailyNotes: DailyNoteService;

  beforeEach(() => {
    exportSource = {
      listPending: vi.fn().mockResolvedValue([first]),
      read: vi.fn().mockResolvedValue('Met Sarah today.'),
      markProcessed: vi.fn().mockResolvedValue(undefined),
    };
    notes = {
      getFileContents: vi.fn().mockResolvedValue(null),
      appendContent: vi.fn().mockResolvedValue(undefined),
      patchContent: vi.fn().mockResolvedValue(undefined),
    };
    dailyNotes = new DailyNoteService(notes, {
      dailyNotesFolder: 'Daily Notes',
      sectionHeading: 'Notes',
      template: '# {{date}}\n\n## Notes\n',
    });
  });

  it('imports an export into its daily note and marks it processed', async () => {
    const service = new ImportService(exportSource, dailyNotes, resolveTimestamp);

    const summary = await service.run();

    expect(notes.appendContent).toHaveBeenCalledWith('Daily Notes/2024-03-15.md', '# 2024-03-15\n\n## Notes\n');
    expect(notes.patchContent).toHaveBeenCalledWith({
      path: 'Daily Notes/2024-03-15.md',
      targetType: 'heading',
      target: 'Notes',
      operation: 'append',
      content: '\n[[Met]] [[Sarah]] today.\n',
    });
    expect(exportSource.markProcessed).toHaveBeenCalledWith(first);
    expect(summary).toEqual({
      processed: 1,
      failed: 0,
      skipped: 0,
      results: [{ file: 'a.txt', status: 'imported', notePath: 'Daily Notes/2024-03-15.md' }],
    });
  });

  it('continues with the next file when one fails', async () => {
    exportSource.listPending = vi.fn().mockResolvedValue([first, second]);
    exportSource.read = vi
      .fn()
      .mockRejectedValueOnce(new Error('disk gone'))
      .mockResolvedValueOnce('Lunch with Tom.');
    const service = new ImportService(exportSource, dailyNotes, resolveTimestamp);

    const summary = await service.run();

    expect(summary.processed).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.results[0]).toEqual({ file: 'a.txt', status: 'failed', error: 'disk gone' });
    expect(exportSource.markProcessed).toHaveBeenCalledTimes(1);
    expect(exportSource.markProcessed).toHaveBeenCalledWith(second);
  });

  it('leaves the export in place when the note cannot be patched', async () => {
    notes.patchContent = vi.fn().mockRejectedValue(new Error('heading missing'));
    const service = new ImportService(exportSource, dailyNotes, resolveTimestamp);

    const summary = await service.run();

    expect(summary.failed).toBe(1);
    expect(exportSource.markProcessed).not.toHaveBeenCalled();
  });

  it('marks empty exports processed without touching notes', async () => {
    exportSource.read = vi.fn().mockResolvedValue('  \r\n\r\n ');
    const service = new ImportService(exportSource, dailyNotes, resolveTimestamp);

    const summary = await service.run();

    expect(summary.skipped).toBe(1);
    expect(summary.results[0]).toEqual({ file: 'a.txt', status: 'empty' });
    expect(notes.getFileContents).not.toHaveBeenCalled();
    expect(exportSource.markProcessed).toHaveBeenCalledWith(first);
  });

  it('performs no writes in dry-run mode', async () => {
    const service = new ImportService(exportSource, dailyNotes, resolveTimestamp, { dryRun: true });

    const summary = await service.run();

    expect(summary.results[0]).toEqual({ file: 'a.txt', status: 'dry-run', notePath: 'Daily Notes/2024-03-15.md' });
    expect(notes.getFileContents).not.toHaveBeenCalled();
    expect(notes.patchContent).not.toHaveBeenCalled();
    expect(exportSource.markProcessed).not.toHaveBeenCalled();
  });

  it('applies content rule overrides', async () => {
    exportSource.read = vi.fn().mockResolvedValue('Hi Bob. See Alice.');
    const service = new ImportService(exportSource, dailyNotes, resolveTimestamp, {
      contentRules: { preserveLineBreaks: false, minLinkLength: 4 },
    });

    await service.run();

    expect(notes.patchContent).toHaveBeenCalledWith(
      expect.objectContaining({ content: '\nHi Bob. See [[Alice]].\n' })
    );
  });

  it('reports the duplicate risk when marking processed fails after appending', async () => {
    exportSource.markProcessed = vi.fn().mockRejectedValue(new Error('read-only folder'));
    const service = new ImportService(exportSource, dailyNotes, resolveTimestamp);

    const summary = await service.run();

    expect(notes.patchContent).toHaveBeenCalledTimes(1);
    expect(summary.failed).toBe(1);
    expect(summary.results[0]).toEqual({
      file: 'a.txt',
      status: 'failed',
      notePath: 'Daily Notes/2024-03-15.md',
      error:
        'Appended to Daily Notes/2024-03-15.md but not marked processed (next run will append it again): read-only folder',
    });
  });
});
