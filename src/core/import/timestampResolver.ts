import type { ExportFile } from '../../ports/ExportSourcePort.js';
import type { NoteDateSource } from '../../config/index.js';
import { formatNoteTimestamp, type NoteTimestamp } from '../daily/noteTimestamp.js';

export type TimestampResolver = (file: ExportFile) => NoteTimestamp;

// 20240315, 2024-03-15 or 2024_03_15, optionally followed by 0930, 09:30 or 093015
const FILENAME_DATE_REGEX =
  /(?<!\d)(\d{4})[-_]?(\d{2})[-_]?(\d{2})(?:[T_\s-]?(\d{2})[:.-]?(\d{2})(?:[:.-]?\d{2})?)?(?!\d)/;

export function parseFilenameTimestamp(name: string): NoteTimestamp | null {
  const match = name.match(FILENAME_DATE_REGEX);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute] = match;
  if (!year || !month || !day) {
    return null;
  }
  if (!isValidDate(Number(year), Number(month), Number(day))) {
    return null;
  }

  let time = '00:00';
  if (hour && minute && Number(hour) < 24 && Number(minute) < 60) {
    time = `${hour}:${minute}`;
  }
  return { date: `${year}-${month}-${day}`, time };
}

export function createTimestampResolver(
  source: NoteDateSource,
  timeZone: string,
  now: () => Date = () => new Date()
): TimestampResolver {
  switch (source) {
    case 'now':
      return () => formatNoteTimestamp(now(), timeZone);
    case 'modified':
      return (file) => formatNoteTimestamp(file.modifiedAt, timeZone);
    case 'filename':
      return (file) =>
        parseFilenameTimestamp(file.name) ?? formatNoteTimestamp(file.modifiedAt, timeZone);
  }
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}
