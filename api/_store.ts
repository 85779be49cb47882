import type { MoodEntry } from '../src/lib/types';
import { formatTimestamp } from '../src/lib/utils';
import { ReadError } from './_errors';
import { appendRow, readAllRows, type SheetRecord, type SpreadsheetHandle, type SpreadsheetService } from './_sheets';

export interface MoodStore {
  readonly handle: SpreadsheetHandle;
  log(mood: string, note?: string): Promise<MoodEntry>;
  loadAll(): Promise<{ entries: MoodEntry[]; spreadsheetId: string }>;
}

const TS_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/** Canonical `YYYY-MM-DD HH:MM:SS`, or null when `raw` is not a real calendar date-time. */
export function normalizeTimestamp(raw: string): string | null {
  const m = TS_RE.exec(raw.trim());
  if (!m) return null;
  const [, y, mo, d, h = '00', mi = '00', s = '00'] = m;
  const probe = new Date(Number(y), Number(mo) - 1, Number(d));
  if (probe.getMonth() !== Number(mo) - 1 || probe.getDate() !== Number(d)) return null;
  if (Number(h) > 23 || Number(mi) > 59 || Number(s) > 59) return null;
  return `${y}-${mo}-${d} ${h}:${mi}:${s}`;
}

function toEntry(record: SheetRecord, rowNumber: number): MoodEntry {
  const rawTs = record.Timestamp;
  const mood = record.Mood;
  if (rawTs === undefined || mood === undefined) {
    throw new ReadError('parse-failed', 'Error reading mood data: sheet is missing the Timestamp or Mood column');
  }
  const timestamp = normalizeTimestamp(rawTs);
  if (!timestamp) {
    throw new ReadError('parse-failed', `Error reading mood data: row ${rowNumber} has an unreadable timestamp "${rawTs}"`);
  }
  return { timestamp, date: timestamp.slice(0, 10), mood, note: record.Note ?? '' };
}

export function createMoodStore(
  service: SpreadsheetService,
  handle: SpreadsheetHandle,
  now: () => Date = () => new Date(),
): MoodStore {
  return {
    handle,
    async log(mood, note = '') {
      const timestamp = formatTimestamp(now());
      await appendRow(service, handle, [timestamp, mood, note]);
      return { timestamp, date: timestamp.slice(0, 10), mood, note };
    },
    async loadAll() {
      const records = await readAllRows(service, handle);
      // +2: header occupies row 1
      const entries = records.map((r, i) => toEntry(r, i + 2));
      return { entries, spreadsheetId: handle.spreadsheetId };
    },
  };
}
