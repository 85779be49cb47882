import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createMoodStore, normalizeTimestamp } from '../api/_store';
import { openOrCreate } from '../api/_sheets';
import { ReadError } from '../api/_errors';
import { InMemorySpreadsheetService } from './support/memorySheets';

function clock(...stamps: Date[]) {
  let i = 0;
  return () => stamps[Math.min(i++, stamps.length - 1)];
}

describe('mood store', () => {
  let service: InMemorySpreadsheetService;

  beforeEach(() => {
    service = new InMemorySpreadsheetService();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('loads nothing from a freshly created sheet', async () => {
    const store = createMoodStore(service, await openOrCreate(service, 'Mood Tracker'));
    expect(await store.loadAll()).toEqual({ entries: [], spreadsheetId: 'sheet-1' });
  });

  it('round-trips submissions in order with notes untouched', async () => {
    const now = clock(new Date(2024, 0, 1, 10, 0, 0), new Date(2024, 0, 1, 10, 5, 0), new Date(2024, 0, 2, 8, 30, 15));
    const store = createMoodStore(service, await openOrCreate(service, 'Mood Tracker'), now);
    await store.log('happy', 'feeling good');
    await store.log('sad', '');
    await store.log('excited', 'shipped it, finally');
    const { entries } = await store.loadAll();
    expect(entries).toEqual([
      { timestamp: '2024-01-01 10:00:00', date: '2024-01-01', mood: 'happy', note: 'feeling good' },
      { timestamp: '2024-01-01 10:05:00', date: '2024-01-01', mood: 'sad', note: '' },
      { timestamp: '2024-01-02 08:30:15', date: '2024-01-02', mood: 'excited', note: 'shipped it, finally' },
    ]);
  });

  it('stores an empty note as an empty string', async () => {
    const store = createMoodStore(service, await openOrCreate(service, 'Mood Tracker'), () => new Date(2024, 5, 1, 9, 0, 0));
    const entry = await store.log('neutral');
    expect(entry.note).toBe('');
    expect(service.books.get('sheet-1')?.worksheets[0].rows[1]).toEqual(['2024-06-01 09:00:00', 'neutral', '']);
  });

  it('accepts any tag without checking the catalog', async () => {
    const store = createMoodStore(service, await openOrCreate(service, 'Mood Tracker'), () => new Date(2024, 5, 1, 9, 0, 0));
    await store.log('grumpy', 'not in the list');
    expect((await store.loadAll()).entries[0].mood).toBe('grumpy');
  });

  it('normalizes hand-entered timestamps', async () => {
    const id = service.seed('Mood Tracker', [
      ['Timestamp', 'Mood', 'Note'],
      ['2024-03-04T07:08', 'sad'],
      ['2024-03-05', 'happy', 'all day'],
    ]);
    const store = createMoodStore(service, { spreadsheetId: id, worksheetTitle: 'Sheet1', url: '', created: false });
    expect((await store.loadAll()).entries).toEqual([
      { timestamp: '2024-03-04 07:08:00', date: '2024-03-04', mood: 'sad', note: '' },
      { timestamp: '2024-03-05 00:00:00', date: '2024-03-05', mood: 'happy', note: 'all day' },
    ]);
  });

  it('fails the read when a timestamp cannot be parsed', async () => {
    const id = service.seed('Mood Tracker', [['Timestamp', 'Mood', 'Note'], ['yesterday', 'sad', '']]);
    const store = createMoodStore(service, { spreadsheetId: id, worksheetTitle: 'Sheet1', url: '', created: false });
    await expect(store.loadAll()).rejects.toBeInstanceOf(ReadError);
    await expect(store.loadAll()).rejects.toMatchObject({
      code: 'parse-failed',
      message: 'Error reading mood data: row 2 has an unreadable timestamp "yesterday"',
    });
  });

  it('fails the read when the header is missing', async () => {
    const id = service.seed('Mood Tracker', [['2024-01-01 10:00:00', 'happy', ''], ['2024-01-01 11:00:00', 'sad', '']]);
    const store = createMoodStore(service, { spreadsheetId: id, worksheetTitle: 'Sheet1', url: '', created: false });
    await expect(store.loadAll()).rejects.toThrow('sheet is missing the Timestamp or Mood column');
  });
});

describe('normalizeTimestamp', () => {
  it('accepts the stored format and close variants', () => {
    expect(normalizeTimestamp('2024-01-01 10:00:00')).toBe('2024-01-01 10:00:00');
    expect(normalizeTimestamp(' 2024-01-01 10:00 ')).toBe('2024-01-01 10:00:00');
    expect(normalizeTimestamp('2024-02-29T23:59:59')).toBe('2024-02-29 23:59:59');
  });

  it('rejects impossible dates and times', () => {
    expect(normalizeTimestamp('2023-02-29 10:00:00')).toBeNull();
    expect(normalizeTimestamp('2024-01-01 24:00:00')).toBeNull();
    expect(normalizeTimestamp('01/02/2024')).toBeNull();
    expect(normalizeTimestamp('')).toBeNull();
  });
});
