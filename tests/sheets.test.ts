import { describe, it, expect, vi, beforeEach } from 'vitest';
import { appendRow, openOrCreate, readAllRows } from '../api/_sheets';
import { AppendError, CreateError, LookupError, ReadError } from '../api/_errors';
import { InMemorySpreadsheetService } from './support/memorySheets';

describe('openOrCreate', () => {
  let service: InMemorySpreadsheetService;

  beforeEach(() => {
    service = new InMemorySpreadsheetService();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('provisions a shared sheet with the header row when none exists', async () => {
    const handle = await openOrCreate(service, 'Mood Tracker');
    expect(handle).toEqual({
      spreadsheetId: 'sheet-1',
      worksheetTitle: 'Sheet1',
      url: 'https://docs.google.com/spreadsheets/d/sheet-1',
      created: true,
    });
    const book = service.books.get('sheet-1');
    expect(book?.worksheets[0].rows).toEqual([['Timestamp', 'Mood', 'Note']]);
    expect(book?.sharedWith).toEqual(['writer']);
    expect(service.calls).toEqual(['findByName', 'create', 'shareWithAnyoneAsWriter', 'appendValues']);
  });

  it('reuses the first sheet with the exact name', async () => {
    service.seed('Mood Tracker (old)', []);
    const id = service.seed('Mood Tracker', [['Timestamp', 'Mood', 'Note']]);
    const handle = await openOrCreate(service, 'Mood Tracker');
    expect(handle.spreadsheetId).toBe(id);
    expect(handle.created).toBe(false);
    expect(service.calls).not.toContain('create');
  });

  it('raises LookupError when the lookup itself fails', async () => {
    service.failures.set('findByName', new Error('quota exceeded'));
    await expect(openOrCreate(service, 'Mood Tracker')).rejects.toBeInstanceOf(LookupError);
    await expect(openOrCreate(service, 'Mood Tracker')).rejects.toMatchObject({
      code: 'lookup-failed',
      message: 'Error accessing Google Sheets: quota exceeded',
    });
  });

  it('raises CreateError when sharing fails', async () => {
    service.failures.set('shareWithAnyoneAsWriter', new Error('forbidden'));
    await expect(openOrCreate(service, 'Mood Tracker')).rejects.toBeInstanceOf(CreateError);
    await expect(openOrCreate(service, 'Other')).rejects.toThrow('Failed to create spreadsheet: forbidden');
  });
});

describe('appendRow / readAllRows', () => {
  it('returns records keyed by header in storage order', async () => {
    const service = new InMemorySpreadsheetService();
    const id = service.seed('Mood Tracker', [['Timestamp', 'Mood', 'Note']]);
    const handle = { spreadsheetId: id, worksheetTitle: 'Sheet1', url: '', created: false };
    await appendRow(service, handle, ['2024-01-01 10:00:00', 'happy', 'feeling good']);
    await appendRow(service, handle, ['2024-01-01 10:05:00', 'sad', '']);
    expect(await readAllRows(service, handle)).toEqual([
      { Timestamp: '2024-01-01 10:00:00', Mood: 'happy', Note: 'feeling good' },
      { Timestamp: '2024-01-01 10:05:00', Mood: 'sad', Note: '' },
    ]);
  });

  it('skips blank rows and yields nothing for a header-only or empty sheet', async () => {
    const service = new InMemorySpreadsheetService();
    const headerOnly = service.seed('a', [['Timestamp', 'Mood', 'Note']]);
    const empty = service.seed('b', []);
    const gappy = service.seed('c', [['Timestamp', 'Mood', 'Note'], ['', '', ''], ['2024-01-02 09:00:00', 'neutral', 'x']]);
    const h = (spreadsheetId: string) => ({ spreadsheetId, worksheetTitle: 'Sheet1', url: '', created: false });
    expect(await readAllRows(service, h(headerOnly))).toEqual([]);
    expect(await readAllRows(service, h(empty))).toEqual([]);
    expect(await readAllRows(service, h(gappy))).toEqual([{ Timestamp: '2024-01-02 09:00:00', Mood: 'neutral', Note: 'x' }]);
  });

  it('wraps remote failures', async () => {
    const service = new InMemorySpreadsheetService();
    const handle = { spreadsheetId: service.seed('a', []), worksheetTitle: 'Sheet1', url: '', created: false };
    service.failures.set('appendValues', new Error('boom'));
    service.failures.set('readValues', new Error('timeout'));
    await expect(appendRow(service, handle, ['x'])).rejects.toBeInstanceOf(AppendError);
    await expect(readAllRows(service, handle)).rejects.toBeInstanceOf(ReadError);
    await expect(readAllRows(service, handle)).rejects.toMatchObject({ code: 'read-failed' });
  });
});
