import { AppendError, CreateError, LookupError, ReadError, errorMessage } from './_errors';
import { SHEET_HEADER } from '../src/lib/constants';
import { sheetUrl } from '../src/lib/utils';

export interface SpreadsheetHandle {
  spreadsheetId: string;
  worksheetTitle: string; // first worksheet
  url: string;
  created: boolean;       // provisioned by this process
}

export type SheetRecord = Record<string, string>;

/** The handful of remote calls the mood log needs from a spreadsheet backend. */
export interface SpreadsheetService {
  findByName(name: string): Promise<string | null>;
  firstWorksheetTitle(spreadsheetId: string): Promise<string>;
  create(name: string): Promise<{ spreadsheetId: string; worksheetTitle: string }>;
  shareWithAnyoneAsWriter(spreadsheetId: string): Promise<void>;
  appendValues(spreadsheetId: string, worksheetTitle: string, rows: string[][]): Promise<void>;
  readValues(spreadsheetId: string, worksheetTitle: string): Promise<string[][]>;
}

function toHandle(spreadsheetId: string, worksheetTitle: string, created: boolean): SpreadsheetHandle {
  return { spreadsheetId, worksheetTitle, url: sheetUrl(spreadsheetId), created };
}

/**
 * Resolves the spreadsheet called `name`, provisioning it when absent:
 * create, share with anyone holding the link as writer, write the header row.
 * Two callers racing through the create branch can both create a sheet.
 */
export async function openOrCreate(service: SpreadsheetService, name: string): Promise<SpreadsheetHandle> {
  let existing: string | null;
  try {
    existing = await service.findByName(name);
  } catch (e) {
    throw new LookupError(`Error accessing Google Sheets: ${errorMessage(e)}`, e);
  }
  if (existing) {
    try {
      return toHandle(existing, await service.firstWorksheetTitle(existing), false);
    } catch (e) {
      throw new LookupError(`Error accessing Google Sheets: ${errorMessage(e)}`, e);
    }
  }
  try {
    const { spreadsheetId, worksheetTitle } = await service.create(name);
    await service.shareWithAnyoneAsWriter(spreadsheetId);
    await service.appendValues(spreadsheetId, worksheetTitle, [[...SHEET_HEADER]]);
    console.log('[sheets] created spreadsheet', { name, spreadsheetId });
    return toHandle(spreadsheetId, worksheetTitle, true);
  } catch (e) {
    throw new CreateError(`Failed to create spreadsheet: ${errorMessage(e)}`, e);
  }
}

export async function appendRow(service: SpreadsheetService, handle: SpreadsheetHandle, fields: string[]): Promise<void> {
  try {
    await service.appendValues(handle.spreadsheetId, handle.worksheetTitle, [fields]);
  } catch (e) {
    throw new AppendError(`Failed to log mood: ${errorMessage(e)}`, e);
  }
}

/** Every non-blank row after the header, keyed by header cell, oldest first. */
export async function readAllRows(service: SpreadsheetService, handle: SpreadsheetHandle): Promise<SheetRecord[]> {
  let values: string[][];
  try {
    values = await service.readValues(handle.spreadsheetId, handle.worksheetTitle);
  } catch (e) {
    throw new ReadError('read-failed', `Error reading mood data: ${errorMessage(e)}`, e);
  }
  if (!values.length) return [];
  const [header, ...rows] = values;
  const keys = header.map((h) => h.trim());
  return rows
    .filter((row) => row.some((cell) => cell !== ''))
    .map((row) => Object.fromEntries(keys.map((k, i) => [k, row[i] ?? ''])));
}
