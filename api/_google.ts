import { google, type drive_v3, type sheets_v4 } from 'googleapis';
import type { ServiceAccountCredential } from './_config';
import type { SpreadsheetService } from './_sheets';
import { AuthError, errorMessage } from './_errors';

export const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

const SPREADSHEET_MIME = 'application/vnd.google-apps.spreadsheet';

function quoteQuery(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function a1Sheet(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function cellText(cell: unknown): string {
  if (cell == null) return '';
  return typeof cell === 'string' ? cell : String(cell);
}

export class GoogleSpreadsheetService implements SpreadsheetService {
  constructor(private readonly sheets: sheets_v4.Sheets, private readonly drive: drive_v3.Drive) {}

  async findByName(name: string): Promise<string | null> {
    const res = await this.drive.files.list({
      q: `name = ${quoteQuery(name)} and mimeType = '${SPREADSHEET_MIME}' and trashed = false`,
      fields: 'files(id, name)',
      pageSize: 10,
    });
    const match = (res.data.files ?? []).find((f) => f.name === name && f.id);
    return match?.id ?? null;
  }

  async firstWorksheetTitle(spreadsheetId: string): Promise<string> {
    const res = await this.sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' });
    const title = res.data.sheets?.[0]?.properties?.title;
    if (!title) throw new Error(`spreadsheet ${spreadsheetId} has no worksheets`);
    return title;
  }

  async create(name: string): Promise<{ spreadsheetId: string; worksheetTitle: string }> {
    const res = await this.sheets.spreadsheets.create({
      requestBody: { properties: { title: name } },
      fields: 'spreadsheetId,sheets.properties.title',
    });
    const spreadsheetId = res.data.spreadsheetId;
    const worksheetTitle = res.data.sheets?.[0]?.properties?.title;
    if (!spreadsheetId || !worksheetTitle) throw new Error('create returned no spreadsheet id');
    return { spreadsheetId, worksheetTitle };
  }

  async shareWithAnyoneAsWriter(spreadsheetId: string): Promise<void> {
    await this.drive.permissions.create({ fileId: spreadsheetId, requestBody: { type: 'anyone', role: 'writer' } });
  }

  async appendValues(spreadsheetId: string, worksheetTitle: string, rows: string[][]): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId,
      range: a1Sheet(worksheetTitle),
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: rows },
    });
  }

  async readValues(spreadsheetId: string, worksheetTitle: string): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range: a1Sheet(worksheetTitle),
      valueRenderOption: 'FORMATTED_VALUE',
    });
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map((row) => row.map(cellText));
  }
}

/** Builds a session scoped to spreadsheet read/write and Drive file management. */
export async function authenticate(credential: ServiceAccountCredential): Promise<SpreadsheetService> {
  const auth = new google.auth.JWT({
    email: credential.client_email,
    key: credential.private_key,
    keyId: credential.private_key_id,
    scopes: SCOPES,
  });
  try {
    await auth.authorize();
  } catch (e) {
    throw new AuthError(`Failed to authenticate with Google: ${errorMessage(e)}`, e);
  }
  return new GoogleSpreadsheetService(
    google.sheets({ version: 'v4', auth }),
    google.drive({ version: 'v3', auth }),
  );
}
