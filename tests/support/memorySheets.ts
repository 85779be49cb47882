import type { SpreadsheetService } from '../../api/_sheets';

interface Book {
  name: string;
  sharedWith: Array<'writer'>;
  worksheets: { title: string; rows: string[][] }[];
}

type Op = keyof SpreadsheetService;

// Drops trailing empty cells the way the Sheets values API does.
function trimRow(row: string[]): string[] {
  let end = row.length;
  while (end > 0 && row[end - 1] === '') end--;
  return row.slice(0, end);
}

export class InMemorySpreadsheetService implements SpreadsheetService {
  readonly books = new Map<string, Book>();
  readonly calls: Op[] = [];
  readonly failures = new Map<Op, Error>();
  private seq = 0;

  private enter(op: Op) {
    this.calls.push(op);
    const err = this.failures.get(op);
    if (err) throw err;
  }

  private book(id: string): Book {
    const b = this.books.get(id);
    if (!b) throw new Error(`no spreadsheet ${id}`);
    return b;
  }

  private worksheet(id: string, title: string) {
    const ws = this.book(id).worksheets.find((w) => w.title === title);
    if (!ws) throw new Error(`no worksheet ${title}`);
    return ws;
  }

  seed(name: string, rows: string[][]): string {
    const id = `sheet-${++this.seq}`;
    this.books.set(id, { name, sharedWith: [], worksheets: [{ title: 'Sheet1', rows: rows.map((r) => [...r]) }] });
    return id;
  }

  async findByName(name: string): Promise<string | null> {
    this.enter('findByName');
    for (const [id, b] of this.books) if (b.name === name) return id;
    return null;
  }

  async firstWorksheetTitle(spreadsheetId: string): Promise<string> {
    this.enter('firstWorksheetTitle');
    return this.book(spreadsheetId).worksheets[0].title;
  }

  async create(name: string): Promise<{ spreadsheetId: string; worksheetTitle: string }> {
    this.enter('create');
    return { spreadsheetId: this.seed(name, []), worksheetTitle: 'Sheet1' };
  }

  async shareWithAnyoneAsWriter(spreadsheetId: string): Promise<void> {
    this.enter('shareWithAnyoneAsWriter');
    this.book(spreadsheetId).sharedWith.push('writer');
  }

  async appendValues(spreadsheetId: string, worksheetTitle: string, rows: string[][]): Promise<void> {
    this.enter('appendValues');
    this.worksheet(spreadsheetId, worksheetTitle).rows.push(...rows.map((r) => [...r]));
  }

  async readValues(spreadsheetId: string, worksheetTitle: string): Promise<string[][]> {
    this.enter('readValues');
    return this.worksheet(spreadsheetId, worksheetTitle).rows.map(trimRow);
  }
}
