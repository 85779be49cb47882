const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function isoDate(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

export function todayISO(): string {
  return isoDate(new Date());
}

// Local wall-clock stamp, the format rows are stored in.
export function formatTimestamp(d: Date): string {
  return `${isoDate(d)} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

export function formatClock(d: Date): string {
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

// "2024-01-05" -> "January 05, 2024"
export function formatLongDate(iso: string): string {
  const [y, m, d] = iso.split('-');
  const month = MONTHS[parseInt(m, 10) - 1];
  if (!y || !month || !d) return iso;
  return `${month} ${d}, ${y}`;
}

// "2024-01-05 10:07:33" -> "10:07"
export function timeOfDay(timestamp: string): string {
  return timestamp.slice(11, 16);
}

export function sheetUrl(spreadsheetId: string): string {
  return `https://docs.google.com/spreadsheets/d/${spreadsheetId}`;
}
