export const REFRESH_INTERVAL_MS = 30_000;
export const RECENT_LIMIT = 5;
export const NOTE_MAX_LENGTH = 2000;
export const SHEET_HEADER = ['Timestamp', 'Mood', 'Note'] as const;
export const DEFAULT_SHEET_NAME = 'Mood Tracker';
