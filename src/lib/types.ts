export interface MoodEntry {
  timestamp: string; // YYYY-MM-DD HH:MM:SS (local wall clock)
  date: string;      // YYYY-MM-DD
  mood: string;      // catalog tag, e.g. "happy"
  note: string;      // may be empty, never missing
}

export interface MoodOption {
  label: string;     // "😊 Happy"
  emoji: string;
  word: string;
  tag: string;
}

export interface MoodSnapshot {
  entries: MoodEntry[];
  spreadsheetId: string | null;
  spreadsheetUrl: string | null;
  created: boolean;
}

export interface DateBounds {
  min: string;
  max: string;
}

export interface ChartRow {
  mood: string;
  label: string;
  count: number;
}
