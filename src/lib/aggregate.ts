import type { ChartRow, DateBounds, MoodEntry } from './types';
import { moodLabel } from './moods';
import { RECENT_LIMIT } from './constants';

function onDate(entries: MoodEntry[], date: string): MoodEntry[] {
  return entries.filter((e) => e.date === date);
}

// Keys keep first-seen order.
export function tally(entries: MoodEntry[], date: string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const e of onDate(entries, date)) {
    counts[e.mood] = (counts[e.mood] ?? 0) + 1;
  }
  return counts;
}

export function recent(entries: MoodEntry[], date: string, limit = RECENT_LIMIT): MoodEntry[] {
  if (limit <= 0) return [];
  return onDate(entries, date)
    .map((e, i) => ({ e, i }))
    .sort((a, b) => (a.e.timestamp === b.e.timestamp ? a.i - b.i : a.e.timestamp < b.e.timestamp ? 1 : -1))
    .slice(0, limit)
    .map(({ e }) => e);
}

export function dateBounds(entries: MoodEntry[]): DateBounds | null {
  if (!entries.length) return null;
  let min = entries[0].date;
  let max = entries[0].date;
  for (const e of entries) {
    if (e.date < min) min = e.date;
    if (e.date > max) max = e.date;
  }
  return { min, max };
}

export function chartData(counts: Record<string, number>): ChartRow[] {
  return Object.entries(counts)
    .map(([mood, count]) => ({ mood, label: moodLabel(mood), count }))
    .sort((a, b) => b.count - a.count);
}
