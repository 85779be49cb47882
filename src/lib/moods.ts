import type { MoodOption } from './types';

function option(emoji: string, word: string): MoodOption {
  return { label: `${emoji} ${word}`, emoji, word, tag: word.toLowerCase() };
}

export const MOOD_CATALOG: readonly MoodOption[] = Object.freeze([
  option('😊', 'Happy'),
  option('😠', 'Frustrated'),
  option('😕', 'Confused'),
  option('🎉', 'Excited'),
  option('😔', 'Sad'),
  option('😐', 'Neutral'),
]);

const byTag = new Map(MOOD_CATALOG.map((m) => [m.tag, m] as const));

export function isMoodTag(tag: string): boolean {
  return byTag.has(tag);
}

export function moodLabel(tag: string): string {
  return byTag.get(tag)?.label ?? tag;
}
