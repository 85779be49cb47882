import { z } from 'zod';
import { NOTE_MAX_LENGTH } from './constants';

export const moodEntrySchema = z.object({
  timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  mood: z.string(),
  note: z.string(),
});

export const logMoodRequestSchema = z.object({
  mood: z.string().trim().min(1),
  note: z.string().max(NOTE_MAX_LENGTH).default(''),
});

const failureSchema = z.object({
  ok: z.literal(false),
  error: z.string(),
  message: z.string().optional(),
  spreadsheetId: z.string().nullable().optional(),
  spreadsheetUrl: z.string().nullable().optional(),
});

export const moodsResponseSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    entries: z.array(moodEntrySchema),
    spreadsheetId: z.string().nullable(),
    spreadsheetUrl: z.string().nullable(),
    created: z.boolean(),
  }),
  failureSchema,
]);

export const logMoodResponseSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), entry: moodEntrySchema }),
  failureSchema,
]);
