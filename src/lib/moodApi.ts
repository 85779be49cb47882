import { getJSON, postJSON } from '../apiClient';
import { logMoodResponseSchema, moodsResponseSchema } from './schema';
import type { MoodEntry, MoodSnapshot } from './types';

export const MOODS_ENDPOINT = '/api/moods';

export interface ApiFailure {
  ok: false;
  error: string;
  message: string;
  spreadsheetId?: string | null;
  spreadsheetUrl?: string | null;
}

export type ApiResult<T> = { ok: true; value: T } | ApiFailure;

function failure<T>(error: string, message: string, extra?: Pick<ApiFailure, 'spreadsheetId' | 'spreadsheetUrl'>): ApiResult<T> {
  return { ok: false, error, message, ...extra };
}

export async function fetchMoods(): Promise<ApiResult<MoodSnapshot>> {
  try {
    const { res, data } = await getJSON(MOODS_ENDPOINT);
    const parsed = moodsResponseSchema.safeParse(data);
    if (!parsed.success) return failure('bad-response', `Error reading mood data: unexpected response (${res.status})`);
    const body = parsed.data;
    if (!body.ok) {
      const { spreadsheetId, spreadsheetUrl } = body;
      return failure(body.error, body.message ?? `Error reading mood data (${body.error})`, { spreadsheetId, spreadsheetUrl });
    }
    const { entries, spreadsheetId, spreadsheetUrl, created } = body;
    return { ok: true, value: { entries, spreadsheetId, spreadsheetUrl, created } };
  } catch (e) {
    return failure('network-error', `Error reading mood data: ${e instanceof Error ? e.message : 'network error'}`);
  }
}

export async function logMood(mood: string, note: string): Promise<ApiResult<MoodEntry>> {
  try {
    const { res, data } = await postJSON(MOODS_ENDPOINT, { mood, note });
    const parsed = logMoodResponseSchema.safeParse(data);
    if (!parsed.success) return failure('bad-response', `Failed to log mood: unexpected response (${res.status})`);
    const body = parsed.data;
    if (!body.ok) return failure(body.error, body.message ?? `Failed to log mood (${body.error})`);
    return { ok: true, value: body.entry };
  } catch (e) {
    return failure('network-error', `Failed to log mood: ${e instanceof Error ? e.message : 'network error'}`);
  }
}
