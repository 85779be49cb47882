import { loadConfig } from './_config';
import { authenticate } from './_google';
import { openOrCreate } from './_sheets';
import { createMoodStore, type MoodStore } from './_store';
import { ConfigError, MoodSheetError } from './_errors';
import { logMoodRequestSchema } from '../src/lib/schema';
import { isMoodTag } from '../src/lib/moods';

export const config = { runtime: 'nodejs' };

interface Req { method?: string; body?: unknown; }
interface Res { status: (c:number)=>Res; json: (v:unknown)=>void; }

export type StoreResolver = () => Promise<MoodStore>;

// One handle per server instance; a failed resolution is forgotten so the next request retries.
export function cachedResolver(connect: () => Promise<MoodStore>): StoreResolver {
  let pending: Promise<MoodStore> | null = null;
  return () => {
    if (!pending) {
      pending = connect().catch((e: unknown) => {
        pending = null;
        throw e;
      });
    }
    return pending;
  };
}

async function connectFromEnv(): Promise<MoodStore> {
  const { credential, sheetName } = loadConfig();
  const service = await authenticate(credential);
  const handle = await openOrCreate(service, sheetName);
  console.log('[moods] spreadsheet ready', { spreadsheetId: handle.spreadsheetId, created: handle.created });
  return createMoodStore(service, handle);
}

function readBody(body: unknown): unknown {
  if (typeof body !== 'string') return body ?? {};
  try { return JSON.parse(body); } catch { return null; }
}

interface SheetRef { spreadsheetId: string; spreadsheetUrl: string; }

function fail(res: Res, e: unknown, sheet?: SheetRef) {
  if (e instanceof MoodSheetError) {
    const status = e instanceof ConfigError ? 503 : 500;
    console.error('[moods] ' + e.code, e.message);
    return res.status(status).json({ ok:false, error:e.code, message:e.message, ...sheet });
  }
  console.error('[moods] unexpected', e instanceof Error ? e.message : e);
  return res.status(500).json({ ok:false, error:'server-error', message:'Unexpected server error' });
}

export function createMoodsHandler(resolveStore: StoreResolver) {
  let announced = false;

  return async function handler(req: Req, res: Res) {
    try {
      if (req.method === 'GET') {
        const store = await resolveStore();
        let loaded: Awaited<ReturnType<MoodStore['loadAll']>>;
        try {
          loaded = await store.loadAll();
        } catch (e) {
          // the sheet is reachable even when its rows are not; keep the link so it can be fixed
          return fail(res, e, { spreadsheetId: store.handle.spreadsheetId, spreadsheetUrl: store.handle.url });
        }
        const { entries, spreadsheetId } = loaded;
        const created = store.handle.created && !announced;
        announced = true;
        return res.status(200).json({ ok:true, entries, spreadsheetId, spreadsheetUrl: store.handle.url, created });
      }
      if (req.method === 'POST') {
        const parsed = logMoodRequestSchema.safeParse(readBody(req.body));
        if (!parsed.success) return res.status(400).json({ ok:false, error:'invalid-body', message: parsed.error.issues[0]?.message ?? 'Invalid request' });
        const { mood, note } = parsed.data;
        if (!isMoodTag(mood)) return res.status(400).json({ ok:false, error:'invalid-mood', message:`Unknown mood "${mood}"` });
        const store = await resolveStore();
        const entry = await store.log(mood, note);
        console.log('[moods] logged', { mood, at: entry.timestamp });
        return res.status(200).json({ ok:true, entry });
      }
      return res.status(405).json({ ok:false, error:'method-not-allowed' });
    } catch (e) {
      return fail(res, e);
    }
  };
}

export default createMoodsHandler(cachedResolver(connectFromEnv));
