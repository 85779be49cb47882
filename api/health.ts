import { loadConfig } from './_config';
import { MoodSheetError } from './_errors';

export const config = { runtime: 'nodejs' };

interface Res { status:(c:number)=>Res; json:(v:unknown)=>void }

export default function handler(_req: unknown, res: Res) {
  try {
    loadConfig();
    res.status(200).json({ ok: true, configured: true });
  } catch (e) {
    const reason = e instanceof MoodSheetError ? e.code : 'server-error';
    res.status(200).json({ ok: true, configured: false, reason });
  }
}
