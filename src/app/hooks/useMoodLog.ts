import { useCallback, useEffect, useRef, useState } from 'react';
import { fetchMoods, logMood } from '@lib/moodApi';
import type { MoodSnapshot } from '@lib/types';
import { REFRESH_INTERVAL_MS } from '@lib/constants';

export type LogStatus = 'loading' | 'idle' | 'submitting';

export interface Notice {
  kind: 'success' | 'error';
  text: string;
  detail?: string;
  href?: string;
}

const EMPTY: MoodSnapshot = { entries: [], spreadsheetId: null, spreadsheetUrl: null, created: false };

export const SUBMIT_FAILED_TEXT = 'Failed to log mood. Please check your Google Sheets configuration.';

type UseMoodLogResult = {
  snapshot: MoodSnapshot;
  status: LogStatus;
  loadError: string | null;
  notice: Notice | null;
  dismissNotice: () => void;
  lastUpdated: Date | null;
  submit: (mood: string, note: string) => Promise<boolean>;
};

export function useMoodLog(intervalMs = REFRESH_INTERVAL_MS): UseMoodLogResult {
  const [snapshot, setSnapshot] = useState<MoodSnapshot>(EMPTY);
  const [status, setStatus] = useState<LogStatus>('loading');
  const [loadError, setLoadError] = useState<string | null>(null);
  const [notice, setNotice] = useState<Notice | null>(null);
  const [lastUpdated, setLastUpdated] = useState<Date | null>(null);
  const mounted = useRef(true);
  const inFlight = useRef(false);
  const queued = useRef(false);

  // Poll ticks landing during a load are dropped; forced reloads (after submit) queue one more pass.
  const reload = useCallback(async function run(force = false): Promise<void> {
    if (inFlight.current) {
      if (force) queued.current = true;
      return;
    }
    inFlight.current = true;
    try {
      const result = await fetchMoods();
      if (!mounted.current) return;
      if (result.ok) {
        setSnapshot(result.value);
        setLoadError(null);
        const url = result.value.spreadsheetUrl;
        if (result.value.created && url) {
          setNotice({ kind: 'success', text: 'Created new Mood Tracker spreadsheet! Access it here:', href: url });
        }
      } else {
        const { spreadsheetId, spreadsheetUrl } = result;
        setSnapshot((prev) => ({
          ...EMPTY,
          spreadsheetId: spreadsheetId ?? prev.spreadsheetId,
          spreadsheetUrl: spreadsheetUrl ?? prev.spreadsheetUrl,
        }));
        setLoadError(result.message);
      }
      setLastUpdated(new Date());
      setStatus((s) => (s === 'loading' ? 'idle' : s));
    } finally {
      inFlight.current = false;
      if (queued.current) {
        queued.current = false;
        void run(true);
      }
    }
  }, []);

  const submit = useCallback(async (mood: string, note: string): Promise<boolean> => {
    setStatus('submitting');
    setNotice(null);
    const result = await logMood(mood, note);
    if (!mounted.current) return result.ok;
    setStatus('idle');
    if (!result.ok) {
      console.error('[mood-log] submit failed', result.error);
      setNotice({ kind: 'error', text: SUBMIT_FAILED_TEXT, detail: result.message });
      return false;
    }
    setNotice({ kind: 'success', text: 'Mood logged successfully!' });
    await reload(true);
    return true;
  }, [reload]);

  useEffect(() => {
    mounted.current = true;
    void reload();
    const id = setInterval(() => { void reload(); }, intervalMs);
    return () => {
      mounted.current = false;
      clearInterval(id);
    };
  }, [reload, intervalMs]);

  const dismissNotice = useCallback(() => setNotice(null), []);

  return { snapshot, status, loadError, notice, dismissNotice, lastUpdated, submit };
}
