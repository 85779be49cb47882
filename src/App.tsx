import { useMemo, useState, type FormEvent } from 'react';
import { useMoodLog } from '@app/hooks/useMoodLog';
import { chartData, dateBounds, recent, tally } from '@lib/aggregate';
import { MOOD_CATALOG } from '@lib/moods';
import { NOTE_MAX_LENGTH, RECENT_LIMIT, REFRESH_INTERVAL_MS } from '@lib/constants';
import { formatClock, formatLongDate, sheetUrl, todayISO } from '@lib/utils';
import DateSelect from '@components/DateSelect';
import MoodPicker from '@components/MoodPicker';
import MoodChart from '@components/MoodChart';
import RecentEntries from '@components/RecentEntries';
import NoticeBanner from '@components/NoticeBanner';

export default function App({ refreshMs = REFRESH_INTERVAL_MS }: { refreshMs?: number }) {
  const { snapshot, status, loadError, notice, dismissNotice, lastUpdated, submit } = useMoodLog(refreshMs);
  const { entries, spreadsheetId } = snapshot;

  const bounds = useMemo(() => dateBounds(entries), [entries]);
  // null = follow the newest day in the data (or today when there is none)
  const [pickedDate, setPickedDate] = useState<string | null>(null);
  const selectedDate = pickedDate ?? bounds?.max ?? todayISO();

  const [mood, setMood] = useState<string>(MOOD_CATALOG[0].tag);
  const [note, setNote] = useState('');

  const rows = useMemo(() => chartData(tally(entries, selectedDate)), [entries, selectedDate]);
  const latest = useMemo(() => recent(entries, selectedDate, RECENT_LIMIT), [entries, selectedDate]);
  const longDate = formatLongDate(selectedDate);
  const sheetHref = snapshot.spreadsheetUrl ?? (spreadsheetId ? sheetUrl(spreadsheetId) : null);

  async function handleSubmit(e: FormEvent) {
    e.preventDefault();
    if (await submit(mood, note)) setNote('');
  }

  return (
    <div className="min-h-screen bg-neutral-950 text-white">
      <div className="mx-auto flex max-w-5xl flex-col gap-8 px-4 py-8 md:flex-row">
        <aside className="flex w-full flex-col gap-5 md:w-72">
          <h2 className="text-xl font-semibold">Controls</h2>
          {sheetHref && (
            <a href={sheetHref} target="_blank" rel="noreferrer" className="text-sm underline text-white/80 hover:text-white">
              📊 View Google Sheet
            </a>
          )}
          <DateSelect value={selectedDate} bounds={bounds} onChange={setPickedDate} />

          <form onSubmit={(e) => { void handleSubmit(e); }} className="flex flex-col gap-4">
            <h2 className="text-xl font-semibold">Log a Mood</h2>
            <MoodPicker value={mood} onChange={setMood} />
            <label className="block text-sm text-white/70">
              Add a note (optional)
              <textarea
                value={note}
                maxLength={NOTE_MAX_LENGTH}
                onChange={(e) => setNote(e.target.value)}
                rows={4}
                className="mt-1 block w-full rounded-lg border border-white/15 bg-white/5 px-3 py-2 text-white"
              />
            </label>
            <button
              type="submit"
              disabled={status === 'submitting'}
              className="rounded-lg bg-white/90 px-4 py-2 font-medium text-neutral-900 hover:bg-white disabled:opacity-50"
            >
              {status === 'submitting' ? 'Submitting…' : 'Submit Mood'}
            </button>
          </form>
          <NoticeBanner notice={notice} onDismiss={dismissNotice} />
        </aside>

        <main className="flex flex-1 flex-col gap-6">
          <header>
            <h1 className="text-3xl font-bold">🎭 Mood Tracker</h1>
            <p className="mt-1 text-white/60">Track the emotional pulse of your support tickets throughout the day.</p>
          </header>

          {loadError && <p role="alert" className="rounded-lg bg-red-500/10 px-3 py-2 text-sm text-red-200">{loadError}</p>}

          <h2 className="text-2xl font-semibold">Mood Distribution for {longDate}</h2>
          {status === 'loading' ? (
            <p className="text-white/50">Loading…</p>
          ) : !entries.length ? (
            <p className="rounded-lg bg-sky-500/10 px-3 py-2 text-sky-100">No moods logged yet. Start tracking by submitting a mood in the sidebar!</p>
          ) : !latest.length ? (
            <p className="rounded-lg bg-sky-500/10 px-3 py-2 text-sky-100">No moods logged for {longDate}</p>
          ) : (
            <>
              <MoodChart rows={rows} title={`Mood Distribution for ${longDate}`} />
              <RecentEntries entries={latest} />
            </>
          )}

          <footer className="text-sm text-white/40">
            {lastUpdated && <p>Last updated: {formatClock(lastUpdated)}</p>}
            <p>Refreshing every {Math.round(refreshMs / 1000)} seconds...</p>
          </footer>
        </main>
      </div>
    </div>
  );
}
