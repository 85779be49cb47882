import type { MoodEntry } from '@lib/types';
import { moodLabel } from '@lib/moods';
import { timeOfDay } from '@lib/utils';

export default function RecentEntries({ entries }: { entries: MoodEntry[] }) {
  return (
    <section>
      <h3 className="mb-2 text-lg font-semibold">Recent Entries</h3>
      <table className="w-full text-left text-sm">
        <thead className="text-white/50">
          <tr><th className="py-1 pr-4 font-normal">Time</th><th className="py-1 pr-4 font-normal">Mood</th><th className="py-1 font-normal">Note</th></tr>
        </thead>
        <tbody>
          {entries.map((e, i) => (
            <tr key={`${i}-${e.timestamp}`} className="border-t border-white/10">
              <td className="py-1 pr-4 tabular-nums">{timeOfDay(e.timestamp)}</td>
              <td className="py-1 pr-4">{moodLabel(e.mood)}</td>
              <td className="py-1 text-white/70">{e.note}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </section>
  );
}
