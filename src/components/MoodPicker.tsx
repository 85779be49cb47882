import { MOOD_CATALOG } from '@lib/moods';

export default function MoodPicker({ value, onChange }: { value: string; onChange: (tag: string) => void }) {
  return (
    <fieldset>
      <legend className="mb-2 text-sm text-white/70">How are you feeling?</legend>
      <div className="flex flex-wrap gap-2">
        {MOOD_CATALOG.map((m) => {
          const selected = m.tag === value;
          return (
            <label
              key={m.tag}
              className={
                'flex cursor-pointer items-center gap-1 rounded-full border px-3 py-1 text-sm ' +
                (selected ? 'border-white/60 bg-white/15 text-white' : 'border-white/20 text-white/70 hover:text-white')
              }
            >
              <input
                type="radio"
                name="mood"
                value={m.tag}
                checked={selected}
                onChange={() => onChange(m.tag)}
                className="sr-only"
              />
              {m.label}
            </label>
          );
        })}
      </div>
    </fieldset>
  );
}
