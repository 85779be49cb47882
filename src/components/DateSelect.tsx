import type { DateBounds } from '@lib/types';

export default function DateSelect({
  value, bounds, onChange,
}: {
  value: string;
  bounds: DateBounds | null;
  onChange: (iso: string) => void;
}) {
  return (
    <label className="block text-sm text-white/70">
      Select Date
      <input
        type="date"
        value={value}
        min={bounds?.min}
        max={bounds?.max}
        onChange={(e) => { if (e.target.value) onChange(e.target.value); }}
        className="mt-1 block w-full rounded-lg border border-white/15 bg-white/5 px-3 py-2 text-white"
      />
    </label>
  );
}
