import { AnimatePresence, motion } from 'motion/react';
import type { Notice } from '@app/hooks/useMoodLog';
import IconButton from './IconButton';

export default function NoticeBanner({ notice, onDismiss }: { notice: Notice | null; onDismiss: () => void }) {
  return (
    <AnimatePresence>
      {notice && (
        <motion.div
          key={notice.text}
          role={notice.kind === 'error' ? 'alert' : 'status'}
          initial={{ opacity: 0, y: -6 }}
          animate={{ opacity: 1, y: 0 }}
          exit={{ opacity: 0, y: -6 }}
          className={
            'flex items-start gap-2 rounded-xl border px-3 py-2 text-sm ' +
            (notice.kind === 'error' ? 'border-red-400/40 bg-red-500/10 text-red-100' : 'border-emerald-400/40 bg-emerald-500/10 text-emerald-100')
          }
        >
          <div className="flex-1">
            <p>
              {notice.text}
              {notice.href && (<> <a className="underline" href={notice.href} target="_blank" rel="noreferrer">{notice.href}</a></>)}
            </p>
            {notice.detail && <p className="mt-1 text-xs opacity-70">{notice.detail}</p>}
          </div>
          <IconButton label="Dismiss" onClick={onDismiss}>×</IconButton>
        </motion.div>
      )}
    </AnimatePresence>
  );
}
