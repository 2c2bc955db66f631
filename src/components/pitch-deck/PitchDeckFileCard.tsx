import { motion } from 'framer-motion';
import { X } from 'lucide-react';
import { GlassBadge } from '@/components/ui/GlassBadge';
import { formatSize, truncateFileName } from '@/lib/format';
import type { PitchDeckEntry } from '@/types/pitch-deck';
import { PitchDeckThumbnail } from './PitchDeckThumbnail';

interface PitchDeckFileCardProps {
  entry: PitchDeckEntry;
  /** Hides the remove control once the deck is submitted */
  locked: boolean;
  disabled?: boolean;
  onRemove: () => void;
}

export function PitchDeckFileCard({ entry, locked, disabled, onRemove }: PitchDeckFileCardProps) {
  return (
    <motion.div
      layout
      initial={{ opacity: 0, scale: 0.95 }}
      animate={{ opacity: 1, scale: 1 }}
      exit={{ opacity: 0, scale: 0.95 }}
      className="relative w-36 rounded-xl border border-white/[0.08] bg-white/[0.02] overflow-hidden"
    >
      <PitchDeckThumbnail thumbnail={entry.thumbnail} alt={entry.fileName} className="h-24 w-full" />

      <div className="px-2.5 py-2 space-y-1">
        <p className="text-xs font-medium text-text-primary" title={entry.fileName}>
          {truncateFileName(entry.fileName)}
        </p>
        <div className="flex items-center justify-between gap-1">
          <span className="text-[10px] text-text-muted">
            {entry.sizeBytes === null ? entry.extension.toUpperCase() : formatSize(entry.sizeBytes)}
          </span>
          <GlassBadge variant={entry.remote ? 'stored' : 'staged'} className="px-2 text-[10px]">
            {entry.remote ? 'Stored' : 'Staged'}
          </GlassBadge>
        </div>
      </div>

      {!locked && (
        <button
          type="button"
          onClick={onRemove}
          disabled={disabled}
          aria-label={`Remove ${entry.fileName}`}
          className="absolute top-1.5 right-1.5 p-1 rounded-full bg-black/60 text-text-secondary hover:text-status-failed disabled:opacity-40 transition-colors"
        >
          <X size={12} />
        </button>
      )}
    </motion.div>
  );
}
