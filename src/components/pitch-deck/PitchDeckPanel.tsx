import { AnimatePresence } from 'framer-motion';
import { CheckCircle2, Plus, Upload } from 'lucide-react';
import { GlassBadge } from '@/components/ui/GlassBadge';
import { GlassButton } from '@/components/ui/GlassButton';
import { usePitchDeck } from '@/hooks/usePitchDeck';
import { PITCH_DECK_EXTENSIONS, PITCH_DECK_MAX_BYTES } from '@/lib/constants';
import { formatDate, formatSize } from '@/lib/format';
import { pendingUploads } from '@/stores/pitchDeck';
import type { WorkflowStatus } from '@/types/pitch-deck';
import { PitchDeckDropZone } from './PitchDeckDropZone';
import { PitchDeckFileCard } from './PitchDeckFileCard';
import { RejectedFilesList } from './RejectedFilesList';

const STATUS_LABELS: Record<Exclude<WorkflowStatus, 'idle'>, string> = {
  loading: 'Loading...',
  selecting: 'Selecting...',
  staging: 'Preparing previews...',
  removing: 'Removing...',
  submitting: 'Submitting...',
};

export function PitchDeckPanel() {
  const { entries, status, submission, lastRejected, isBusy, selectFiles, stageDropped, removeFile, submit } =
    usePitchDeck();
  const locked = submission.isSubmitted;
  const pendingCount = pendingUploads(entries).length;

  return (
    <PitchDeckDropZone disabled={locked || isBusy} onDrop={(files) => void stageDropped(files)}>
      <section className="rounded-2xl border border-white/[0.08] bg-white/[0.02] backdrop-blur-xl overflow-hidden">
        <header className="flex items-center justify-between px-5 py-3 border-b border-white/[0.06]">
          <div>
            <h3 className="text-sm font-semibold text-text-primary">Pitch Deck</h3>
            <p className="text-[11px] text-text-muted">
              {PITCH_DECK_EXTENSIONS.join(', ').toUpperCase()} up to {formatSize(PITCH_DECK_MAX_BYTES)}
            </p>
          </div>

          <div className="flex items-center gap-2">
            {locked ? (
              <GlassBadge variant="submitted">
                <CheckCircle2 size={12} className="mr-1" />
                Submitted {formatDate(submission.submittedAt)}
              </GlassBadge>
            ) : (
              <>
                <GlassButton
                  variant="ghost"
                  onClick={() => void selectFiles()}
                  disabled={isBusy}
                  loading={status === 'selecting' || status === 'staging' ? STATUS_LABELS[status] : undefined}
                >
                  <Plus size={12} className="inline mr-1" />
                  Add Files
                </GlassButton>
                <GlassButton
                  onClick={() => void submit()}
                  disabled={isBusy || pendingCount === 0}
                  loading={status === 'submitting' ? STATUS_LABELS.submitting : undefined}
                >
                  <Upload size={12} className="inline mr-1" />
                  Submit ({pendingCount})
                </GlassButton>
              </>
            )}
          </div>
        </header>

        <div className="px-5 py-4 space-y-4">
          {status === 'loading' ? (
            <p className="text-xs text-text-muted">{STATUS_LABELS.loading}</p>
          ) : entries.length === 0 ? (
            <p className="text-xs text-text-muted">
              No pitch deck files yet. Add a PDF deck or a demo video, or drop files here.
            </p>
          ) : (
            <div className="flex flex-wrap gap-3">
              <AnimatePresence initial={false}>
                {entries.map((entry, index) => (
                  <PitchDeckFileCard
                    key={entry.id}
                    entry={entry}
                    locked={locked}
                    disabled={isBusy}
                    onRemove={() => void removeFile(index)}
                  />
                ))}
              </AnimatePresence>
            </div>
          )}

          {!locked && <RejectedFilesList rejected={lastRejected} />}
        </div>
      </section>
    </PitchDeckDropZone>
  );
}
