import { useCallback } from 'react';
import { toast } from 'sonner';
import { useStore } from 'zustand';
import type { SelectOutcome, StageOutcome } from '@/stores/pitchDeck';
import type { RejectedFile } from '@/types/pitch-deck';
import { useSessionStores } from './useSession';

/** One line per rejected file, for the warning toast. */
export function describeRejections(rejected: RejectedFile[]): string {
  return rejected.map((r) => `${r.fileName}: ${r.reason}`).join('\n');
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function warnRejected(rejected: RejectedFile[]) {
  if (rejected.length === 0) return;
  toast.warning(`${plural(rejected.length, 'file')} skipped`, {
    description: describeRejections(rejected),
  });
}

/** Toasts for a chooser or drop result. Dismissed choosers stay silent. */
export function reportStagingOutcome(outcome: SelectOutcome | StageOutcome) {
  switch (outcome.type) {
    case 'failed':
      toast.error(outcome.error.message);
      break;
    case 'rejected':
      warnRejected(outcome.rejected);
      break;
    case 'staged':
      toast.success(`${plural(outcome.entries.length, 'file')} added. Submit when ready.`);
      warnRejected(outcome.rejected);
      break;
    case 'locked':
      toast.info('This pitch deck has been submitted and can no longer be changed.');
      break;
    case 'busy':
      toast.info('Please wait for the current operation to finish.');
      break;
    case 'cancelled':
      break;
  }
}

/**
 * Pitch deck workflow for components. Store outcomes become toasts here;
 * the store itself never touches the UI.
 */
export function usePitchDeck() {
  const { pitchDeck } = useSessionStores();
  const entries = useStore(pitchDeck, (s) => s.entries);
  const status = useStore(pitchDeck, (s) => s.status);
  const submission = useStore(pitchDeck, (s) => s.submission);
  const lastRejected = useStore(pitchDeck, (s) => s.lastRejected);

  const selectFiles = useCallback(async () => {
    const outcome = await pitchDeck.getState().selectAndStage();
    reportStagingOutcome(outcome);
    return outcome;
  }, [pitchDeck]);

  const stageDropped = useCallback(
    async (files: File[]) => {
      const outcome = await pitchDeck.getState().stage(files);
      reportStagingOutcome(outcome);
      return outcome;
    },
    [pitchDeck],
  );

  const removeFile = useCallback(
    async (index: number) => {
      const outcome = await pitchDeck.getState().removeFile(index);
      if (outcome.type === 'failed') toast.error(outcome.error.message);
      if (outcome.type === 'removed') toast.success(`Removed ${outcome.entry.fileName}`);
      return outcome;
    },
    [pitchDeck],
  );

  const submit = useCallback(async () => {
    const outcome = await pitchDeck.getState().submit();
    switch (outcome.type) {
      case 'failed':
        toast.error(outcome.error.message);
        break;
      case 'nothing-to-submit':
        toast.error('Please select files first');
        break;
      case 'submitted':
        toast.success('Pitch deck submitted successfully!');
        break;
      case 'already-submitted':
      case 'busy':
        break;
    }
    return outcome;
  }, [pitchDeck]);

  return {
    entries,
    status,
    submission,
    lastRejected,
    isBusy: status !== 'idle',
    selectFiles,
    stageDropped,
    removeFile,
    submit,
  };
}
