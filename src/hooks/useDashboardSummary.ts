import { useMemo } from 'react';
import { useStore } from 'zustand';
import { buildDashboardSummary } from '@/lib/dashboard';
import { useSessionStores } from './useSession';

export function useDashboardSummary() {
  const stores = useSessionStores();
  const profile = useStore(stores.profile, (s) => s.fields);
  const entries = useStore(stores.pitchDeck, (s) => s.entries);
  const submission = useStore(stores.pitchDeck, (s) => s.submission);
  const team = useStore(stores.team, (s) => s.members);
  const canvas = useStore(stores.canvas, (s) => s.sections);

  return useMemo(
    () => buildDashboardSummary({ profile, pitchDeck: { entries, submission }, team, canvas }),
    [profile, entries, submission, team, canvas],
  );
}
