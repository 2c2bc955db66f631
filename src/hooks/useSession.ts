import { createContext, useContext } from 'react';
import { useStore } from 'zustand';
import type { CanvasState, CanvasStore } from '@/stores/canvas';
import type { PitchDeckState, PitchDeckStore } from '@/stores/pitchDeck';
import type { ProfileState, ProfileStore } from '@/stores/profile';
import type { TeamState, TeamStore } from '@/stores/team';

export interface SessionStores {
  userId: string;
  profile: ProfileStore;
  pitchDeck: PitchDeckStore;
  team: TeamStore;
  canvas: CanvasStore;
}

export const SessionContext = createContext<SessionStores | null>(null);

export function useSessionStores(): SessionStores {
  const stores = useContext(SessionContext);
  if (!stores) throw new Error('Session stores are only available inside <ProfileSessionProvider>');
  return stores;
}

export function usePitchDeckStore<T>(selector: (state: PitchDeckState) => T): T {
  return useStore(useSessionStores().pitchDeck, selector);
}

export function useProfileStore<T>(selector: (state: ProfileState) => T): T {
  return useStore(useSessionStores().profile, selector);
}

export function useTeamStore<T>(selector: (state: TeamState) => T): T {
  return useStore(useSessionStores().team, selector);
}

export function useCanvasStore<T>(selector: (state: CanvasState) => T): T {
  return useStore(useSessionStores().canvas, selector);
}
