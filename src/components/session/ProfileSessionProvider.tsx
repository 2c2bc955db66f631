import { useEffect, useMemo, type ReactNode } from 'react';
import { useConfirm } from '@/hooks/useConfirm';
import { SessionContext, type SessionStores } from '@/hooks/useSession';
import type { SessionServices } from '@/lib/services';
import { createCanvasStore } from '@/stores/canvas';
import { createPitchDeckStore } from '@/stores/pitchDeck';
import { createProfileStore } from '@/stores/profile';
import { createTeamStore } from '@/stores/team';
import type { Confirm } from '@/types/confirm';

interface ProfileSessionProviderProps {
  userId: string;
  services: SessionServices;
  children: ReactNode;
}

export function createSessionStores(userId: string, services: SessionServices, confirm: Confirm): SessionStores {
  return {
    userId,
    profile: createProfileStore({ userId, repository: services.profiles, storage: services.storage }),
    pitchDeck: createPitchDeckStore({
      userId,
      picker: services.picker,
      thumbnailer: services.thumbnailer,
      storage: services.storage,
      repository: services.pitchDecks,
      confirm,
    }),
    team: createTeamStore({ userId, repository: services.team, confirm }),
    canvas: createCanvasStore({ userId, repository: services.canvases }),
  };
}

/**
 * Owns one user's stores. Render it with `key={userId}` so a different
 * user gets fresh stores; unmounting drops pending autosaves.
 */
export function ProfileSessionProvider({ userId, services, children }: ProfileSessionProviderProps) {
  const confirm = useConfirm();
  const stores = useMemo(() => createSessionStores(userId, services, confirm), [userId, services, confirm]);

  useEffect(() => {
    console.log('[session] Loading stores for', userId);
    void Promise.all([
      stores.profile.getState().load(),
      stores.pitchDeck.getState().load(),
      stores.team.getState().load(),
      stores.canvas.getState().load(),
    ]);

    return () => {
      stores.profile.getState().dispose();
      stores.canvas.getState().dispose();
    };
  }, [stores, userId]);

  return <SessionContext.Provider value={stores}>{children}</SessionContext.Provider>;
}
