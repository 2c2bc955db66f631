import { create } from 'zustand';
import type { User } from '@supabase/supabase-js';
import { USER_TYPES, type SessionUser, type UserType } from '@/types/auth';

interface AuthStore {
  user: SessionUser | null;
  /** True until the first session check settles */
  loading: boolean;
  setUser: (user: SessionUser | null) => void;
}

export const useAuthStore = create<AuthStore>((set) => ({
  user: null,
  loading: true,
  setUser: (user) => set({ user, loading: false }),
}));

function isUserType(value: unknown): value is UserType {
  return USER_TYPES.some((t) => t === value);
}

/** Maps a Supabase auth user onto the fields the console reads from metadata. */
export function toSessionUser(user: User): SessionUser {
  const metadata: Record<string, unknown> = user.user_metadata ?? {};
  const fullName = metadata.full_name;
  const userType = metadata.user_type;

  return {
    id: user.id,
    email: user.email ?? '',
    fullName: typeof fullName === 'string' && fullName ? fullName : null,
    userType: isUserType(userType) ? userType : null,
  };
}
