import { useCallback, useEffect } from 'react';
import { supabase } from '@/lib/supabase';
import { errorMessage } from '@/lib/errors';
import { toSessionUser, useAuthStore } from '@/stores/auth';
import type { SignUpInput } from '@/types/auth';

export type AuthResult = { ok: true } | { ok: false; error: string };

/**
 * Subscribes the auth store to Supabase session changes.
 * Mount once, near the root.
 */
export function useAuthListener() {
  const setUser = useAuthStore((s) => s.setUser);

  useEffect(() => {
    supabase.auth.getSession().then(
      ({ data }) => setUser(data.session ? toSessionUser(data.session.user) : null),
      (err: unknown) => {
        console.error('[auth] Session check failed:', errorMessage(err));
        setUser(null);
      },
    );

    const { data } = supabase.auth.onAuthStateChange((_event, session) => {
      setUser(session ? toSessionUser(session.user) : null);
    });

    return () => data.subscription.unsubscribe();
  }, [setUser]);
}

export function useAuth() {
  const user = useAuthStore((s) => s.user);
  const loading = useAuthStore((s) => s.loading);

  const signIn = useCallback(async (email: string, password: string): Promise<AuthResult> => {
    const { error } = await supabase.auth.signInWithPassword({ email: email.trim(), password });
    if (error) {
      console.error('[auth] Sign in failed:', error.message);
      return { ok: false, error: error.message };
    }
    return { ok: true };
  }, []);

  const signUp = useCallback(async ({ fullName, email, password }: SignUpInput): Promise<AuthResult> => {
    const { error } = await supabase.auth.signUp({
      email: email.trim(),
      password,
      options: { data: { full_name: fullName.trim(), user_type: 'startup' } },
    });
    if (error) {
      console.error('[auth] Sign up failed:', error.message);
      return { ok: false, error: error.message };
    }
    return { ok: true };
  }, []);

  const signOut = useCallback(async (): Promise<AuthResult> => {
    const { error } = await supabase.auth.signOut();
    if (error) {
      console.error('[auth] Sign out failed:', error.message);
      return { ok: false, error: 'Failed to sign out. Please try again.' };
    }
    return { ok: true };
  }, []);

  return { user, loading, isAuthenticated: user !== null, signIn, signUp, signOut };
}
