import type { ReactNode } from 'react';
import { Navigate } from 'react-router-dom';
import { ProfileSessionProvider } from '@/components/session/ProfileSessionProvider';
import { useAuth } from '@/hooks/useAuth';
import type { SessionServices } from '@/lib/services';

interface AuthGuardProps {
  services: SessionServices;
  children: ReactNode;
}

/** Signed-in users get a session provider keyed by their id; everyone else goes to /login. */
export function AuthGuard({ services, children }: AuthGuardProps) {
  const { user, loading } = useAuth();

  if (loading) {
    return (
      <div className="min-h-screen flex items-center justify-center">
        <div className="flex flex-col items-center gap-3">
          <div className="w-8 h-8 border-2 border-text-muted border-t-brand rounded-full animate-spin" />
          <span className="text-sm text-text-secondary">Loading...</span>
        </div>
      </div>
    );
  }

  if (!user) {
    return <Navigate to="/login" replace />;
  }

  return (
    <ProfileSessionProvider key={user.id} userId={user.id} services={services}>
      {children}
    </ProfileSessionProvider>
  );
}
