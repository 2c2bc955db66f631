import { lazy, Suspense, type ReactNode } from 'react';
import { BrowserRouter, Routes, Route, Navigate, Outlet } from 'react-router-dom';
import { Toaster } from 'sonner';
import { LoginPage } from '@/pages/LoginPage';
import { AppShell } from '@/components/layout/AppShell';
import { AuthGuard } from '@/components/layout/AuthGuard';
import { ConfirmProvider } from '@/components/ui/ConfirmProvider';
import { ErrorBoundary } from '@/components/ui/ErrorBoundary';
import { useAuthListener } from '@/hooks/useAuth';
import { createBrowserServices } from '@/lib/services';
import { supabase } from '@/lib/supabase';

const services = createBrowserServices(supabase);

// Lazy-loaded pages
const Dashboard = lazy(() => import('@/pages/Dashboard').then(m => ({ default: m.Dashboard })));
const ProfilePage = lazy(() => import('@/pages/ProfilePage').then(m => ({ default: m.ProfilePage })));
const PitchDeckPage = lazy(() => import('@/pages/PitchDeckPage').then(m => ({ default: m.PitchDeckPage })));
const TeamPage = lazy(() => import('@/pages/TeamPage').then(m => ({ default: m.TeamPage })));
const CanvasPage = lazy(() => import('@/pages/CanvasPage').then(m => ({ default: m.CanvasPage })));

function PageLoader() {
  return (
    <div className="flex items-center justify-center min-h-[400px]">
      <div className="animate-spin h-8 w-8 border-2 border-brand border-t-transparent rounded-full" />
    </div>
  );
}

/**
 * Wrapper for lazy-loaded pages with Suspense boundary
 */
function LazyPage({ children }: { children: ReactNode }) {
  return (
    <ErrorBoundary>
      <Suspense fallback={<PageLoader />}>{children}</Suspense>
    </ErrorBoundary>
  );
}

/** One guarded layout so session stores survive navigation between pages. */
function FounderLayout() {
  return (
    <AuthGuard services={services}>
      <AppShell>
        <LazyPage>
          <Outlet />
        </LazyPage>
      </AppShell>
    </AuthGuard>
  );
}

export function App() {
  useAuthListener();

  return (
    <BrowserRouter>
      <ConfirmProvider>
        <Toaster
          position="top-right"
          toastOptions={{
            style: {
              background: 'rgba(13, 17, 23, 0.9)',
              backdropFilter: 'blur(12px)',
              border: '1px solid rgba(255, 255, 255, 0.08)',
              color: '#f1f5f9',
              fontFamily: 'Satoshi, system-ui, sans-serif',
            },
          }}
        />
        <Routes>
          <Route path="/login" element={<LoginPage />} />
          <Route element={<FounderLayout />}>
            <Route path="/dashboard" element={<Dashboard />} />
            <Route path="/profile" element={<ProfilePage />} />
            <Route path="/pitch-deck" element={<PitchDeckPage />} />
            <Route path="/team" element={<TeamPage />} />
            <Route path="/canvas" element={<CanvasPage />} />
          </Route>
          <Route path="*" element={<Navigate to="/dashboard" replace />} />
        </Routes>
      </ConfirmProvider>
    </BrowserRouter>
  );
}
