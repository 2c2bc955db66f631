import { useState, useEffect } from 'react';
import type { ReactNode } from 'react';
import { Sidebar } from '@/components/navigation/Sidebar';
import { cn } from '@/lib/cn';

interface AppShellProps {
  children: ReactNode;
}

export function AppShell({ children }: AppShellProps) {
  const [isPinned, setIsPinned] = useState(() => localStorage.getItem('sidebar-pinned') === 'true');

  useEffect(() => {
    const handlePinChange = (e: Event) => {
      if (e instanceof CustomEvent && typeof e.detail === 'boolean') setIsPinned(e.detail);
    };

    window.addEventListener('sidebar-pin-change', handlePinChange);
    return () => window.removeEventListener('sidebar-pin-change', handlePinChange);
  }, []);

  return (
    <div className="flex min-h-screen">
      <Sidebar />

      {/* ml tracks the sidebar width */}
      <div
        className={cn(
          'flex min-h-screen flex-1 flex-col transition-[margin] duration-300',
          isPinned ? 'ml-56' : 'ml-16',
        )}
      >
        <main className="flex-1 px-6 py-6">{children}</main>
      </div>
    </div>
  );
}
