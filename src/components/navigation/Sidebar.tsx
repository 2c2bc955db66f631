import { useState, useEffect } from 'react';
import { Link, useLocation } from 'react-router-dom';
import { toast } from 'sonner';
import { Home, Building2, Presentation, Users, LayoutGrid, LogOut, Pin, PinOff } from 'lucide-react';
import { cn } from '@/lib/cn';
import { useAuth } from '@/hooks/useAuth';
import { usePitchDeckStore } from '@/hooks/useSession';

const NAV_GROUPS = [
  {
    label: 'Overview',
    items: [{ label: 'Dashboard', href: '/dashboard', icon: Home }],
    activeColor: 'bg-white/10 text-white shadow-lg shadow-white/5',
    hoverColor: 'hover:text-text-secondary',
  },
  {
    label: 'Startup',
    items: [
      { label: 'Profile', href: '/profile', icon: Building2 },
      { label: 'Pitch Deck', href: '/pitch-deck', icon: Presentation },
      { label: 'Team', href: '/team', icon: Users },
      { label: 'Business Model', href: '/canvas', icon: LayoutGrid },
    ],
    activeColor: 'bg-brand/15 text-brand-soft shadow-lg shadow-brand/5',
    hoverColor: 'hover:text-brand',
  },
];

const SIDEBAR_COLLAPSED_WIDTH = 'w-16';
const SIDEBAR_EXPANDED_WIDTH = 'w-56';

export function Sidebar() {
  const location = useLocation();
  const { user, signOut } = useAuth();
  const pendingCount = usePitchDeckStore((s) => s.entries.filter((e) => e.remote === null).length);

  const [isPinned, setIsPinned] = useState(() => localStorage.getItem('sidebar-pinned') === 'true');
  const [isHovered, setIsHovered] = useState(false);

  // Expanded when pinned or hovered
  const isExpanded = isPinned || isHovered;

  // AppShell listens for this to adjust its margin
  useEffect(() => {
    localStorage.setItem('sidebar-pinned', String(isPinned));
    window.dispatchEvent(new CustomEvent('sidebar-pin-change', { detail: isPinned }));
  }, [isPinned]);

  async function handleSignOut() {
    const result = await signOut();
    if (!result.ok) toast.error(result.error);
  }

  return (
    <aside
      className={cn(
        'fixed left-0 top-0 z-50 flex h-screen flex-col border-r border-white/[0.06] bg-crystal-surface/95 backdrop-blur-xl transition-all duration-300 ease-in-out',
        isExpanded ? SIDEBAR_EXPANDED_WIDTH : SIDEBAR_COLLAPSED_WIDTH,
      )}
      onMouseEnter={() => setIsHovered(true)}
      onMouseLeave={() => setIsHovered(false)}
    >
      <div className="flex h-16 items-center justify-between border-b border-white/[0.06] px-3">
        <Link to="/dashboard" className="flex items-center gap-2">
          <div className="flex h-10 w-10 shrink-0 items-center justify-center rounded-lg bg-gradient-to-br from-brand-soft to-brand-deep">
            <span className="text-sm font-bold text-black">FC</span>
          </div>
          {isExpanded && (
            <span className="whitespace-nowrap text-sm font-semibold text-white">Founder Console</span>
          )}
        </Link>

        {isExpanded && (
          <button
            onClick={() => setIsPinned(!isPinned)}
            className={cn(
              'rounded-lg p-1.5 transition-colors',
              isPinned
                ? 'bg-brand/20 text-brand'
                : 'text-text-muted hover:bg-white/[0.05] hover:text-text-secondary',
            )}
            title={isPinned ? 'Unpin sidebar' : 'Pin sidebar open'}
          >
            {isPinned ? <Pin size={16} /> : <PinOff size={16} />}
          </button>
        )}
      </div>

      <nav className="flex-1 overflow-y-auto overflow-x-hidden py-4">
        {NAV_GROUPS.map((group, groupIdx) => (
          <div key={group.label} className="mb-4">
            {isExpanded && (
              <div className="mb-2 px-4">
                <span className="text-[10px] font-semibold uppercase tracking-wider text-text-muted">
                  {group.label}
                </span>
              </div>
            )}

            {!isExpanded && groupIdx > 0 && <div className="mx-3 mb-3 border-t border-white/[0.08]" />}

            <div className="space-y-1 px-2">
              {group.items.map((item) => {
                const Icon = item.icon;
                const isActive = location.pathname === item.href;

                return (
                  <Link
                    key={item.href}
                    to={item.href}
                    className={cn(
                      'flex items-center gap-3 rounded-lg px-3 py-2.5 text-sm font-medium transition-all',
                      isExpanded ? '' : 'justify-center',
                      isActive
                        ? group.activeColor
                        : cn('text-text-muted hover:bg-white/[0.05]', group.hoverColor),
                    )}
                    title={!isExpanded ? item.label : undefined}
                  >
                    <Icon className="h-5 w-5 shrink-0" />
                    {isExpanded && (
                      <>
                        <span className="whitespace-nowrap">{item.label}</span>
                        {item.href === '/pitch-deck' && pendingCount > 0 && (
                          <span className="ml-auto inline-flex items-center rounded-full bg-status-staged/15 border border-status-staged/30 px-1.5 py-0.5 font-mono text-[10px] font-semibold text-status-staged">
                            {pendingCount}
                          </span>
                        )}
                      </>
                    )}
                  </Link>
                );
              })}
            </div>
          </div>
        ))}
      </nav>

      <div className="border-t border-white/[0.06] p-3">
        <div className={cn('flex items-center gap-2', !isExpanded && 'flex-col')}>
          {isExpanded && (
            <span className="flex-1 truncate text-xs text-text-secondary">{user?.fullName ?? user?.email}</span>
          )}
          <button
            onClick={() => void handleSignOut()}
            className={cn(
              'rounded-lg p-2 text-text-muted transition-colors hover:bg-white/[0.05] hover:text-status-failed',
              !isExpanded && 'w-full',
            )}
            title="Sign out"
          >
            <LogOut size={18} className={cn(!isExpanded && 'mx-auto')} />
          </button>
        </div>
      </div>
    </aside>
  );
}
