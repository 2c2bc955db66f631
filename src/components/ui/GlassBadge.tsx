import type { ReactNode } from 'react';
import { cn } from '@/lib/cn';

export type BadgeVariant = 'staged' | 'stored' | 'submitted' | 'working' | 'failed' | 'neutral';

interface GlassBadgeProps {
  variant: BadgeVariant;
  children: ReactNode;
  className?: string;
}

const VARIANT_STYLES: Record<BadgeVariant, string> = {
  staged: 'bg-[rgba(59,130,246,0.15)] text-[#93bbfd] border-[rgba(59,130,246,0.2)]',
  stored: 'bg-[rgba(16,185,129,0.15)] text-[#6ee7b7] border-[rgba(16,185,129,0.2)]',
  submitted: 'bg-[rgba(255,165,0,0.15)] text-[#ffc04d] border-[rgba(255,165,0,0.25)]',
  working:
    'bg-[rgba(139,92,246,0.15)] text-[#c4b5fd] border-[rgba(139,92,246,0.2)] animate-pulse-glow-violet',
  failed: 'bg-[rgba(239,68,68,0.15)] text-[#fca5a5] border-[rgba(239,68,68,0.2)]',
  neutral: 'bg-white/[0.04] text-text-secondary border-white/[0.08]',
};

/** Rounded status pill with backdrop blur. */
export function GlassBadge({ variant, children, className }: GlassBadgeProps) {
  return (
    <span
      className={cn(
        'inline-flex items-center px-3 py-0.5 rounded-full text-[11px] font-semibold tracking-wide border backdrop-blur-sm transition-all duration-300',
        VARIANT_STYLES[variant],
        className,
      )}
    >
      {children}
    </span>
  );
}
