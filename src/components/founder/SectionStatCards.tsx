import { DollarSign, LayoutGrid, Presentation, Users, type LucideIcon } from 'lucide-react';
import { GlassBadge, type BadgeVariant } from '@/components/ui/GlassBadge';
import type { DashboardSummary, PitchDeckStatus } from '@/lib/dashboard';

const DECK_BADGES: Record<PitchDeckStatus, { variant: BadgeVariant; label: string }> = {
  empty: { variant: 'neutral', label: 'No files' },
  staged: { variant: 'staged', label: 'Not submitted' },
  submitted: { variant: 'submitted', label: 'Submitted' },
};

interface StatCardProps {
  label: string;
  value: string;
  detail: string;
  icon: LucideIcon;
  badge?: { variant: BadgeVariant; label: string };
}

function StatCard({ label, value, detail, icon: Icon, badge }: StatCardProps) {
  return (
    <div className="rounded-2xl border border-white/[0.08] bg-white/[0.02] p-5 backdrop-blur-xl">
      <div className="flex items-start justify-between">
        <div>
          <p className="text-[10px] uppercase tracking-widest text-text-muted font-medium">{label}</p>
          <p className="mt-1 text-2xl font-semibold text-text-primary">{value}</p>
        </div>
        <Icon size={20} className="text-text-muted" />
      </div>
      <div className="mt-3 flex items-center justify-between gap-2">
        <span className="text-xs text-text-secondary">{detail}</span>
        {badge && <GlassBadge variant={badge.variant}>{badge.label}</GlassBadge>}
      </div>
    </div>
  );
}

export function SectionStatCards({ summary }: { summary: DashboardSummary }) {
  const { funding, pitchDeck, team, canvas } = summary;

  return (
    <div className="grid grid-cols-1 gap-4 sm:grid-cols-2 lg:grid-cols-4">
      <StatCard label="Funding Goal" value={funding.goalLabel} detail={funding.phaseLabel} icon={DollarSign} />
      <StatCard
        label="Pitch Deck"
        value={String(pitchDeck.fileCount)}
        detail={`${pitchDeck.pendingCount} awaiting upload`}
        icon={Presentation}
        badge={DECK_BADGES[pitchDeck.status]}
      />
      <StatCard
        label="Team"
        value={String(team.count)}
        detail={`${team.leadershipCount} in leadership`}
        icon={Users}
        badge={team.hasFounder ? { variant: 'stored', label: 'Founder listed' } : undefined}
      />
      <StatCard
        label="Business Model"
        value={`${canvas.percent}%`}
        detail={`${canvas.completedSections} of ${canvas.totalSections} sections`}
        icon={LayoutGrid}
      />
    </div>
  );
}
