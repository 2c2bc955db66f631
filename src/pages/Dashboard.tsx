import { CompanyHeaderCard } from '@/components/founder/CompanyHeaderCard';
import { QuickAccessTiles } from '@/components/founder/QuickAccessTiles';
import { SectionStatCards } from '@/components/founder/SectionStatCards';
import { useDashboardSummary } from '@/hooks/useDashboardSummary';

export function Dashboard() {
  const summary = useDashboardSummary();

  return (
    <div className="mx-auto max-w-[1600px] space-y-6">
      <div className="space-y-1">
        <h1 className="text-3xl font-bold tracking-tight text-text-primary">Dashboard</h1>
        <p className="text-sm text-text-secondary">Everything investors will see about your startup</p>
      </div>

      <CompanyHeaderCard company={summary.company} profileCompletion={summary.profileCompletion} />
      <SectionStatCards summary={summary} />
      <QuickAccessTiles />
    </div>
  );
}
