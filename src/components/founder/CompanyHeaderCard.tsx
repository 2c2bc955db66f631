import { Building2, MapPin, Briefcase } from 'lucide-react';
import { GlassProgress } from '@/components/ui/GlassProgress';
import type { DashboardSummary } from '@/lib/dashboard';

interface CompanyHeaderCardProps {
  company: DashboardSummary['company'];
  profileCompletion: number;
}

export function CompanyHeaderCard({ company, profileCompletion }: CompanyHeaderCardProps) {
  return (
    <div className="rounded-2xl border border-white/[0.08] bg-gradient-to-br from-brand/[0.08] to-transparent p-6 backdrop-blur-xl">
      <div className="flex items-center gap-5">
        {company.avatarUrl ? (
          <img src={company.avatarUrl} alt="" className="h-16 w-16 rounded-2xl object-cover" />
        ) : (
          <div className="flex h-16 w-16 items-center justify-center rounded-2xl bg-brand/15">
            <Building2 className="h-8 w-8 text-brand" />
          </div>
        )}

        <div className="min-w-0 flex-1">
          <h2 className="truncate text-2xl font-bold text-text-primary">{company.name}</h2>
          <p className="truncate text-sm text-text-secondary">{company.tagline}</p>
          <div className="mt-2 flex flex-wrap gap-4 text-xs text-text-muted">
            <span className="inline-flex items-center gap-1">
              <Briefcase size={12} /> {company.industry}
            </span>
            <span className="inline-flex items-center gap-1">
              <MapPin size={12} /> {company.region}
            </span>
          </div>
        </div>
      </div>

      <div className="mt-5 space-y-1.5">
        <div className="flex justify-between text-[11px] text-text-secondary">
          <span>Profile completion</span>
          <span className="font-mono">{profileCompletion}%</span>
        </div>
        <GlassProgress value={profileCompletion} label="Profile completion" />
      </div>
    </div>
  );
}
