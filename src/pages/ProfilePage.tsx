import { useEffect, useState } from 'react';
import { toast } from 'sonner';
import { AvatarUpload } from '@/components/profile/AvatarUpload';
import { ProfileTextField } from '@/components/profile/ProfileTextField';
import { GlassButton } from '@/components/ui/GlassButton';
import { GlassProgress } from '@/components/ui/GlassProgress';
import { useProfileStore, useSessionStores } from '@/hooks/useSession';
import { FUNDING_PHASES } from '@/lib/constants';
import { formatDollars } from '@/lib/format';
import { fundingCompletion, overviewCompletion, parseFundingGoal, validateProfileField } from '@/lib/profile-rules';
import { isFundingPhase } from '@/lib/repositories/profile';
import type { EditableProfileField } from '@/types/profile';

type TextField = Exclude<EditableProfileField, 'fundingGoal' | 'fundingPhase'>;

const TEXT_FIELDS: { field: TextField; label: string; placeholder: string; multiline?: boolean }[] = [
  { field: 'companyName', label: 'Company name', placeholder: 'Acme Robotics' },
  { field: 'tagline', label: 'Tagline', placeholder: 'One sentence on what you do' },
  { field: 'industry', label: 'Industry', placeholder: 'e.g. Fintech' },
  { field: 'region', label: 'Region', placeholder: 'e.g. Southeast Asia' },
  {
    field: 'ideaDescription',
    label: 'Startup idea',
    placeholder: 'The problem, your solution and who it is for',
    multiline: true,
  },
];

export function ProfilePage() {
  const { profile } = useSessionStores();
  const fields = useProfileStore((s) => s.fields);
  const dirty = useProfileStore((s) => s.dirty);
  const saving = useProfileStore((s) => s.saving);
  const lastSavedAt = useProfileStore((s) => s.lastSavedAt);
  const [touched, setTouched] = useState<EditableProfileField[]>([]);
  const [goalText, setGoalText] = useState(() => (fields.fundingGoal === null ? '' : String(fields.fundingGoal)));

  // Picks up the stored goal once the profile finishes loading
  const storedGoal = fields.fundingGoal;
  useEffect(() => {
    if (storedGoal === null) return;
    setGoalText((text) => (parseFundingGoal(text) === storedGoal ? text : String(storedGoal)));
  }, [storedGoal]);

  const touch = (field: EditableProfileField) =>
    setTouched((t) => (t.includes(field) ? t : [...t, field]));

  const errorFor = (field: EditableProfileField, value: string) =>
    touched.includes(field) ? validateProfileField(field, value) : null;

  async function handleSaveAll() {
    const outcome = await profile.getState().saveAll();
    if (outcome.type === 'failed') toast.error(outcome.error.message);
    else toast.success('Profile saved');
  }

  const overview = Math.round(overviewCompletion(fields) * 100);
  const funding = Math.round(fundingCompletion(fields) * 100);
  const parsedGoal = parseFundingGoal(goalText);

  return (
    <div className="mx-auto max-w-3xl space-y-6">
      <div className="flex items-end justify-between">
        <div className="space-y-1">
          <h1 className="text-3xl font-bold tracking-tight text-text-primary">Company Profile</h1>
          <p className="text-xs text-text-muted">
            {saving ? 'Saving...' : lastSavedAt ? 'All changes saved' : 'Changes save automatically'}
          </p>
        </div>
        <GlassButton onClick={() => void handleSaveAll()} disabled={dirty.length === 0 || saving}>
          Save now
        </GlassButton>
      </div>

      <section className="p-6 rounded-2xl border border-white/[0.08] bg-white/[0.02] backdrop-blur-xl space-y-4">
        <div className="flex items-center justify-between gap-4">
          <h2 className="text-sm font-semibold text-text-primary">Overview</h2>
          <GlassProgress value={overview} label="Overview completion" className="w-40" />
        </div>
        <AvatarUpload />
        {TEXT_FIELDS.map(({ field, label, placeholder, multiline }) => (
          <ProfileTextField
            key={field}
            id={field}
            label={label}
            placeholder={placeholder}
            multiline={multiline}
            value={fields[field]}
            error={errorFor(field, fields[field])}
            onChange={(value) => {
              touch(field);
              profile.getState().updateField(field, value);
            }}
          />
        ))}
      </section>

      <section className="p-6 rounded-2xl border border-white/[0.08] bg-white/[0.02] backdrop-blur-xl space-y-4">
        <div className="flex items-center justify-between gap-4">
          <h2 className="text-sm font-semibold text-text-primary">Funding</h2>
          <GlassProgress value={funding} label="Funding completion" className="w-40" />
        </div>

        <ProfileTextField
          id="fundingGoal"
          label={parsedGoal === null ? 'Funding goal (USD)' : `Funding goal (${formatDollars(parsedGoal)})`}
          placeholder="500,000"
          inputMode="numeric"
          value={goalText}
          error={errorFor('fundingGoal', goalText)}
          onChange={(text) => {
            touch('fundingGoal');
            setGoalText(text);
            if (validateProfileField('fundingGoal', text) === null) {
              profile.getState().updateField('fundingGoal', parseFundingGoal(text));
            }
          }}
        />

        <div>
          <label htmlFor="fundingPhase" className="block text-sm font-medium text-text-secondary mb-1.5">
            Funding phase
          </label>
          <select
            id="fundingPhase"
            value={fields.fundingPhase ?? ''}
            onChange={(e) => {
              const value = e.target.value;
              if (isFundingPhase(value)) profile.getState().updateField('fundingPhase', value);
            }}
            className="w-full px-3 py-2 rounded-lg bg-crystal-elevated border border-white/[0.08] text-text-primary text-sm focus:outline-none focus:border-brand/50"
          >
            <option value="" disabled>
              Select a phase
            </option>
            {FUNDING_PHASES.map((phase) => (
              <option key={phase} value={phase}>
                {phase}
              </option>
            ))}
          </select>
        </div>
      </section>
    </div>
  );
}
