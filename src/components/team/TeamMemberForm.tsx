import { useState, type FormEvent } from 'react';
import { GlassButton } from '@/components/ui/GlassButton';
import { ProfileTextField } from '@/components/profile/ProfileTextField';
import type { TeamMemberErrors } from '@/lib/team-rules';
import type { TeamMemberInput } from '@/types/team';

const NO_ERRORS: TeamMemberErrors = { name: null, role: null, linkedinUrl: null };

interface TeamMemberFormProps {
  initial?: TeamMemberInput;
  submitLabel: string;
  busy: boolean;
  /** Resolves the field errors to show; all null on success */
  onSubmit: (input: TeamMemberInput) => Promise<TeamMemberErrors | null>;
  onCancel?: () => void;
}

export function TeamMemberForm({ initial, submitLabel, busy, onSubmit, onCancel }: TeamMemberFormProps) {
  const [name, setName] = useState(initial?.name ?? '');
  const [role, setRole] = useState(initial?.role ?? '');
  const [linkedinUrl, setLinkedinUrl] = useState(initial?.linkedinUrl ?? '');
  const [errors, setErrors] = useState<TeamMemberErrors>(NO_ERRORS);

  async function handleSubmit(e: FormEvent) {
    e.preventDefault();
    const result = await onSubmit({ name, role, linkedinUrl });
    setErrors(result ?? NO_ERRORS);
    if (!result && !initial) {
      setName('');
      setRole('');
      setLinkedinUrl('');
    }
  }

  return (
    <form onSubmit={handleSubmit} className="grid grid-cols-1 gap-4 md:grid-cols-3">
      <ProfileTextField id="member-name" label="Name" value={name} onChange={setName} error={errors.name} />
      <ProfileTextField id="member-role" label="Role" value={role} onChange={setRole} error={errors.role} placeholder="CEO & Co-founder" />
      <ProfileTextField
        id="member-linkedin"
        label="LinkedIn (optional)"
        value={linkedinUrl}
        onChange={setLinkedinUrl}
        error={errors.linkedinUrl}
        placeholder="https://linkedin.com/in/..."
      />
      <div className="flex gap-2 md:col-span-3">
        <GlassButton type="submit" loading={busy ? 'Saving...' : undefined}>
          {submitLabel}
        </GlassButton>
        {onCancel && (
          <GlassButton type="button" variant="ghost" onClick={onCancel}>
            Cancel
          </GlassButton>
        )}
      </div>
    </form>
  );
}
