import { useRef, useState } from 'react';
import { toast } from 'sonner';
import { Download, Upload } from 'lucide-react';
import { TeamMemberCard } from '@/components/team/TeamMemberCard';
import { TeamMemberForm } from '@/components/team/TeamMemberForm';
import { GlassButton } from '@/components/ui/GlassButton';
import { GlassProgress } from '@/components/ui/GlassProgress';
import { useSessionStores, useTeamStore } from '@/hooks/useSession';
import { downloadJson } from '@/lib/download';
import { errorMessage } from '@/lib/errors';
import { exportTeam, parseTeamImport, summarizeTeam, teamCompletion } from '@/lib/team-rules';
import type { MemberOutcome } from '@/stores/team';
import type { TeamMemberErrors } from '@/lib/team-rules';
import type { TeamMemberInput } from '@/types/team';

/** Field errors for the form, or null once saved; failures become toasts. */
function formResult(outcome: MemberOutcome, success: string): TeamMemberErrors | null {
  switch (outcome.type) {
    case 'invalid':
      return outcome.errors;
    case 'failed':
      toast.error(outcome.error.message);
      return null;
    case 'not-found':
      toast.error('That team member no longer exists');
      return null;
    case 'saved':
      toast.success(success);
      return null;
  }
}

export function TeamPage() {
  const { team } = useSessionStores();
  const members = useTeamStore((s) => s.members);
  const loading = useTeamStore((s) => s.loading);
  const saving = useTeamStore((s) => s.saving);
  const [editingId, setEditingId] = useState<string | null>(null);
  const importRef = useRef<HTMLInputElement>(null);

  const summary = summarizeTeam(members);

  async function handleRemove(id: string) {
    const outcome = await team.getState().removeMember(id);
    if (outcome.type === 'removed') toast.success(`${outcome.member.name} removed`);
    if (outcome.type === 'failed') toast.error(outcome.error.message);
  }

  async function handleImport(file: File) {
    let inputs: TeamMemberInput[];
    try {
      inputs = parseTeamImport(await file.text());
    } catch (err) {
      toast.error(`Could not read ${file.name}: ${errorMessage(err)}`);
      return;
    }

    const outcome = await team.getState().importMembers(inputs);
    if (outcome.type === 'failed') {
      toast.error(outcome.error.message);
      return;
    }
    toast.success(`Imported ${outcome.added.length} member(s)`, {
      description: outcome.skipped.length
        ? outcome.skipped.map((s) => `Row ${s.index + 1}: ${s.reason}`).join('\n')
        : undefined,
    });
  }

  return (
    <div className="mx-auto max-w-4xl space-y-6">
      <div className="flex items-end justify-between">
        <div className="space-y-1">
          <h1 className="text-3xl font-bold tracking-tight text-text-primary">Team</h1>
          <p className="text-sm text-text-secondary">
            {summary.totalMembers} member(s), {summary.leadershipCount} in leadership
            {summary.hasFounder ? '' : '. Add your founders first.'}
          </p>
        </div>
        <div className="flex gap-2">
          <input
            ref={importRef}
            type="file"
            accept=".json"
            hidden
            onChange={(e) => {
              const file = e.target.files?.[0];
              e.target.value = '';
              if (file) void handleImport(file);
            }}
          />
          <GlassButton variant="ghost" onClick={() => importRef.current?.click()}>
            <Upload size={12} className="inline mr-1" />
            Import
          </GlassButton>
          <GlassButton
            variant="ghost"
            disabled={members.length === 0}
            onClick={() => downloadJson('team.json', exportTeam(members))}
          >
            <Download size={12} className="inline mr-1" />
            Export
          </GlassButton>
        </div>
      </div>

      <GlassProgress value={teamCompletion(members)} label="Team completion" />

      <section className="p-6 rounded-2xl border border-white/[0.08] bg-white/[0.02] backdrop-blur-xl">
        <h2 className="mb-4 text-sm font-semibold text-text-primary">Add team member</h2>
        <TeamMemberForm
          submitLabel="Add member"
          busy={saving && editingId === null}
          onSubmit={async (input) => formResult(await team.getState().addMember(input), `${input.name.trim()} added`)}
        />
      </section>

      <section className="rounded-2xl border border-white/[0.08] bg-white/[0.02] backdrop-blur-xl divide-y divide-white/[0.04]">
        {loading && <p className="px-5 py-4 text-xs text-text-muted">Loading team...</p>}
        {!loading && members.length === 0 && (
          <p className="px-5 py-4 text-xs text-text-muted">No team members yet.</p>
        )}
        {members.map((member) =>
          editingId === member.id ? (
            <div key={member.id} className="px-5 py-4">
              <TeamMemberForm
                initial={member}
                submitLabel="Save"
                busy={saving}
                onCancel={() => setEditingId(null)}
                onSubmit={async (input) => {
                  const errors = formResult(await team.getState().updateMember(member.id, input), 'Member updated');
                  if (!errors) setEditingId(null);
                  return errors;
                }}
              />
            </div>
          ) : (
            <TeamMemberCard
              key={member.id}
              member={member}
              onEdit={() => setEditingId(member.id)}
              onRemove={() => void handleRemove(member.id)}
            />
          ),
        )}
      </section>
    </div>
  );
}
