import { createStore } from 'zustand/vanilla';
import { errorMessage } from '@/lib/errors';
import type { TeamRepository } from '@/lib/repositories/team';
import {
  hasErrors,
  isDuplicateName,
  normalizeMemberInput,
  validateMember,
  type TeamMemberErrors,
} from '@/lib/team-rules';
import type { Confirm } from '@/types/confirm';
import type { TeamMember, TeamMemberInput } from '@/types/team';

export const DUPLICATE_MEMBER_MESSAGE = 'A team member with this name already exists';

export type MemberOutcome =
  | { type: 'saved'; member: TeamMember }
  | { type: 'invalid'; errors: TeamMemberErrors }
  | { type: 'not-found' }
  | { type: 'failed'; error: Error };

export type RemoveMemberOutcome =
  | { type: 'removed'; member: TeamMember }
  | { type: 'cancelled' }
  | { type: 'not-found' }
  | { type: 'failed'; error: Error };

export interface SkippedImport {
  index: number;
  reason: string;
}

export type ImportOutcome =
  | { type: 'imported'; added: TeamMember[]; skipped: SkippedImport[] }
  | { type: 'failed'; error: Error };

export interface TeamDeps {
  userId: string;
  repository: TeamRepository;
  confirm: Confirm;
}

export interface TeamState {
  members: TeamMember[];
  loading: boolean;
  saving: boolean;
  error: string | null;

  load: () => Promise<void>;
  addMember: (input: TeamMemberInput) => Promise<MemberOutcome>;
  updateMember: (id: string, input: TeamMemberInput) => Promise<MemberOutcome>;
  removeMember: (id: string) => Promise<RemoveMemberOutcome>;
  importMembers: (inputs: TeamMemberInput[]) => Promise<ImportOutcome>;
}

function toError(err: unknown, fallback: string): Error {
  return err instanceof Error ? err : new Error(errorMessage(err, fallback));
}

function firstError(errors: TeamMemberErrors): string {
  return errors.name ?? errors.role ?? errors.linkedinUrl ?? 'Invalid team member';
}

export function createTeamStore(deps: TeamDeps) {
  return createStore<TeamState>()((set, get) => {
    /** Field errors plus the duplicate-name check against the current list */
    function check(input: TeamMemberInput, exceptId?: string): TeamMemberErrors | null {
      const errors = validateMember(input);
      if (!errors.name && isDuplicateName(get().members, input.name, exceptId)) {
        errors.name = DUPLICATE_MEMBER_MESSAGE;
      }
      return hasErrors(errors) ? errors : null;
    }

    async function mutate<T extends { type: string }>(
      action: () => Promise<T>,
      fallback: string,
    ): Promise<T | { type: 'failed'; error: Error }> {
      set({ saving: true, error: null });
      try {
        return await action();
      } catch (err) {
        const error = toError(err, fallback);
        console.error('[team]', error.message);
        set({ error: error.message });
        return { type: 'failed', error };
      } finally {
        set({ saving: false });
      }
    }

    return {
      members: [],
      loading: false,
      saving: false,
      error: null,

      load: async () => {
        set({ loading: true, error: null });
        try {
          const members = await deps.repository.list(deps.userId);
          set({ members });
        } catch (err) {
          const message = errorMessage(err, 'Failed to load team members');
          console.error('[team]', message);
          set({ error: message });
        } finally {
          set({ loading: false });
        }
      },

      addMember: async (raw) => {
        const input = normalizeMemberInput(raw);
        const errors = check(input);
        if (errors) return { type: 'invalid', errors };

        return mutate(async () => {
          const member = await deps.repository.insert(deps.userId, input);
          set((s) => ({ members: [member, ...s.members] }));
          return { type: 'saved', member } as const;
        }, 'Failed to add team member');
      },

      updateMember: async (id, raw) => {
        if (!get().members.some((m) => m.id === id)) return { type: 'not-found' };

        const input = normalizeMemberInput(raw);
        const errors = check(input, id);
        if (errors) return { type: 'invalid', errors };

        return mutate(async () => {
          const member = await deps.repository.update(id, {
            ...input,
            linkedinUrl: input.linkedinUrl ?? '',
          });
          set((s) => ({ members: s.members.map((m) => (m.id === id ? member : m)) }));
          return { type: 'saved', member } as const;
        }, 'Failed to update team member');
      },

      removeMember: async (id) => {
        const member = get().members.find((m) => m.id === id);
        if (!member) return { type: 'not-found' };

        const accepted = await deps.confirm({
          title: 'Remove Team Member',
          message: `Are you sure you want to remove ${member.name} from your team?`,
          confirmLabel: 'Remove',
          variant: 'danger',
        });
        if (!accepted) return { type: 'cancelled' };

        return mutate(async () => {
          await deps.repository.remove(id);
          set((s) => ({ members: s.members.filter((m) => m.id !== id) }));
          return { type: 'removed', member } as const;
        }, 'Failed to remove team member');
      },

      importMembers: async (inputs) => {
        const valid: TeamMemberInput[] = [];
        const skipped: SkippedImport[] = [];

        inputs.forEach((raw, index) => {
          const input = normalizeMemberInput(raw);
          const errors = validateMember(input);
          if (hasErrors(errors)) {
            skipped.push({ index, reason: firstError(errors) });
            return;
          }
          const taken = isDuplicateName(get().members, input.name) || valid.some(
            (v) => v.name.toLowerCase() === input.name.toLowerCase(),
          );
          if (taken) {
            skipped.push({ index, reason: DUPLICATE_MEMBER_MESSAGE });
            return;
          }
          valid.push(input);
        });

        return mutate(async () => {
          const added = await deps.repository.insertMany(deps.userId, valid);
          set((s) => ({ members: [...added, ...s.members] }));
          console.log('[team] Imported', added.length, 'member(s), skipped', skipped.length);
          return { type: 'imported', added, skipped } as const;
        }, 'Failed to import team data');
      },
    };
  });
}

export type TeamStore = ReturnType<typeof createTeamStore>;
