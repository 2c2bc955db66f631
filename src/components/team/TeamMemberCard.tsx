import { Linkedin, Pencil, Trash2 } from 'lucide-react';
import { GlassBadge } from '@/components/ui/GlassBadge';
import { isLeadershipRole } from '@/lib/team-rules';
import type { TeamMember } from '@/types/team';

interface TeamMemberCardProps {
  member: TeamMember;
  onEdit: () => void;
  onRemove: () => void;
}

export function TeamMemberCard({ member, onEdit, onRemove }: TeamMemberCardProps) {
  return (
    <div className="flex items-center gap-4 px-5 py-3">
      <img src={member.avatarUrl} alt="" className="h-10 w-10 rounded-full object-cover" />

      <div className="min-w-0 flex-1">
        <div className="flex items-center gap-2">
          <span className="truncate text-sm font-medium text-text-primary">{member.name}</span>
          {isLeadershipRole(member.role) && <GlassBadge variant="submitted">Leadership</GlassBadge>}
        </div>
        <span className="text-xs text-text-secondary">{member.role}</span>
      </div>

      {member.linkedinUrl && (
        <a
          href={member.linkedinUrl}
          target="_blank"
          rel="noreferrer"
          className="p-1.5 text-text-muted hover:text-brand"
          aria-label={`${member.name} on LinkedIn`}
        >
          <Linkedin size={16} />
        </a>
      )}
      <button onClick={onEdit} className="p-1.5 text-text-muted hover:text-text-primary" aria-label={`Edit ${member.name}`}>
        <Pencil size={16} />
      </button>
      <button onClick={onRemove} className="p-1.5 text-text-muted hover:text-status-failed" aria-label={`Remove ${member.name}`}>
        <Trash2 size={16} />
      </button>
    </div>
  );
}
