export interface TeamMember {
  id: string;
  name: string;
  role: string;
  avatarUrl: string;
  /** Empty string when the member has no profile link */
  linkedinUrl: string;
  createdAt: string;
}

export interface TeamMemberInput {
  name: string;
  role: string;
  linkedinUrl?: string;
  avatarUrl?: string;
}

export interface TeamSummary {
  totalMembers: number;
  leadershipCount: number;
  roleDistribution: Record<string, number>;
  hasFounder: boolean;
}

export interface TeamExport {
  teamMembers: TeamMember[];
  teamCount: number;
  leadershipCount: number;
  exportedAt: string;
}
