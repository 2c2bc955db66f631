/**
 * Database Table Type Definitions
 *
 * Row shapes for the tables the founder console reads and writes:
 * - startup_profiles
 * - pitch_decks
 * - team_members
 * - business_model_canvas (linked through users.bmc_id)
 */

// ---------------------------------------------------------------------------
// Startup Profiles
// ---------------------------------------------------------------------------

export interface StartupProfileRow {
  startup_id: string;
  company_name: string | null;
  tagline: string | null;
  industry: string | null;
  region: string | null;
  idea_description: string | null;
  funding_goal: number | null;
  funding_stage: string | null;
  avatar_url: string | null;
  updated_at: string | null;
}

// ---------------------------------------------------------------------------
// Pitch Decks
// ---------------------------------------------------------------------------

export interface PitchDeckRow {
  id: string;
  user_id: string;
  /** Public URLs, index-aligned with file_names */
  file_urls: string[] | null;
  /** Storage object paths inside the pitch-deck-files bucket */
  file_names: string[] | null;
  /** Names the files had on the founder's device */
  original_names: string[] | null;
  file_count: number | null;
  is_submitted: boolean | null;
  submission_date: string | null;
  created_at: string | null;
  updated_at: string | null;
}

// ---------------------------------------------------------------------------
// Team Members
// ---------------------------------------------------------------------------

export interface TeamMemberRow {
  id: string;
  user_id: string;
  name: string;
  role: string;
  linkedin_url: string | null;
  avatar_url: string | null;
  created_at: string;
  updated_at: string | null;
}

// ---------------------------------------------------------------------------
// Business Model Canvas
// ---------------------------------------------------------------------------

export interface BusinessModelCanvasRow {
  id: string;
  key_partners: string | null;
  key_activities: string | null;
  key_resources: string | null;
  value_propositions: string | null;
  customer_relationships: string | null;
  channels: string | null;
  customer_segments: string | null;
  cost_structure: string | null;
  revenue_streams: string | null;
  completion_percentage: number | null;
  created_at: string | null;
  updated_at: string | null;
}
