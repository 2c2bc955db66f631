// =============================================================================
// Storage Buckets & File Limits
// =============================================================================

export const PITCH_DECK_BUCKET = 'pitch-deck-files';
export const AVATAR_BUCKET = 'avatars';

export const PITCH_DECK_MAX_BYTES = 100 * 1024 * 1024; // 100MB
export const AVATAR_MAX_BYTES = 5 * 1024 * 1024; // 5MB

export const DOCUMENT_EXTENSIONS = ['pdf'] as const;
export const VIDEO_EXTENSIONS = ['mp4', 'avi', 'mov', 'mkv', 'wmv'] as const;

export const PITCH_DECK_EXTENSIONS: readonly string[] = [
  ...DOCUMENT_EXTENSIONS,
  ...VIDEO_EXTENSIONS,
];

export const AVATAR_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'gif', 'webp'];

/** Extension → MIME type sent with every upload */
export const CONTENT_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  pdf: 'application/pdf',
  mp4: 'video/mp4',
  avi: 'video/x-msvideo',
  mov: 'video/quicktime',
  mkv: 'video/x-matroska',
  wmv: 'video/x-ms-wmv',
};

// =============================================================================
// Thumbnails
// =============================================================================

export const THUMBNAIL_MAX_WIDTH = 200;
/** 0–1, passed to canvas.toDataURL for extracted video frames */
export const THUMBNAIL_QUALITY = 0.75;

// =============================================================================
// Autosave
// =============================================================================

export const AUTOSAVE_DELAY_MS = 1000;

// =============================================================================
// Funding
// =============================================================================

export const FUNDING_PHASES = [
  'Idea',
  'Pre-Seed',
  'MVP',
  'Seed',
  'Product-Market Fit',
  'Early Growth',
  'Series A',
  'Series B',
  'Series C',
  'Series D+',
  'Scaling',
  'Late Stage',
  'Revenue-Generating',
  'IPO Ready',
  'Bridge',
] as const;

export const MIN_FUNDING_GOAL = 1000;

// =============================================================================
// Team
// =============================================================================

export const LEADERSHIP_ROLES = ['ceo', 'cto', 'cfo', 'co-founder', 'founder', 'president'];

/** Team size at which the team section counts as complete */
export const IDEAL_TEAM_SIZE = 3;

export const DEFAULT_AVATAR_URL = 'https://via.placeholder.com/150';

export const LINKEDIN_PROFILE_PATTERN =
  /^https?:\/\/(www\.)?linkedin\.com\/in\/[a-zA-Z0-9-]+\/?$/i;

// =============================================================================
// Business Model Canvas
// =============================================================================

export const CANVAS_SECTION_KEYS = [
  'keyPartners',
  'keyActivities',
  'keyResources',
  'valuePropositions',
  'customerRelationships',
  'channels',
  'customerSegments',
  'costStructure',
  'revenueStreams',
] as const;

export interface CanvasSectionConfig {
  key: (typeof CANVAS_SECTION_KEYS)[number];
  /** Column in business_model_canvas */
  column: string;
  label: string;
  prompt: string;
}

export const CANVAS_SECTION_BY_KEY: Record<(typeof CANVAS_SECTION_KEYS)[number], CanvasSectionConfig> = {
  keyPartners: {
    key: 'keyPartners',
    column: 'key_partners',
    label: 'Key Partners',
    prompt: 'Who are your key partners and suppliers? Which resources do you acquire from them?',
  },
  keyActivities: {
    key: 'keyActivities',
    column: 'key_activities',
    label: 'Key Activities',
    prompt: 'What key activities do your value propositions, channels and relationships require?',
  },
  keyResources: {
    key: 'keyResources',
    column: 'key_resources',
    label: 'Key Resources',
    prompt: 'What key resources do your value propositions require?',
  },
  valuePropositions: {
    key: 'valuePropositions',
    column: 'value_propositions',
    label: 'Value Propositions',
    prompt: 'What value do you deliver? Which customer problems are you solving?',
  },
  customerRelationships: {
    key: 'customerRelationships',
    column: 'customer_relationships',
    label: 'Customer Relationships',
    prompt: 'What type of relationship does each customer segment expect?',
  },
  channels: {
    key: 'channels',
    column: 'channels',
    label: 'Channels',
    prompt: 'Through which channels do your customer segments want to be reached?',
  },
  customerSegments: {
    key: 'customerSegments',
    column: 'customer_segments',
    label: 'Customer Segments',
    prompt: 'For whom are you creating value? Who are your most important customers?',
  },
  costStructure: {
    key: 'costStructure',
    column: 'cost_structure',
    label: 'Cost Structure',
    prompt: 'What are the most important costs inherent in your business model?',
  },
  revenueStreams: {
    key: 'revenueStreams',
    column: 'revenue_streams',
    label: 'Revenue Streams',
    prompt: 'For what value are your customers willing to pay? How do they pay today?',
  },
};

/** Canvas grid order */
export const CANVAS_SECTIONS: CanvasSectionConfig[] = CANVAS_SECTION_KEYS.map(
  (key) => CANVAS_SECTION_BY_KEY[key],
);
