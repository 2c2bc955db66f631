export type FileIcon = 'document' | 'video' | 'unknown';

/** Preview shown in place of a file in list displays */
export type Thumbnail =
  | { kind: 'document'; imageUrl: string }
  | { kind: 'video'; imageUrl: string }
  | { kind: 'icon'; icon: FileIcon };

export type ThumbnailResult =
  | { ok: true; thumbnail: Thumbnail }
  | { ok: false; reason: string };

export interface RemoteObject {
  /** Object path inside the pitch-deck-files bucket */
  storagePath: string;
  url: string;
}

/**
 * One file in the pitch deck, paired with its preview.
 * `file` is null for entries restored from a stored record.
 */
export interface PitchDeckEntry {
  id: string;
  fileName: string;
  /** Lower-cased, no leading dot */
  extension: string;
  sizeBytes: number | null;
  file: File | null;
  remote: RemoteObject | null;
  thumbnail: Thumbnail;
}

export type SubmissionState =
  | { isSubmitted: false; submittedAt: null }
  | { isSubmitted: true; submittedAt: string };

export type WorkflowStatus =
  | 'idle'
  | 'loading'
  | 'selecting'
  | 'staging'
  | 'removing'
  | 'submitting';

export interface RejectedFile {
  fileName: string;
  reason: string;
}

export interface UploadedPitchDeck {
  objects: RemoteObject[];
  originalNames: string[];
}
