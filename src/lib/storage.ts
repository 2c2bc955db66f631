import { AVATAR_BUCKET, CONTENT_TYPES, PITCH_DECK_BUCKET } from './constants';
import { StorageError, errorMessage } from './errors';
import { avatarRules, getExtension, pitchDeckRules, type ValidationRules } from './file-validation';
import type { RemoteObject, UploadedPitchDeck } from '@/types/pitch-deck';

/**
 * The slice of a Supabase storage bucket this module needs.
 * `supabase.storage.from(name)` satisfies it.
 */
export interface StorageBucket {
  upload(
    path: string,
    file: File,
    options: { contentType: string; upsert: boolean },
  ): Promise<{ error: { message: string } | null }>;
  remove(paths: string[]): Promise<{ error: { message: string } | null }>;
  getPublicUrl(path: string): { data: { publicUrl: string } };
}

export type BucketResolver = (bucket: string) => StorageBucket;

export interface PitchDeckStorage {
  /**
   * Uploads every file in order. All-or-nothing: when one upload fails the
   * objects already written by this call are removed before rejecting.
   * Files are checked against `rules` (pitch deck rules by default) first.
   */
  uploadPitchDeckFiles(params: {
    files: File[];
    userId: string;
    pitchDeckId: string | null;
    rules?: ValidationRules;
  }): Promise<UploadedPitchDeck>;
  deletePitchDeckFiles(storagePaths: string[]): Promise<void>;
}

export interface AvatarStorage {
  /** Returns the public URL of the stored avatar. */
  uploadAvatar(params: { file: File; userId: string }): Promise<string>;
}

export function getContentType(extension: string): string {
  return CONTENT_TYPES[extension.toLowerCase()] ?? 'application/octet-stream';
}

export function buildPitchDeckPath(opts: {
  userId: string;
  pitchDeckId: string | null;
  index: number;
  extension: string;
  timestamp: number;
}): string {
  return `${opts.userId}/${opts.pitchDeckId ?? 'temp'}_${opts.index}_${opts.timestamp}.${opts.extension}`;
}

export function buildAvatarPath(opts: { userId: string; extension: string; timestamp: number }): string {
  return `${opts.userId}/avatar_${opts.timestamp}.${opts.extension}`;
}

export function createObjectStorage(
  bucket: BucketResolver,
  now: () => number = Date.now,
): PitchDeckStorage & AvatarStorage {
  async function removeQuietly(paths: string[]) {
    if (paths.length === 0) return;
    const { error } = await bucket(PITCH_DECK_BUCKET).remove(paths);
    if (error) {
      console.error('[storage] Rollback failed, orphaned objects:', paths, error.message);
    }
  }

  return {
    async uploadPitchDeckFiles({ files, userId, pitchDeckId, rules = pitchDeckRules }) {
      if (files.length === 0) {
        throw new StorageError('No files provided for upload');
      }

      const objects: RemoteObject[] = [];
      const originalNames: string[] = [];

      try {
        for (const [index, file] of files.entries()) {
          rules.validate(file);

          const extension = getExtension(file.name);
          const storagePath = buildPitchDeckPath({
            userId,
            pitchDeckId,
            index,
            extension,
            timestamp: now(),
          });

          const { error } = await bucket(PITCH_DECK_BUCKET).upload(storagePath, file, {
            contentType: getContentType(extension),
            upsert: true,
          });
          if (error) throw new StorageError(`${file.name}: ${error.message}`);

          const { data } = bucket(PITCH_DECK_BUCKET).getPublicUrl(storagePath);
          objects.push({ storagePath, url: data.publicUrl });
          originalNames.push(file.name);

          console.log('[storage] Pitch deck file uploaded:', storagePath);
        }
      } catch (err) {
        await removeQuietly(objects.map((o) => o.storagePath));
        throw new StorageError(`Failed to upload pitch deck files: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      return { objects, originalNames };
    },

    async deletePitchDeckFiles(storagePaths) {
      if (storagePaths.length === 0) return;

      const { error } = await bucket(PITCH_DECK_BUCKET).remove(storagePaths);
      if (error) {
        throw new StorageError(`Failed to delete pitch deck files: ${error.message}`);
      }
      console.log('[storage] Pitch deck files deleted:', storagePaths.length);
    },

    async uploadAvatar({ file, userId }) {
      try {
        avatarRules.validate(file);
      } catch (err) {
        throw new StorageError(`Failed to upload avatar: ${errorMessage(err)}`, { cause: err });
      }

      const extension = getExtension(file.name);
      const path = buildAvatarPath({ userId, extension, timestamp: now() });

      const { error } = await bucket(AVATAR_BUCKET).upload(path, file, {
        contentType: getContentType(extension),
        upsert: true,
      });
      if (error) {
        throw new StorageError(`Failed to upload avatar: ${error.message}`);
      }

      console.log('[storage] Avatar uploaded:', path);
      return bucket(AVATAR_BUCKET).getPublicUrl(path).data.publicUrl;
    },
  };
}
