import type { SupabaseClient } from '@supabase/supabase-js';
import { browserFilePicker, type FilePicker } from './file-picker';
import { createSupabaseCanvasRepository, type CanvasRepository } from './repositories/canvas';
import { createSupabasePitchDeckRepository, type PitchDeckRepository } from './repositories/pitch-deck';
import { createSupabaseProfileRepository, type ProfileRepository } from './repositories/profile';
import { createSupabaseTeamRepository, type TeamRepository } from './repositories/team';
import { createObjectStorage, type AvatarStorage, type PitchDeckStorage } from './storage';
import { pdfRenderer, videoFrameExtractor } from './thumbnail-renderers';
import { createThumbnailer, type Thumbnailer } from './thumbnails';

/** Everything a signed-in session's stores talk to */
export interface SessionServices {
  picker: FilePicker;
  thumbnailer: Thumbnailer;
  storage: PitchDeckStorage & AvatarStorage;
  profiles: ProfileRepository;
  pitchDecks: PitchDeckRepository;
  team: TeamRepository;
  canvases: CanvasRepository;
}

export function createBrowserServices(client: SupabaseClient): SessionServices {
  return {
    picker: browserFilePicker,
    thumbnailer: createThumbnailer({ document: pdfRenderer, video: videoFrameExtractor }),
    storage: createObjectStorage((bucket) => client.storage.from(bucket)),
    profiles: createSupabaseProfileRepository(client),
    pitchDecks: createSupabasePitchDeckRepository(client),
    team: createSupabaseTeamRepository(client),
    canvases: createSupabaseCanvasRepository(client),
  };
}
