import { useRef } from 'react';
import { toast } from 'sonner';
import { Camera, Building2 } from 'lucide-react';
import { GlassButton } from '@/components/ui/GlassButton';
import { useProfileStore, useSessionStores } from '@/hooks/useSession';
import { AVATAR_EXTENSIONS } from '@/lib/constants';

export function AvatarUpload() {
  const { profile } = useSessionStores();
  const avatarUrl = useProfileStore((s) => s.fields.avatarUrl);
  const uploading = useProfileStore((s) => s.status === 'uploading');
  const inputRef = useRef<HTMLInputElement>(null);

  async function handleFile(file: File) {
    const outcome = await profile.getState().uploadAvatar(file);
    if (outcome.type === 'uploaded') toast.success('Profile image updated');
    if (outcome.type === 'failed') toast.error(outcome.error.message);
  }

  return (
    <div className="flex items-center gap-4">
      {avatarUrl ? (
        <img src={avatarUrl} alt="Company logo" className="h-20 w-20 rounded-2xl object-cover" />
      ) : (
        <div className="flex h-20 w-20 items-center justify-center rounded-2xl bg-brand/15">
          <Building2 className="h-9 w-9 text-brand" />
        </div>
      )}

      <input
        ref={inputRef}
        type="file"
        hidden
        accept={AVATAR_EXTENSIONS.map((ext) => `.${ext}`).join(',')}
        onChange={(e) => {
          const file = e.target.files?.[0];
          e.target.value = '';
          if (file) void handleFile(file);
        }}
      />
      <GlassButton
        variant="ghost"
        onClick={() => inputRef.current?.click()}
        loading={uploading ? 'Uploading...' : undefined}
      >
        <Camera size={12} className="inline mr-1" />
        {avatarUrl ? 'Change image' : 'Upload image'}
      </GlassButton>
    </div>
  );
}
