import { FileQuestion, FileText, Film, type LucideIcon } from 'lucide-react';
import { cn } from '@/lib/cn';
import type { FileIcon, Thumbnail } from '@/types/pitch-deck';

const ICONS: Record<FileIcon, LucideIcon> = {
  document: FileText,
  video: Film,
  unknown: FileQuestion,
};

interface PitchDeckThumbnailProps {
  thumbnail: Thumbnail;
  alt: string;
  className?: string;
}

export function PitchDeckThumbnail({ thumbnail, alt, className }: PitchDeckThumbnailProps) {
  if (thumbnail.kind === 'icon') {
    const Icon = ICONS[thumbnail.icon];
    return (
      <div
        className={cn('flex items-center justify-center bg-white/[0.03]', className)}
        data-thumbnail="icon"
      >
        <Icon size={32} className="text-brand" aria-label={alt} />
      </div>
    );
  }

  return (
    <div className={cn('relative overflow-hidden bg-black/40', className)} data-thumbnail={thumbnail.kind}>
      <img src={thumbnail.imageUrl} alt={alt} className="h-full w-full object-cover" />
      {thumbnail.kind === 'video' && (
        <Film size={14} className="absolute bottom-1.5 right-1.5 text-white/80" aria-hidden />
      )}
    </div>
  );
}
