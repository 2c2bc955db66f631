import { useCallback, useRef, useState, type DragEvent, type ReactNode } from 'react';
import { Upload } from 'lucide-react';
import { cn } from '@/lib/cn';

interface PitchDeckDropZoneProps {
  disabled: boolean;
  onDrop: (files: File[]) => void;
  children: ReactNode;
}

/**
 * Drag target around the pitch deck panel. Counts enter/leave pairs so
 * crossing child elements does not flicker the overlay.
 */
export function PitchDeckDropZone({ disabled, onDrop, children }: PitchDeckDropZoneProps) {
  const [isDragging, setIsDragging] = useState(false);
  const dragCountRef = useRef(0);

  const handleDragEnter = useCallback(
    (e: DragEvent<HTMLDivElement>) => {
      e.preventDefault();
      if (disabled) return;
      dragCountRef.current++;
      if (dragCountRef.current === 1) setIsDragging(true);
    },
    [disabled],
  );

  const handleDragLeave = useCallback((e: DragEvent<HTMLDivElement>) => {
    e.preventDefault();
    dragCountRef.current = Math.max(0, dragCountRef.current - 1);
    if (dragCountRef.current === 0) setIsDragging(false);
  }, []);

  const handleDrop = useCallback(
    (e: DragEvent<HTMLDivElement>) => {
      e.preventDefault();
      dragCountRef.current = 0;
      setIsDragging(false);
      if (disabled) return;

      const files = Array.from(e.dataTransfer.files);
      if (files.length > 0) onDrop(files);
    },
    [disabled, onDrop],
  );

  return (
    <div
      className="relative"
      onDragEnter={handleDragEnter}
      onDragLeave={handleDragLeave}
      onDragOver={(e) => e.preventDefault()}
      onDrop={handleDrop}
    >
      {children}

      <div
        className={cn(
          'pointer-events-none absolute inset-0 flex flex-col items-center justify-center gap-3 rounded-2xl border-[3px] border-dashed border-brand/50 bg-black/70 backdrop-blur-sm transition-opacity',
          isDragging ? 'opacity-100' : 'opacity-0',
        )}
      >
        <Upload size={36} className="text-brand" />
        <p className="text-sm font-semibold text-text-primary">Release to add files</p>
      </div>
    </div>
  );
}
