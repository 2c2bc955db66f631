import { CheckCircle2 } from 'lucide-react';
import { cn } from '@/lib/cn';
import type { CanvasSectionConfig } from '@/lib/constants';

interface CanvasSectionCardProps {
  section: CanvasSectionConfig;
  value: string;
  onChange: (value: string) => void;
  className?: string;
}

export function CanvasSectionCard({ section, value, onChange, className }: CanvasSectionCardProps) {
  const done = value.trim().length > 0;

  return (
    <div
      className={cn(
        'flex flex-col rounded-2xl border bg-white/[0.02] p-4 backdrop-blur-xl',
        done ? 'border-status-stored/25' : 'border-white/[0.08]',
        className,
      )}
    >
      <div className="mb-2 flex items-center justify-between">
        <label htmlFor={`canvas-${section.key}`} className="text-xs font-semibold text-text-primary">
          {section.label}
        </label>
        {done && <CheckCircle2 size={14} className="text-status-stored" />}
      </div>
      <textarea
        id={`canvas-${section.key}`}
        value={value}
        onChange={(e) => onChange(e.target.value)}
        placeholder={section.prompt}
        className="min-h-[120px] flex-1 resize-none bg-transparent text-xs text-text-secondary placeholder-text-muted focus:outline-none"
      />
    </div>
  );
}
