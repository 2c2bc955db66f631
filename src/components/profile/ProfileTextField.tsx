import { cn } from '@/lib/cn';

interface ProfileTextFieldProps {
  id: string;
  label: string;
  value: string;
  onChange: (value: string) => void;
  error: string | null;
  placeholder?: string;
  multiline?: boolean;
  inputMode?: 'text' | 'numeric';
}

const FIELD_CLASS =
  'w-full px-3 py-2 rounded-lg bg-white/[0.03] border text-text-primary placeholder-text-muted text-sm focus:outline-none transition-colors';

export function ProfileTextField({
  id,
  label,
  value,
  onChange,
  error,
  placeholder,
  multiline,
  inputMode,
}: ProfileTextFieldProps) {
  const className = cn(
    FIELD_CLASS,
    error ? 'border-status-failed/50' : 'border-white/[0.08] focus:border-brand/50',
  );

  return (
    <div>
      <label htmlFor={id} className="block text-sm font-medium text-text-secondary mb-1.5">
        {label}
      </label>
      {multiline ? (
        <textarea
          id={id}
          rows={5}
          value={value}
          onChange={(e) => onChange(e.target.value)}
          placeholder={placeholder}
          className={cn(className, 'resize-y')}
          aria-invalid={error !== null}
        />
      ) : (
        <input
          id={id}
          value={value}
          inputMode={inputMode}
          onChange={(e) => onChange(e.target.value)}
          placeholder={placeholder}
          className={className}
          aria-invalid={error !== null}
        />
      )}
      {error && <p className="mt-1 text-[11px] text-status-failed">{error}</p>}
    </div>
  );
}
