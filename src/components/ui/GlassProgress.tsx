import { motion } from 'framer-motion';
import { cn } from '@/lib/cn';

interface GlassProgressProps {
  /** 0–100 */
  value: number;
  label?: string;
  className?: string;
}

/**
 * Completion bar with an animated fill.
 */
export function GlassProgress({ value, label, className }: GlassProgressProps) {
  const clamped = Math.max(0, Math.min(100, value));

  return (
    <div
      role="progressbar"
      aria-label={label}
      aria-valuemin={0}
      aria-valuemax={100}
      aria-valuenow={Math.round(clamped)}
      className={cn('h-2 rounded-full bg-white/5 overflow-hidden', className)}
    >
      <motion.div
        className="h-full rounded-full"
        style={{
          background: 'linear-gradient(90deg, #e69500, #ffc04d)',
          boxShadow: '0 0 8px rgba(255, 165, 0, 0.4)',
        }}
        initial={false}
        animate={{ width: `${clamped}%` }}
        transition={{ type: 'spring', stiffness: 120, damping: 20 }}
      />
    </div>
  );
}
