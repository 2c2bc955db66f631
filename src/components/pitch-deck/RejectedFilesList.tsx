import { AlertCircle } from 'lucide-react';
import type { RejectedFile } from '@/types/pitch-deck';

export function RejectedFilesList({ rejected }: { rejected: RejectedFile[] }) {
  if (rejected.length === 0) return null;

  return (
    <ul className="rounded-xl border border-status-failed/20 bg-status-failed/[0.04] px-4 py-3 space-y-1.5">
      {rejected.map((r) => (
        <li key={r.fileName} className="flex items-start gap-2 text-[11px]">
          <AlertCircle size={12} className="mt-0.5 flex-shrink-0 text-status-failed" />
          <span>
            <span className="font-mono text-text-primary">{r.fileName}</span>
            <span className="text-text-secondary">: {r.reason}</span>
          </span>
        </li>
      ))}
    </ul>
  );
}
