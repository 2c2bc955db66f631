import { PitchDeckPanel } from '@/components/pitch-deck/PitchDeckPanel';

export function PitchDeckPage() {
  return (
    <div className="mx-auto max-w-5xl space-y-6">
      <div className="space-y-1">
        <h1 className="text-3xl font-bold tracking-tight text-text-primary">Pitch Deck</h1>
        <p className="text-sm text-text-secondary">
          Files stay on this device until you submit. After submission the deck is read-only.
        </p>
      </div>

      <PitchDeckPanel />
    </div>
  );
}
