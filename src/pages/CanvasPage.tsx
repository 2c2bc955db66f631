import { useRef } from 'react';
import { toast } from 'sonner';
import { Download, Eraser, Upload } from 'lucide-react';
import { CanvasSectionCard } from '@/components/canvas/CanvasSectionCard';
import { GlassButton } from '@/components/ui/GlassButton';
import { GlassProgress } from '@/components/ui/GlassProgress';
import { useConfirm } from '@/hooks/useConfirm';
import { useCanvasStore, useSessionStores } from '@/hooks/useSession';
import { canvasCompletion, completedSections, exportCanvas } from '@/lib/canvas-rules';
import { CANVAS_SECTION_BY_KEY, CANVAS_SECTION_KEYS, type CanvasSectionConfig } from '@/lib/constants';
import { downloadJson } from '@/lib/download';
import { errorMessage } from '@/lib/errors';
import type { CanvasSaveOutcome } from '@/stores/canvas';
import type { CanvasSectionKey } from '@/types/canvas';

// Classic canvas layout on a 10-column grid
const GRID_CLASSES: Record<CanvasSectionKey, string> = {
  keyPartners: 'lg:col-span-2 lg:row-span-2',
  keyActivities: 'lg:col-span-2',
  keyResources: 'lg:col-span-2',
  valuePropositions: 'lg:col-span-2 lg:row-span-2',
  customerRelationships: 'lg:col-span-2',
  channels: 'lg:col-span-2',
  customerSegments: 'lg:col-span-2 lg:row-span-2',
  costStructure: 'lg:col-span-5',
  revenueStreams: 'lg:col-span-5',
};

const LAYOUT_ORDER: CanvasSectionKey[] = [
  'keyPartners',
  'keyActivities',
  'valuePropositions',
  'customerRelationships',
  'customerSegments',
  'keyResources',
  'channels',
  'costStructure',
  'revenueStreams',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reportSave(outcome: CanvasSaveOutcome, success: string) {
  if (outcome.type === 'failed') toast.error(outcome.error.message);
  else toast.success(success);
}

export function CanvasPage() {
  const { canvas } = useSessionStores();
  const confirm = useConfirm();
  const sections = useCanvasStore((s) => s.sections);
  const saving = useCanvasStore((s) => s.saving);
  const importRef = useRef<HTMLInputElement>(null);

  const completed = completedSections(sections);

  async function handleImport(file: File) {
    let data: unknown;
    try {
      data = JSON.parse(await file.text());
    } catch (err) {
      toast.error(`Could not read ${file.name}: ${errorMessage(err)}`);
      return;
    }
    if (!isRecord(data)) {
      toast.error(`${file.name} is not a canvas export`);
      return;
    }
    reportSave(await canvas.getState().importCanvas(data), 'Canvas imported');
  }

  async function handleClear() {
    const accepted = await confirm({
      title: 'Clear Canvas',
      message: 'This empties all nine sections. Continue?',
      confirmLabel: 'Clear',
      variant: 'danger',
    });
    if (accepted) reportSave(await canvas.getState().clearAll(), 'Canvas cleared');
  }

  const cards: CanvasSectionConfig[] = LAYOUT_ORDER.map((key) => CANVAS_SECTION_BY_KEY[key]);

  return (
    <div className="mx-auto max-w-[1600px] space-y-6">
      <div className="flex items-end justify-between">
        <div className="space-y-1">
          <h1 className="text-3xl font-bold tracking-tight text-text-primary">Business Model Canvas</h1>
          <p className="text-sm text-text-secondary">
            {completed} of {CANVAS_SECTION_KEYS.length} sections complete
            {saving ? ' · saving...' : ''}
          </p>
        </div>
        <div className="flex gap-2">
          <input
            ref={importRef}
            type="file"
            accept=".json"
            hidden
            onChange={(e) => {
              const file = e.target.files?.[0];
              e.target.value = '';
              if (file) void handleImport(file);
            }}
          />
          <GlassButton variant="ghost" onClick={() => importRef.current?.click()}>
            <Upload size={12} className="inline mr-1" />
            Import
          </GlassButton>
          <GlassButton variant="ghost" onClick={() => downloadJson('business-model-canvas.json', exportCanvas(sections))}>
            <Download size={12} className="inline mr-1" />
            Export
          </GlassButton>
          <GlassButton variant="danger" onClick={() => void handleClear()} disabled={completed === 0}>
            <Eraser size={12} className="inline mr-1" />
            Clear
          </GlassButton>
        </div>
      </div>

      <GlassProgress value={canvasCompletion(sections) * 100} label="Canvas completion" />

      <div className="grid grid-cols-1 gap-4 lg:grid-cols-10">
        {cards.map((section) => (
          <CanvasSectionCard
            key={section.key}
            section={section}
            value={sections[section.key]}
            className={GRID_CLASSES[section.key]}
            onChange={(value) => canvas.getState().updateSection(section.key, value)}
          />
        ))}
      </div>
    </div>
  );
}
