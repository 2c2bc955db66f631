import type { CANVAS_SECTION_KEYS } from '@/lib/constants';

export type CanvasSectionKey = (typeof CANVAS_SECTION_KEYS)[number];

export type CanvasSections = Record<CanvasSectionKey, string>;

export interface CanvasExport extends CanvasSections {
  completionPercentage: number;
  exportedAt: string;
}
