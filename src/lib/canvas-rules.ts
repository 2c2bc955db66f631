import { CANVAS_SECTION_KEYS } from './constants';
import type { CanvasExport, CanvasSections } from '@/types/canvas';

/** A section counts once its trimmed text is non-empty. */
export function completedSections(sections: CanvasSections): number {
  return CANVAS_SECTION_KEYS.filter((key) => sections[key].trim().length > 0).length;
}

/** 0–1 */
export function canvasCompletion(sections: CanvasSections): number {
  return completedSections(sections) / CANVAS_SECTION_KEYS.length;
}

export function isCanvasComplete(sections: CanvasSections): boolean {
  return completedSections(sections) === CANVAS_SECTION_KEYS.length;
}

/** Stored as a whole-number percentage in business_model_canvas.completion_percentage */
export function completionPercentage(sections: CanvasSections): number {
  return Math.round(canvasCompletion(sections) * 100);
}

export function emptyCanvas(): CanvasSections {
  return {
    keyPartners: '',
    keyActivities: '',
    keyResources: '',
    valuePropositions: '',
    customerRelationships: '',
    channels: '',
    customerSegments: '',
    costStructure: '',
    revenueStreams: '',
  };
}

/** Keys that are missing or not strings come back empty. */
export function canvasFromUnknown(data: Record<string, unknown>): CanvasSections {
  const sections = emptyCanvas();
  for (const key of CANVAS_SECTION_KEYS) {
    const value = data[key];
    if (typeof value === 'string') sections[key] = value;
  }
  return sections;
}

export function exportCanvas(sections: CanvasSections, now: Date = new Date()): CanvasExport {
  return {
    ...sections,
    completionPercentage: completionPercentage(sections),
    exportedAt: now.toISOString(),
  };
}
