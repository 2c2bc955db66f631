import type { SupabaseClient } from '@supabase/supabase-js';
import { CANVAS_SECTIONS } from '@/lib/constants';
import { emptyCanvas } from '@/lib/canvas-rules';
import { RepositoryError } from '@/lib/errors';
import type { BusinessModelCanvasRow } from '@/types/database';
import type { CanvasSections } from '@/types/canvas';

export interface CanvasRecord {
  id: string;
  sections: CanvasSections;
}

export interface CanvasRepository {
  load(userId: string): Promise<CanvasRecord | null>;
  /** Inserts the canvas row and returns its id. */
  create(sections: CanvasSections, completionPercentage: number): Promise<string>;
  /** Points users.bmc_id at the canvas. */
  link(userId: string, canvasId: string): Promise<void>;
  update(id: string, patch: Partial<CanvasSections>, completionPercentage: number): Promise<void>;
}

export function toCanvasSections(row: BusinessModelCanvasRow): CanvasSections {
  const sections = emptyCanvas();
  const source: Record<string, unknown> = { ...row };
  for (const { key, column } of CANVAS_SECTIONS) {
    const value = source[column];
    sections[key] = typeof value === 'string' ? value : '';
  }
  return sections;
}

export function toCanvasColumns(patch: Partial<CanvasSections>): Record<string, string> {
  const columns: Record<string, string> = {};
  for (const { key, column } of CANVAS_SECTIONS) {
    const value = patch[key];
    if (value !== undefined) columns[column] = value;
  }
  return columns;
}

export function createSupabaseCanvasRepository(client: SupabaseClient): CanvasRepository {
  return {
    async load(userId) {
      const { data: user, error: userError } = await client
        .from('users')
        .select('bmc_id')
        .eq('id', userId)
        .maybeSingle<{ bmc_id: string | null }>();

      if (userError) throw new RepositoryError(`Failed to load canvas link: ${userError.message}`);
      if (!user?.bmc_id) return null;

      const { data, error } = await client
        .from('business_model_canvas')
        .select('*')
        .eq('id', user.bmc_id)
        .maybeSingle<BusinessModelCanvasRow>();

      if (error) throw new RepositoryError(`Failed to load canvas: ${error.message}`);
      return data ? { id: data.id, sections: toCanvasSections(data) } : null;
    },

    async create(sections, completionPercentage) {
      const now = new Date().toISOString();
      const { data, error } = await client
        .from('business_model_canvas')
        .insert({
          ...toCanvasColumns(sections),
          completion_percentage: completionPercentage,
          created_at: now,
          updated_at: now,
        })
        .select('id')
        .single<{ id: string }>();

      if (error) throw new RepositoryError(`Failed to create canvas: ${error.message}`);
      return data.id;
    },

    async link(userId, canvasId) {
      const { error } = await client
        .from('users')
        .update({ bmc_id: canvasId, updated_at: new Date().toISOString() })
        .eq('id', userId);

      if (error) throw new RepositoryError(`Failed to link canvas: ${error.message}`);
    },

    async update(id, patch, completionPercentage) {
      const { error } = await client
        .from('business_model_canvas')
        .update({
          ...toCanvasColumns(patch),
          completion_percentage: completionPercentage,
          updated_at: new Date().toISOString(),
        })
        .eq('id', id);

      if (error) throw new RepositoryError(`Failed to save canvas: ${error.message}`);
    },
  };
}
