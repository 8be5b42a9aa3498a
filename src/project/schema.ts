import { z } from 'zod';

// Numeric strings ("90") count as a tempo.
const optionalTempo = z.coerce.number().positive().optional().catch(undefined);

export const ProjectSchema = z.object({
  id: z.string().min(1).optional(),
  meta: z.object({
    title: z.string().optional().catch(undefined),
    artist: z.string().optional().catch(undefined),
    bpm: optionalTempo,
    tempo: optionalTempo,
    timeSig: z.string().optional().catch(undefined),
  }).passthrough().optional(),
}).passthrough();

export type ProjectDocument = z.infer<typeof ProjectSchema>;

export interface ProjectSummary {
  id: string;
  displayName: string;
  artist: string;
}

export interface ProjectMetadata extends ProjectSummary {
  bpm?: number;
  timeSig?: string;
  sourcePath: string;
  document: ProjectDocument;
}
