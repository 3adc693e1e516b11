/**
 * Core types for the grounding gate
 */

import { z } from 'zod';

// =============================================================================
// Axes
// =============================================================================

/** Fixed enumeration order; the last key is the most significant key character. */
export const AXIS_KEYS = ['q0', 'q1', 'q2', 'q3', 'q4', 'q5'] as const;

export type AxisKey = (typeof AXIS_KEYS)[number];

export const AxisKeySchema = z.enum(AXIS_KEYS);

export const AxisDefinitionSchema = z.object({
  name: z.string().min(1),
  pos_def: z.string().optional(),
  vector_def: z.string().optional(),  // Legacy positive definition
  neg_def: z.string().optional(),
});

export type AxisDefinition = z.infer<typeof AxisDefinitionSchema>;

// =============================================================================
// States
// =============================================================================

export const StateKeySchema = z.string().regex(/^[01]+$/, 'State key must be a bit string');

export const StateEntrySchema = z.object({
  u: z.string(),        // Display glyph
  name: z.string().min(1),
  vector: z.string(),   // Physics description
  audit: z.string(),
});

export type StateEntry = z.infer<typeof StateEntrySchema>;

export type StateTable = Readonly<Record<string, Readonly<StateEntry>>>;

// =============================================================================
// Manifest
// =============================================================================

export const ManifestSchema = z
  .object({
    dimensions: z.record(AxisKeySchema, AxisDefinitionSchema),
    states: z.record(StateKeySchema, StateEntrySchema),
  })
  .superRefine((manifest, ctx) => {
    const lengths = new Set(Object.keys(manifest.states).map((key) => key.length));
    if (lengths.size > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['states'],
        message: `State keys must share one length, found ${[...lengths].sort().join(', ')}`,
      });
    }
  });

export type Manifest = z.infer<typeof ManifestSchema>;

// =============================================================================
// Neural Types
// =============================================================================

export interface Embedding {
  vector: Float32Array;
  dimension: number;
  model: string;
  timestamp: number;
}

export interface AxisAnchor {
  readonly axis: AxisKey;
  readonly name: string;
  readonly positive: Embedding;
  readonly negative: Embedding;
  readonly positiveText: string;
  readonly negativeText: string;
}

export type AxisAnchors = ReadonlyMap<AxisKey, AxisAnchor>;

// =============================================================================
// Measurement & Grounding
// =============================================================================

export type Bit = 0 | 1;

export interface AxisReading {
  axis: AxisKey;
  name: string;
  simPos: number;
  simNeg: number;
  diff: number;
  bit: Bit;
}

export interface MeasurementResult {
  /** Bits in axis enumeration order */
  bits: Bit[];
  /** Bits reversed and concatenated */
  key: string;
  readings: AxisReading[];
}

export type GroundingStatus = 'GROUNDED' | 'FALLBACK';

export interface GroundedState {
  status: GroundingStatus;
  key: string;
  glyph: string;
  name: string;
  physics: string;
  audit: string;
}
