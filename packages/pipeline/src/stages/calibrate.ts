/**
 * CALIBRATE Stage
 *
 * Input: Manifest axis definitions
 * Output: AxisAnchors (positive/negative unit vectors per axis)
 *
 * Runs once at startup. One embedding call per axis per polarity.
 * Axes without a usable positive definition are skipped and take no bit
 * position in the composed key.
 */

import type {
  AxisAnchor,
  AxisAnchors,
  AxisDefinition,
  AxisKey,
  Embedding,
  EmbeddingProvider,
  GroundingContext,
  Manifest,
} from '@hexgate/core';
import {
  AXIS_KEYS,
  CalibrationError,
  DegenerateVectorError,
  embedUnit,
  resolvePositiveText,
} from '@hexgate/core';

export interface CalibrateOutput {
  anchors: AxisAnchors;
  skipped: AxisKey[];
}

export async function calibrate(
  manifest: Manifest,
  provider: EmbeddingProvider,
  context: GroundingContext
): Promise<CalibrateOutput> {
  const { logger } = context;
  const anchors = new Map<AxisKey, AxisAnchor>();
  const skipped: AxisKey[] = [];

  logger.info('[Calibrator] Calibrating differential probes...');

  for (const axis of AXIS_KEYS) {
    const definition = manifest.dimensions[axis];
    const positiveText = resolvePositiveText(definition);

    if (!definition || positiveText === undefined) {
      logger.warn(`[Calibrator] Probe ${axis} skipped: no positive definition`);
      skipped.push(axis);
      continue;
    }

    const negativeText = resolveNegativeText(axis, definition, positiveText, context);

    const positive = await embedAnchor(provider, positiveText, axis, 'positive');
    const negative = await embedAnchor(provider, negativeText, axis, 'negative');

    anchors.set(axis, Object.freeze({
      axis,
      name: definition.name,
      positive,
      negative,
      positiveText,
      negativeText,
    }));
    logger.info(`[Calibrator] Probe ${axis} calibrated`);
  }

  if (anchors.size === 0) {
    throw new CalibrationError('No axis could be calibrated: every definition is missing');
  }

  return { anchors, skipped };
}

/**
 * Manifest `neg_def`, then the context's negative-anchor table, then
 * "Lack of <positive>".
 */
export function resolveNegativeText(
  axis: AxisKey,
  definition: AxisDefinition,
  positiveText: string,
  context: GroundingContext
): string {
  if (definition.neg_def !== undefined && definition.neg_def.trim().length > 0) {
    return definition.neg_def;
  }
  return context.negativeAnchors[axis] ?? `Lack of ${positiveText}`;
}

async function embedAnchor(
  provider: EmbeddingProvider,
  text: string,
  axis: AxisKey,
  polarity: 'positive' | 'negative'
): Promise<Embedding> {
  try {
    return await embedUnit(provider, text);
  } catch (error) {
    if (error instanceof DegenerateVectorError) {
      throw new CalibrationError(`Probe ${axis} ${polarity} anchor has zero norm`, { cause: error });
    }
    throw error;
  }
}
