/**
 * MEASURE Stage
 *
 * Input: text + calibrated anchors
 * Output: MeasurementResult (bits, key, per-axis readings)
 *
 * Differential score per axis: cos(text, positive) - cos(text, negative).
 * The key is the bit vector reversed, so the last enumerated axis is the
 * leftmost character.
 */

import type {
  AxisAnchors,
  AxisReading,
  Bit,
  Embedding,
  EmbeddingProvider,
  GroundingContext,
  MeasurementResult,
} from '@hexgate/core';
import {
  AXIS_KEYS,
  DegenerateVectorError,
  EmbeddingProviderError,
  HYSTERESIS_THRESHOLD,
  cosineSimilarity,
  embedUnit,
} from '@hexgate/core';

export function toBit(diff: number): Bit {
  return diff > HYSTERESIS_THRESHOLD ? 1 : 0;
}

export function composeKey(bits: readonly Bit[]): string {
  return [...bits].reverse().join('');
}

export function formatReadings(readings: readonly AxisReading[]): string {
  return readings
    .map((r) => `${r.name}:${r.diff >= 0 ? '+' : ''}${r.diff.toFixed(2)}[${r.bit}]`)
    .join(' | ');
}

export function readAxes(vector: Embedding, anchors: AxisAnchors): AxisReading[] {
  const readings: AxisReading[] = [];

  for (const axis of AXIS_KEYS) {
    const anchor = anchors.get(axis);
    if (!anchor) continue;

    const simPos = cosineSimilarity(vector, anchor.positive);
    const simNeg = cosineSimilarity(vector, anchor.negative);
    const diff = simPos - simNeg;

    readings.push({ axis, name: anchor.name, simPos, simNeg, diff, bit: toBit(diff) });
  }

  return readings;
}

export async function measure(
  text: string,
  anchors: AxisAnchors,
  provider: EmbeddingProvider,
  context: GroundingContext
): Promise<MeasurementResult> {
  let vector: Embedding;
  try {
    vector = await embedUnit(provider, text);
  } catch (error) {
    if (error instanceof DegenerateVectorError) {
      throw new EmbeddingProviderError('Embedding of input text has zero norm', { cause: error });
    }
    throw error;
  }

  const readings = readAxes(vector, anchors);
  const bits = readings.map((r) => r.bit);
  const key = composeKey(bits);

  context.logger.debug(`[Classifier] Input: '${text.slice(0, 20)}...'`);
  context.logger.debug(`[Classifier] ${formatReadings(readings)}`);
  context.logger.debug(`[Classifier] Collapsed to ${key}`);

  return { bits, key, readings };
}
