import { vi } from 'vitest';
import { AXIS_KEYS, parseManifest } from '@hexgate/core';
import type { Embedding, EmbeddingProvider, Logger, Manifest } from '@hexgate/core';

// Axis qi: positive anchor on e(2i), negative anchor on e(2i + 1). e(12) is
// orthogonal to every anchor.
export const DIMENSION = 13;

export function basis(index: number): number[] {
  const vector = new Array<number>(DIMENSION).fill(0);
  vector[index] = 1;
  return vector;
}

export function sum(...vectors: number[][]): number[] {
  const out = new Array<number>(DIMENSION).fill(0);
  for (const v of vectors) {
    for (let i = 0; i < DIMENSION; i++) out[i] += v[i];
  }
  return out;
}

export class TableProvider implements EmbeddingProvider {
  model = 'table';
  calls: string[] = [];

  constructor(private table: Map<string, number[]>) {}

  async embed(text: string): Promise<Embedding> {
    this.calls.push(text);
    const values = this.table.get(text);
    if (!values) {
      throw new Error(`No fixture vector for "${text}"`);
    }
    return { vector: Float32Array.from(values), dimension: values.length, model: this.model, timestamp: 0 };
  }
}

/** Returns the same vector for every text. */
export class ConstantProvider implements EmbeddingProvider {
  model = 'constant';
  calls: string[] = [];

  async embed(text: string): Promise<Embedding> {
    this.calls.push(text);
    return { vector: new Float32Array([1, 0]), dimension: 2, model: this.model, timestamp: 0 };
  }
}

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export const ALIGNED = 'everything is in order';
export const NEUTRAL = 'the sky is a colour';
export const FUNDED_BUT_AIMLESS = 'funded and able but purposeless';

export function fixtureTable(): Map<string, number[]> {
  const table = new Map<string, number[]>();
  AXIS_KEYS.forEach((axis, i) => {
    table.set(`positive ${axis}`, basis(2 * i));
    table.set(`negative ${axis}`, basis(2 * i + 1));
  });
  table.set(ALIGNED, sum(basis(0), basis(2), basis(4), basis(6), basis(8), basis(10)));
  table.set(NEUTRAL, basis(12));
  table.set(FUNDED_BUT_AIMLESS, sum(basis(0), basis(2), basis(11)));
  return table;
}

export function fixtureManifest(dimensionOverrides: Record<string, unknown> = {}): Manifest {
  const dimensions: Record<string, unknown> = {};
  for (const axis of AXIS_KEYS) {
    dimensions[axis] = { name: `Axis ${axis}`, pos_def: `positive ${axis}`, neg_def: `negative ${axis}` };
  }
  return parseManifest({
    dimensions: { ...dimensions, ...dimensionOverrides },
    states: {
      '111111': { u: '䷀', name: 'Qian/Creative', vector: 'Sustain momentum.', audit: 'Stable_Grounding' },
      '000011': { u: '䷋', name: 'Pi/Standstill', vector: 'Purpose is absent.', audit: 'Direction_Gap' },
    },
  });
}
