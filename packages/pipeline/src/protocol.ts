/**
 * GroundingProtocol - calibrated measurement and resolution
 *
 * Orchestrates the stages:
 * CALIBRATE (once) → MEASURE → RESOLVE (per text)
 *
 * Instances only exist after calibration has finished, so anything holding
 * one can ground text immediately. Anchors and the state table are frozen.
 */

import type {
  AxisAnchors,
  AxisKey,
  EmbeddingProvider,
  GroundedState,
  GroundingContext,
  Manifest,
  MeasurementResult,
  StateEntry,
  StateTable,
} from '@hexgate/core';
import { createContext, loadManifest, stateKeyLength } from '@hexgate/core';

import { calibrate } from './stages/calibrate.js';
import { measure } from './stages/measure.js';
import { resolve } from './stages/resolve.js';

export interface Inspection {
  measurement: MeasurementResult;
  state: GroundedState;
}

function freezeStates(states: Record<string, StateEntry>): StateTable {
  const table: Record<string, Readonly<StateEntry>> = {};
  for (const [key, entry] of Object.entries(states)) {
    table[key] = Object.freeze({ ...entry });
  }
  return Object.freeze(table);
}

export class GroundingProtocol {
  private constructor(
    private readonly anchors: AxisAnchors,
    private readonly states: StateTable,
    private readonly provider: EmbeddingProvider,
    private readonly context: GroundingContext,
    readonly skippedAxes: readonly AxisKey[]
  ) {}

  /**
   * Startup phase: build the anchors for `manifest`.
   */
  static async calibrate(
    manifest: Manifest,
    provider: EmbeddingProvider,
    overrides: Partial<GroundingContext> = {}
  ): Promise<GroundingProtocol> {
    const context = createContext(overrides);
    const { anchors, skipped } = await calibrate(manifest, provider, context);

    const keyLength = stateKeyLength(manifest);
    if (keyLength !== undefined && keyLength !== anchors.size) {
      context.logger.warn(
        `[Calibrator] State keys have length ${keyLength} but ${anchors.size} axes are active; those states are unreachable`
      );
    }

    return new GroundingProtocol(
      anchors,
      freezeStates(manifest.states),
      provider,
      context,
      Object.freeze([...skipped])
    );
  }

  static async fromFile(
    path: string | URL,
    provider: EmbeddingProvider,
    overrides: Partial<GroundingContext> = {}
  ): Promise<GroundingProtocol> {
    const manifest = await loadManifest(path);
    return GroundingProtocol.calibrate(manifest, provider, overrides);
  }

  /** Calibrated axes in enumeration order */
  get activeAxes(): AxisKey[] {
    return [...this.anchors.keys()];
  }

  get keyLength(): number {
    return this.anchors.size;
  }

  measure(text: string): Promise<MeasurementResult> {
    return measure(text, this.anchors, this.provider, this.context);
  }

  resolve(key: string): GroundedState {
    return resolve(key, this.states);
  }

  async inspect(text: string): Promise<Inspection> {
    const measurement = await this.measure(text);
    return { measurement, state: this.resolve(measurement.key) };
  }

  async ground(text: string): Promise<GroundedState> {
    const { state } = await this.inspect(text);
    return state;
  }
}
