/**
 * Grounding context
 *
 * Carries the logger and the negative-anchor table through calibration,
 * measurement and the gate.
 */

import type { AxisKey } from './types.js';

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Minimum differential score for a positive bit. Differentials at or below
 * this value are treated as noise.
 */
export const HYSTERESIS_THRESHOLD = 0.02;

/** Used when the manifest gives no explicit negative definition. */
export const NEGATIVE_ANCHORS: Readonly<Record<AxisKey, string>> = Object.freeze({
  q5: 'Loss of purpose, ethical corruption, chaotic entropy',
  q4: 'Illegal, violation of timing, chaos, anarchy',
  q3: 'Confused logic, panic, emotional instability',
  q2: 'Weak leadership, lack of agency, distrust, passive',
  q1: 'Bankruptcy, poverty, lack of resources, budget cut, no money',
  q0: 'Hardware failure, biological exhaustion, impossible to execute',
});

export interface GroundingContext {
  logger: Logger;
  negativeAnchors: Readonly<Partial<Record<AxisKey, string>>>;
}

export function createContext(
  overrides: Partial<GroundingContext> = {}
): GroundingContext {
  return {
    logger: console,
    negativeAnchors: NEGATIVE_ANCHORS,
    ...overrides,
  };
}
