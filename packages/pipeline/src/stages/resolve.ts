/**
 * RESOLVE Stage
 *
 * Looks a composed key up in the state table. A miss is not an error: it
 * yields the FALLBACK state. Manifests need not cover the whole key space.
 */

import type { GroundedState, StateTable } from '@hexgate/core';

export const FALLBACK_STATE = Object.freeze({
  glyph: 'unknown',
  name: 'Unknown Chaos',
  physics: 'Logic coherence failed.',
  audit: 'System_Error',
});

export function resolve(key: string, states: StateTable): GroundedState {
  const entry = Object.hasOwn(states, key) ? states[key] : undefined;

  if (!entry) {
    return { status: 'FALLBACK', key, ...FALLBACK_STATE };
  }

  return {
    status: 'GROUNDED',
    key,
    glyph: entry.u,
    name: entry.name,
    physics: entry.vector,
    audit: entry.audit,
  };
}
