import type { GroundedState } from '@hexgate/core';

/**
 * Adapts a grounded state to the constraint preamble of a prompt
 */
export class ConstraintAdapter {
  toPreamble(state: GroundedState): string {
    return [this.topology(state), this.constraint(state)].join('\n');
  }

  topology(state: GroundedState): string {
    return `Logic Topology: ${state.name} (${state.audit})`;
  }

  constraint(state: GroundedState): string {
    return `Physics Constraint: ${state.physics}`;
  }
}
