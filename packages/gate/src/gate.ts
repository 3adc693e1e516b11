/**
 * GroundingGate - prompt interception middleware
 *
 * Grounds the incoming text, replaces it with a constraint-annotated payload
 * and delegates to the downstream call. Extra arguments are forwarded and the
 * downstream result is returned untouched. One grounding per invocation; no
 * caching, no retry.
 */

import type { GroundedState, Logger } from '@hexgate/core';
import { PayloadBuilder } from '@hexgate/prompt';

/** Anything that can ground text; GroundingProtocol in production. */
export interface Groundable {
  ground(text: string): Promise<GroundedState>;
}

export type Downstream<A extends unknown[], R> = (payload: string, ...args: A) => R | PromiseLike<R>;

export interface GroundingMiddleware {
  guard<A extends unknown[], R>(text: string, next: Downstream<A, R>, ...args: A): Promise<R>;
}

export interface GateOptions {
  builder?: PayloadBuilder;
  logger?: Logger;
}

export interface Augmented {
  state: GroundedState;
  payload: string;
}

export class GroundingGate implements GroundingMiddleware {
  private builder: PayloadBuilder;
  private logger: Logger;

  constructor(private readonly protocol: Groundable, options: GateOptions = {}) {
    this.builder = options.builder ?? new PayloadBuilder();
    this.logger = options.logger ?? console;
  }

  async augment(text: string): Promise<Augmented> {
    const state = await this.protocol.ground(text);

    this.logger.info(
      `[GroundingGate] Active. State: ${state.glyph} ${state.name} | Audit: ${state.audit} | Physics: ${state.physics}`
    );

    return { state, payload: this.builder.build(state, text) };
  }

  guard<A extends unknown[], R>(text: string, next: Downstream<A, R>, ...args: A): Promise<R> {
    return this.augment(text).then(({ payload }) => next(payload, ...args));
  }

  /**
   * Function-wrapping form: the returned function grounds its first argument
   * before calling `fn`.
   */
  wrap<A extends unknown[], R>(fn: Downstream<A, R>): (text: string, ...args: A) => Promise<R> {
    return (text: string, ...args: A) => this.guard(text, fn, ...args);
  }
}

export function createGroundingGate(protocol: Groundable, options: GateOptions = {}): GroundingGate {
  return new GroundingGate(protocol, options);
}
