import type { Downstream, GroundingMiddleware } from './gate.js';

/**
 * Compose middlewares explicitly. The first middleware sees the original
 * text; each one hands its payload to the next; the last calls `next`.
 */
export function chain(...middlewares: GroundingMiddleware[]): GroundingMiddleware {
  return {
    guard<A extends unknown[], R>(text: string, next: Downstream<A, R>, ...args: A): Promise<R> {
      const dispatch = (index: number, payload: string): Promise<R> => {
        const middleware = middlewares[index];
        if (middleware === undefined) {
          return Promise.resolve().then(() => next(payload, ...args));
        }
        return middleware.guard(payload, (inner: string) => dispatch(index + 1, inner));
      };
      return dispatch(0, text);
    },
  };
}
