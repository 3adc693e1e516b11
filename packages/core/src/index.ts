/**
 * @hexgate/core - Core primitives for differential semantic grounding
 *
 * - Types: manifest records, anchors, measurements, grounded states
 * - Neural: embedding, normalization, similarity
 * - Manifest: loading and validation
 */

export * from './types.js';
export * from './errors.js';
export * from './neural.js';
export * from './context.js';
export * from './manifest.js';
export * from './openai-provider.js';
