/**
 * @hexgate/pipeline - Grounding stages
 *
 * CALIBRATE → MEASURE → RESOLVE
 */

export * from './stages/calibrate.js';
export * from './stages/measure.js';
export * from './stages/resolve.js';
export * from './protocol.js';
