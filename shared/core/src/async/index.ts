/**
 * Async Module
 *
 * @module async
 */

export { mapConcurrent } from './async-utils';
