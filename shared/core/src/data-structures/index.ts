/**
 * Data Structures Module
 */

export { CircularBuffer } from './circular-buffer';
