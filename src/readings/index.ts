/**
 * Reading routing exports
 * @module readings
 */

export {
  ReadingRouter,
  type ReadingRouterOptions,
  type BatchListener,
  type LatestListener,
  type SampleListener,
} from './reading-router';
export { SampleBuilder, lastValidByType, type ReadingSource } from './sample-builder';
