/**
 * Configuration exports
 * @module config
 */

export {
  DEFAULT_SAMPLE_RATE,
  DEFAULT_FILTER_CONFIG,
  DEFAULT_BEAT_DETECTION_CONFIG,
  DEFAULT_IRDC_CONFIG,
  DEFAULT_HRV_CONFIG,
  DEFAULT_ROUTER_CONFIG,
  DEFAULT_CONNECTION_CONFIG,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  resolveConfig,
} from './defaults';
