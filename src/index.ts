/**
 * biosense-link
 *
 * Connection engine for BLE biosensor peripherals and streaming
 * PPG / HRV signal processing.
 *
 * @packageDocumentation
 */

// Version
export const VERSION = '0.1.0';

// ============================================================================
// Types and configuration
// ============================================================================

export * from './types';
export * from './config';

// ============================================================================
// Connection engine
// ============================================================================

export * from './ble';

// ============================================================================
// Readings and signal processing
// ============================================================================

export * from './readings';
export * from './signal';
export * from './pipeline';

// ============================================================================
// Utilities
// ============================================================================

export * from './utils';
