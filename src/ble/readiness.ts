/**
 * Connection readiness of a single peripheral
 *
 * The happy path runs
 * disconnected → connecting → connected → discoveringServices →
 * servicesDiscovered → discoveringCharacteristics →
 * characteristicsDiscovered → enablingNotifications → ready.
 *
 * @module ble/readiness
 */

export type ConnectionReadiness =
  | { kind: 'disconnected' }
  | { kind: 'connecting' }
  | { kind: 'connected' }
  | { kind: 'discoveringServices' }
  | { kind: 'servicesDiscovered' }
  | { kind: 'discoveringCharacteristics' }
  | { kind: 'characteristicsDiscovered' }
  | { kind: 'enablingNotifications' }
  | { kind: 'ready' }
  | { kind: 'failed'; reason: string };

export type ReadinessKind = ConnectionReadiness['kind'];

export const Readiness = {
  disconnected: { kind: 'disconnected' },
  connecting: { kind: 'connecting' },
  connected: { kind: 'connected' },
  discoveringServices: { kind: 'discoveringServices' },
  servicesDiscovered: { kind: 'servicesDiscovered' },
  discoveringCharacteristics: { kind: 'discoveringCharacteristics' },
  characteristicsDiscovered: { kind: 'characteristicsDiscovered' },
  enablingNotifications: { kind: 'enablingNotifications' },
  ready: { kind: 'ready' },
  failed: (reason: string): ConnectionReadiness => ({ kind: 'failed', reason }),
} as const satisfies Record<string, ConnectionReadiness | ((reason: string) => ConnectionReadiness)>;

/** Forward order of the non-terminal states */
export const HAPPY_PATH: readonly ReadinessKind[] = [
  'connecting',
  'connected',
  'discoveringServices',
  'servicesDiscovered',
  'discoveringCharacteristics',
  'characteristicsDiscovered',
  'enablingNotifications',
  'ready',
];

/**
 * True once the radio link is up (connected through ready)
 */
export function isLinkEstablished(readiness: ConnectionReadiness): boolean {
  switch (readiness.kind) {
    case 'disconnected':
    case 'connecting':
    case 'failed':
      return false;
    case 'connected':
    case 'discoveringServices':
    case 'servicesDiscovered':
    case 'discoveringCharacteristics':
    case 'characteristicsDiscovered':
    case 'enablingNotifications':
    case 'ready':
      return true;
    default:
      return assertNever(readiness);
  }
}

/**
 * Sensor data is only routed from a ready peripheral
 */
export function canStream(readiness: ConnectionReadiness): boolean {
  return readiness.kind === 'ready';
}

export function describeReadiness(readiness: ConnectionReadiness): string {
  switch (readiness.kind) {
    case 'disconnected':
      return 'Disconnected';
    case 'connecting':
      return 'Connecting...';
    case 'connected':
      return 'Connected';
    case 'discoveringServices':
      return 'Discovering services...';
    case 'servicesDiscovered':
      return 'Services found';
    case 'discoveringCharacteristics':
      return 'Discovering characteristics...';
    case 'characteristicsDiscovered':
      return 'Characteristics found';
    case 'enablingNotifications':
      return 'Setting up notifications...';
    case 'ready':
      return 'Ready';
    case 'failed':
      return `Failed: ${readiness.reason}`;
    default:
      return assertNever(readiness);
  }
}

export function readinessEquals(a: ConnectionReadiness, b: ConnectionReadiness): boolean {
  if (a.kind === 'failed' && b.kind === 'failed') return a.reason === b.reason;
  return a.kind === b.kind;
}

/**
 * Whether `from → to` is a legal step. Same-state moves are handled by the
 * state machine as no-ops and are not legal transitions here.
 */
export function canTransition(from: ConnectionReadiness, to: ConnectionReadiness): boolean {
  if (to.kind === 'disconnected' || to.kind === 'failed') return true;

  switch (from.kind) {
    case 'disconnected':
    case 'failed':
      return to.kind === 'connecting';
    case 'connecting':
    case 'connected':
    case 'discoveringServices':
    case 'servicesDiscovered':
    case 'discoveringCharacteristics':
    case 'characteristicsDiscovered':
    case 'enablingNotifications':
      return HAPPY_PATH.indexOf(to.kind) === HAPPY_PATH.indexOf(from.kind) + 1;
    case 'ready':
      return false;
    default:
      return assertNever(from);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled readiness: ${JSON.stringify(value)}`);
}
