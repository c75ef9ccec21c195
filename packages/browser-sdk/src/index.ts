// Main exports
export {
  BrowserEventClient,
  DEFAULT_HIGH_WATER_MARK,
  type BrowserEventClientConfig,
  type EventSubscription,
  type EventSubscriptionHandlers,
} from './BrowserEventClient';

export {
  toHostError,
  toHostEvent,
  type HostError,
  type HostErrorKind,
  type HostResult,
  type HostTokenTransferEvent,
} from './host-values';

export { createHostLogger, type HostLogSink, type HostLoggerOptions, type LogLevel } from './host-logger';
export { hasFaultReporter, installFaultReporter, type FaultReporter, type HostFault } from './fault-reporter';

// Re-export for hosts that load a precompiled schema
export { EventServiceSchema, type EventServiceDescriptor } from '@ttp-events/proto';
export type { AssetDescriptor, TokenTransferKind } from '@ttp-events/client';
