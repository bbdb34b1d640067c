export type {
  BusMessage,
  DeliveryOutcome,
  MessageHandler,
  PublishOptions,
  PublishReceipt,
  SubscribeOptions,
  Subscription,
  DeadLetter,
  TriggerBus,
} from './types.js';
export { Outcome } from './types.js';
export { LocalTriggerBus, type LocalTriggerBusOptions } from './local-trigger-bus.js';
export { calculateDelay, retryWithBackoff, DEFAULT_BACKOFF_POLICY, type BackoffPolicy } from './backoff.js';
