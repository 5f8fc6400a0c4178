/**
 * Core Module Index
 */

export { EventDispatcher } from './EventDispatcher.js';
export type { IEventSubscriber, SubscriberStats } from './EventDispatcher.js';
export { ChangeNotifier } from './ChangeNotifier.js';
export type { ChangeTopic } from './ChangeNotifier.js';
export * from './errors.js';
