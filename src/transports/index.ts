/**
 * Transport layer exports.
 */

export type {
  ClientTransport,
  CloseInfo,
  ReadyStateValue,
  SubscriptionToken,
  TransportEventKind,
  TransportEventMap,
  TransportFactory,
  TransportListener,
} from './ClientTransport.ts';
export { ReadyState } from './ClientTransport.ts';
export { Subscription, SubscriptionGroup } from './Subscription.ts';
export { WsClientTransport, createWsTransport } from './WsClientTransport.ts';
