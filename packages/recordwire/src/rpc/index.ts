export {
  type CorrelatorOptions,
  RequestCorrelator,
  type SendOptions,
} from "./correlator";
export {
  type LiveNotification,
  type LiveRouterOptions,
  LiveStream,
  type LiveSubscription,
  LiveSubscriptionRouter,
  type SubscribeOptions,
} from "./live";
export {
  decodeFrame,
  decodeQueryResults,
  encodeRequest,
  type InboundFrame,
  type LiveAction,
  type RemoteFailure,
  type RequestEnvelope,
  type StatementResult,
} from "./protocol";
export {
  type ConnectionState,
  INITIAL_SESSION,
  isAuthenticated,
  isConnected,
  KEEP,
  type Keep,
  type ScopeChange,
  type Session,
  SessionState,
  transitions,
} from "./session";
export {
  type CloseListener,
  type MessageListener,
  type Transport,
  WebSocketTransport,
  type WebSocketTransportOptions,
} from "./transport";
