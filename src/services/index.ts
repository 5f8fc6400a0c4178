/**
 * Services Index
 * Export all services
 */

export { PageSession, DEFAULT_LOAD_STATE_TIMEOUT_MS } from './PageSession.js';
export type { PageSessionOptions } from './PageSession.js';

export { PlaywrightProtocolClient, decodePostDataEntries } from './PlaywrightProtocolClient.js';

export { StabilityDetector } from './StabilityDetector.js';
export type { StabilityState, StabilityMetrics, StabilityWaitOptions } from './StabilityDetector.js';

export { NetworkInterceptor, DEFAULT_REQUEST_WAIT_TIMEOUT_MS } from './NetworkInterceptor.js';
export type {
    RouteHandler,
    RouteError,
    ObservedRequest,
    ObservedResponse,
    NetworkInterceptorOptions
} from './NetworkInterceptor.js';

export { InterceptedRequest, toNetworkErrorReason } from './InterceptedRequest.js';
export type {
    Resolution,
    AbortReason,
    ContinueOverrides,
    FulfillResponse,
    RequestResolver
} from './InterceptedRequest.js';

export {
    SocketMonitor,
    frameTypeForOpcode,
    payloadSize,
    parseClosePayload,
    snapshotConnection,
    summarizeConnection
} from './SocketMonitor.js';
export type {
    SocketState,
    FrameType,
    SocketFrame,
    SocketFrameError,
    SocketConnection,
    SocketConnectionSummary,
    SocketActivity,
    SocketActivityListener,
    SocketStats,
    SocketMonitorOptions
} from './SocketMonitor.js';

export { SocketWaiter, SocketEventWaiter, frameMatches, connectionSatisfies } from './SocketWaiter.js';
export type { SocketCondition, FrameCondition, FrameCallback } from './SocketWaiter.js';

export {
    DOM_MUTATION_SIGNAL,
    MUTATION_OBSERVER_SCRIPT,
    RESOURCE_CLASSES
} from './page-scripts.js';
export type { ResourceClass } from './page-scripts.js';
