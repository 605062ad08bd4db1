/**
 * Egress Handler Module
 *
 * Per-egress supervisor process: runs one media pipeline, serves its control
 * plane on the shared message bus and a local introspection socket.
 */

// Types
export type {
  EgressHandlerService,
  EgressInfo,
  EgressStatus,
  IntrospectionRequest,
  IntrospectionResponse,
  IntrospectionService,
  IOInfoService,
  PProfRequest,
  StopEgressRequest,
  UpdateStreamRequest,
} from "./types.js";

// Protocol constants
export {
  DEFAULT_BUS_PUBLISH_ADDRESS,
  DEFAULT_BUS_SUBSCRIBE_ADDRESS,
  DEFAULT_DEBUG_DOT_TIMEOUT_MS,
  DEFAULT_INTROSPECTION_TIMEOUT_MS,
  DEFAULT_RPC_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_MS,
  INTROSPECTION_SOCKET_NAME,
} from "./protocol.js";

// Errors
export {
  EgressError,
  errEgressNotFound,
  fatal,
  isFatal,
  userError,
  type ErrorCode,
} from "./errors.js";

// Config
export {
  loadPipelineConfig,
  parsePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from "./config.js";

// Handler
export {
  createHandler,
  getSocketAddress,
  type Handler,
  type HandlerDeps,
} from "./handler.js";
export { createFuse, type Fuse } from "./fuse.js";
export {
  createCommandPipeline,
  type EgressPipeline,
  type PipelineFactory,
} from "./pipeline.js";

// Control plane
export { createLocalMessageBus, type MessageBus, type Subscription } from "./bus.js";
export { createZmqMessageBus, startBusBroker, type BusBroker } from "./zmq-bus.js";
export {
  createEgressHandlerClient,
  createEgressHandlerServer,
  createIOInfoClient,
  createIOInfoServer,
  type EgressHandlerClient,
  type IOInfoClient,
} from "./egress-rpc.js";

// Introspection plane
export { startIntrospectionServer, type IntrospectionServer } from "./server.js";
export { createIntrospectionClient, type IntrospectionClient } from "./client.js";
export { createInspectorProfiler, type Profiler } from "./pprof.js";
export { registerProcessMetrics, renderMetrics, type MetricsRegistry } from "./metrics.js";
