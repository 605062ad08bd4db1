/**
 * Egress Handler Protocol Constants
 */

/** Address publishers connect to (broker XSUB side) */
export const DEFAULT_BUS_PUBLISH_ADDRESS = "tcp://127.0.0.1:18890";

/** Address subscribers connect to (broker XPUB side) */
export const DEFAULT_BUS_SUBSCRIBE_ADDRESS = "tcp://127.0.0.1:18891";

/** Default bus RPC timeout in ms */
export const DEFAULT_RPC_TIMEOUT_MS = 5 * 1000;

/** Debug dot requests give up after this long */
export const DEFAULT_DEBUG_DOT_TIMEOUT_MS = 2 * 1000;

/** Warn when a stopped pipeline has not finished after this long */
export const DEFAULT_STOP_GRACE_MS = 60 * 1000;

/** Default introspection client request timeout in ms */
export const DEFAULT_INTROSPECTION_TIMEOUT_MS = 10 * 1000;

/** Introspection socket file inside the job's temp directory */
export const INTROSPECTION_SOCKET_NAME = "service_rpc.sock";

/** RPC channel prefix on the message bus */
export const RPC_CHANNEL_PREFIX = "rpc";

export const EGRESS_HANDLER_SERVICE = "EgressHandler";

export const IO_INFO_SERVICE = "IOInfo";
