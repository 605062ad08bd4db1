/**
 * Typed control-plane bindings.
 *
 * EgressHandler is served by exactly one handler process per egress, so both of
 * its methods are registered on topics scoped by the egress id. IOInfo is the
 * status-tracking service and is not topic-scoped.
 */

import type { z } from "zod";
import type { MessageBus } from "./bus.js";
import { userError } from "./errors.js";
import { EGRESS_HANDLER_SERVICE, IO_INFO_SERVICE } from "./protocol.js";
import { createRpcClient, createRpcServer, type RpcClientConfig } from "./rpc.js";
import { egressInfoSchema, stopEgressRequestSchema, updateStreamRequestSchema } from "./schemas.js";
import type {
  EgressHandlerService,
  EgressInfo,
  IOInfoService,
  StopEgressRequest,
  UpdateStreamRequest,
} from "./types.js";

const UPDATE_STREAM = "UpdateStream";
const STOP_EGRESS = "StopEgress";
const UPDATE_EGRESS = "UpdateEgress";

function parseRequest<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.infer<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")} ${issue.message}` : "malformed";
    throw userError(`invalid request: ${detail}`);
  }
  return parsed.data;
}

// =============================================================================
// EgressHandler
// =============================================================================

export type EgressHandlerServer = {
  registerUpdateStreamTopic(egressId: string): Promise<void>;
  deregisterUpdateStreamTopic(egressId: string): Promise<void>;
  registerStopEgressTopic(egressId: string): Promise<void>;
  deregisterStopEgressTopic(egressId: string): Promise<void>;
  shutdown(): Promise<void>;
};

export function createEgressHandlerServer(
  impl: EgressHandlerService,
  bus: MessageBus,
): EgressHandlerServer {
  const server = createRpcServer(EGRESS_HANDLER_SERVICE, bus);

  return {
    registerUpdateStreamTopic(egressId) {
      return server.register(UPDATE_STREAM, egressId, (payload) =>
        impl.updateStream(parseRequest(updateStreamRequestSchema, payload)),
      );
    },
    deregisterUpdateStreamTopic(egressId) {
      return server.deregister(UPDATE_STREAM, egressId);
    },
    registerStopEgressTopic(egressId) {
      return server.register(STOP_EGRESS, egressId, (payload) =>
        impl.stopEgress(parseRequest(stopEgressRequestSchema, payload)),
      );
    },
    deregisterStopEgressTopic(egressId) {
      return server.deregister(STOP_EGRESS, egressId);
    },
    shutdown() {
      return server.shutdown();
    },
  };
}

export type EgressHandlerClient = {
  updateStream(egressId: string, req: UpdateStreamRequest): Promise<EgressInfo>;
  stopEgress(egressId: string, req: StopEgressRequest): Promise<EgressInfo>;
  close(): Promise<void>;
};

export function createEgressHandlerClient(
  bus: MessageBus,
  config?: RpcClientConfig,
): EgressHandlerClient {
  const client = createRpcClient(EGRESS_HANDLER_SERVICE, bus, config);

  return {
    async updateStream(egressId, req) {
      return egressInfoSchema.parse(await client.request(UPDATE_STREAM, egressId, req));
    },
    async stopEgress(egressId, req) {
      return egressInfoSchema.parse(await client.request(STOP_EGRESS, egressId, req));
    },
    close() {
      return client.close();
    },
  };
}

// =============================================================================
// IOInfo
// =============================================================================

export type IOInfoClient = IOInfoService & {
  close(): Promise<void>;
};

export function createIOInfoClient(bus: MessageBus, config?: RpcClientConfig): IOInfoClient {
  const client = createRpcClient(IO_INFO_SERVICE, bus, config);

  return {
    async updateEgress(info) {
      await client.request(UPDATE_EGRESS, "", info);
    },
    close() {
      return client.close();
    },
  };
}

export type IOInfoServer = {
  shutdown(): Promise<void>;
};

export async function createIOInfoServer(
  impl: IOInfoService,
  bus: MessageBus,
): Promise<IOInfoServer> {
  const server = createRpcServer(IO_INFO_SERVICE, bus);
  await server.register(UPDATE_EGRESS, "", async (payload) => {
    await impl.updateEgress(parseRequest(egressInfoSchema, payload));
    return {};
  });
  return {
    shutdown() {
      return server.shutdown();
    },
  };
}
