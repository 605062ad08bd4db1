/**
 * Bus RPC
 *
 * Request/response on top of the message bus. A server registers a handler per
 * (method, topic) pair on channel `rpc|<service>|<method>|<topic>`; a client
 * publishes a request envelope there and waits on its own reply channel.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { MessageBus, Subscription } from "./bus.js";
import {
  EgressError,
  errorCodeOf,
  isErrorCode,
  toErrorMessage,
  type ErrorCode,
} from "./errors.js";
import { DEFAULT_RPC_TIMEOUT_MS, RPC_CHANNEL_PREFIX } from "./protocol.js";

const log = createSubsystemLogger("egress-handler/rpc");

// =============================================================================
// Envelopes
// =============================================================================

const requestEnvelopeSchema = z.object({
  requestId: z.string(),
  replyTo: z.string(),
  method: z.string(),
  topic: z.string(),
  payload: z.unknown(),
  expiresAtMs: z.number(),
});

const responseEnvelopeSchema = z.object({
  requestId: z.string(),
  payload: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
    })
    .optional(),
});

export type RequestEnvelope = z.infer<typeof requestEnvelopeSchema>;
export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;

export function rpcChannel(service: string, method: string, topic: string): string {
  return [RPC_CHANNEL_PREFIX, service, method, topic].join("|");
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function encodeError(err: unknown): { code: ErrorCode; message: string } {
  return { code: errorCodeOf(err), message: toErrorMessage(err) };
}

function decodeError(error: { code: string; message: string }): EgressError {
  return new EgressError(error.message, {
    code: isErrorCode(error.code) ? error.code : "internal",
  });
}

// =============================================================================
// Server
// =============================================================================

export type RpcHandler = (payload: unknown) => Promise<unknown>;

export type RpcServer = {
  register(method: string, topic: string, handler: RpcHandler): Promise<void>;
  deregister(method: string, topic: string): Promise<void>;
  shutdown(): Promise<void>;
};

export function createRpcServer(service: string, bus: MessageBus): RpcServer {
  const registrations = new Map<string, Subscription>();
  let shutDown = false;

  async function reply(replyTo: string, response: ResponseEnvelope) {
    try {
      await bus.publish(replyTo, JSON.stringify(response));
    } catch (err) {
      log.warn(`Failed to send ${service} response: ${String(err)}`);
    }
  }

  async function handleMessage(method: string, handler: RpcHandler, raw: string) {
    const parsed = requestEnvelopeSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      log.warn(`Dropping malformed ${service}.${method} request`);
      return;
    }
    const req = parsed.data;
    if (req.expiresAtMs < Date.now()) {
      log.debug(`Dropping expired ${service}.${method} request`, { requestId: req.requestId });
      return;
    }

    try {
      const payload = await handler(req.payload);
      await reply(req.replyTo, { requestId: req.requestId, payload });
    } catch (err) {
      await reply(req.replyTo, { requestId: req.requestId, error: encodeError(err) });
    }
  }

  return {
    async register(method, topic, handler) {
      if (shutDown) {
        throw new Error(`${service} server is shut down`);
      }
      const channel = rpcChannel(service, method, topic);
      if (registrations.has(channel)) {
        throw new Error(`${service}.${method} already registered for topic "${topic}"`);
      }
      const sub = await bus.subscribe(channel, (raw) => handleMessage(method, handler, raw));
      registrations.set(channel, sub);
      log.debug(`Registered ${channel}`);
    },

    async deregister(method, topic) {
      const channel = rpcChannel(service, method, topic);
      const sub = registrations.get(channel);
      if (!sub) {
        return;
      }
      registrations.delete(channel);
      await sub.close();
    },

    async shutdown() {
      if (shutDown) {
        return;
      }
      shutDown = true;
      const subs = [...registrations.values()];
      registrations.clear();
      await Promise.all(subs.map((sub) => sub.close()));
      log.debug(`${service} server shut down`);
    },
  };
}

// =============================================================================
// Client
// =============================================================================

export type RpcClientConfig = {
  /** Request timeout in ms (default: 5000) */
  timeoutMs?: number;
};

export type RpcRequestOptions = {
  timeoutMs?: number;
};

export type RpcClient = {
  request(
    method: string,
    topic: string,
    payload: unknown,
    options?: RpcRequestOptions,
  ): Promise<unknown>;
  close(): Promise<void>;
};

type PendingRequest = {
  resolve: (payload: unknown) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

export function createRpcClient(
  service: string,
  bus: MessageBus,
  userConfig?: RpcClientConfig,
): RpcClient {
  const timeoutMs = userConfig?.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
  const replyTo = rpcChannel(service, "reply", randomUUID());
  const pending = new Map<string, PendingRequest>();
  let replySub: Promise<Subscription> | null = null;

  function handleReply(raw: string) {
    const parsed = responseEnvelopeSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      log.warn(`Dropping malformed ${service} response`);
      return;
    }
    const res = parsed.data;
    const entry = pending.get(res.requestId);
    if (!entry) {
      // Late reply for a request that already timed out
      return;
    }
    pending.delete(res.requestId);
    clearTimeout(entry.timer);
    if (res.error) {
      entry.reject(decodeError(res.error));
    } else {
      entry.resolve(res.payload);
    }
  }

  async function ensureReplySubscription(): Promise<void> {
    if (!replySub) {
      replySub = bus.subscribe(replyTo, handleReply);
    }
    const subscribing = replySub;
    try {
      await subscribing;
    } catch (err) {
      // the next request subscribes again
      if (replySub === subscribing) {
        replySub = null;
      }
      throw new EgressError(`${service} reply subscription failed: ${toErrorMessage(err)}`, {
        code: "unavailable",
        cause: err,
      });
    }
  }

  return {
    async request(method, topic, payload, options) {
      await ensureReplySubscription();
      const effectiveTimeoutMs = options?.timeoutMs ?? timeoutMs;
      const requestId = randomUUID();
      const envelope: RequestEnvelope = {
        requestId,
        replyTo,
        method,
        topic,
        payload,
        expiresAtMs: Date.now() + effectiveTimeoutMs,
      };

      const response = new Promise<unknown>((resolve, reject) => {
        const timer = setTimeout(() => {
          pending.delete(requestId);
          reject(
            new EgressError(`${service}.${method} request timed out`, { code: "unavailable" }),
          );
        }, effectiveTimeoutMs);
        pending.set(requestId, { resolve, reject, timer });
      });

      try {
        await bus.publish(rpcChannel(service, method, topic), JSON.stringify(envelope));
      } catch (err) {
        const entry = pending.get(requestId);
        if (entry) {
          pending.delete(requestId);
          clearTimeout(entry.timer);
        }
        throw new EgressError(`${service}.${method} request failed: ${toErrorMessage(err)}`, {
          code: "unavailable",
          cause: err,
        });
      }

      return await response;
    },

    async close() {
      for (const [requestId, entry] of pending) {
        clearTimeout(entry.timer);
        entry.reject(new EgressError(`${service} client closed`, { code: "unavailable" }));
        pending.delete(requestId);
      }
      const subscribing = replySub;
      replySub = null;
      if (!subscribing) {
        return;
      }
      let sub: Subscription;
      try {
        sub = await subscribing;
      } catch (err) {
        log.debug(`${service} reply subscription never opened: ${String(err)}`);
        return;
      }
      await sub.close();
    },
  };
}
