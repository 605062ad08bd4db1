/**
 * Introspection Client
 *
 * Used by the parent service (or an operator on the same host) to pull debug
 * information out of a running handler:
 * - Pipeline debug dot
 * - Process profiles
 * - Prometheus metrics
 */

import * as zmq from "zeromq";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { EgressError, isErrorCode, toErrorMessage } from "./errors.js";
import { DEFAULT_INTROSPECTION_TIMEOUT_MS } from "./protocol.js";
import type { IntrospectionRequest, IntrospectionResponse } from "./types.js";

const log = createSubsystemLogger("egress-handler/client");

export type IntrospectionClientConfig = {
  /** Handler socket address, see getSocketAddress */
  address: string;
  /** Request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
};

export interface IntrospectionClient {
  getPipelineDot(): Promise<string>;
  getPProf(profileName: string, timeoutSeconds?: number, debug?: number): Promise<Buffer>;
  getMetrics(): Promise<string>;
  close(): void;
}

function isResponse(value: unknown): value is IntrospectionResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    "success" in value &&
    typeof value.success === "boolean"
  );
}

function toError(res: IntrospectionResponse): EgressError {
  if (res.success) {
    return new EgressError(`unexpected ${res.type} response`, { code: "internal" });
  }
  return new EgressError(res.error, { code: isErrorCode(res.code) ? res.code : "internal" });
}

export function createIntrospectionClient(config: IntrospectionClientConfig): IntrospectionClient {
  const requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_INTROSPECTION_TIMEOUT_MS;

  function openSocket(): zmq.Request {
    const next = new zmq.Request();
    next.connect(config.address);
    return next;
  }

  let socket = openSocket();
  let closed = false;

  // An abandoned exchange leaves the REQ socket mid-cycle; replace it
  function resetSocket() {
    socket.close();
    if (!closed) {
      socket = openSocket();
    }
  }

  // Request queue for serialization
  let requestLock: Promise<void> = Promise.resolve();

  async function sendRequest(req: IntrospectionRequest): Promise<IntrospectionResponse> {
    const prevLock = requestLock;
    let releaseLock: () => void = () => {};
    requestLock = new Promise((resolve) => {
      releaseLock = resolve;
    });

    let timeoutId: NodeJS.Timeout | null = null;
    try {
      await prevLock;
      if (closed) {
        throw new EgressError("introspection client closed", { code: "unavailable" });
      }

      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(
          () =>
            reject(
              new EgressError(`${req.type} request timed out`, { code: "deadline_exceeded" }),
            ),
          requestTimeoutMs,
        );
      });
      // send blocks until a server is listening
      const active = socket;
      const responsePromise = (async () => {
        await active.send(JSON.stringify(req));
        const [msg] = await active.receive();
        let parsed: unknown;
        try {
          parsed = JSON.parse(msg?.toString() ?? "null");
        } catch (err) {
          throw new EgressError(`malformed ${req.type} response`, { code: "internal", cause: err });
        }
        if (!isResponse(parsed)) {
          throw new EgressError(`malformed ${req.type} response`, { code: "internal" });
        }
        return parsed;
      })();
      // A late or failed exchange after timeout has no reader
      responsePromise.catch((err: unknown) => {
        log.debug(`Dropped ${req.type} response: ${String(err)}`);
      });

      try {
        return await Promise.race([responsePromise, timeoutPromise]);
      } catch (err) {
        if (err instanceof EgressError && err.code !== "deadline_exceeded") {
          throw err;
        }
        resetSocket();
        if (err instanceof EgressError) {
          throw err;
        }
        throw new EgressError(`${req.type} request failed: ${toErrorMessage(err)}`, {
          code: "unavailable",
          cause: err,
        });
      }
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      releaseLock();
    }
  }

  return {
    async getPipelineDot() {
      const res = await sendRequest({ type: "pipeline-dot" });
      if (res.type === "pipeline-dot" && res.success) {
        return res.dotFile;
      }
      throw toError(res);
    },

    async getPProf(profileName, timeoutSeconds = 0, debug = 0) {
      const res = await sendRequest({
        type: "pprof",
        profileName,
        timeout: timeoutSeconds,
        debug,
      });
      if (res.type === "pprof" && res.success) {
        return Buffer.from(res.pprofFile, "base64");
      }
      throw toError(res);
    },

    async getMetrics() {
      const res = await sendRequest({ type: "metrics" });
      if (res.type === "metrics" && res.success) {
        return res.metrics;
      }
      throw toError(res);
    },

    close() {
      if (closed) {
        return;
      }
      closed = true;
      socket.close();
    },
  };
}
