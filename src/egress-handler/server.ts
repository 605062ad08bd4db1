/**
 * Introspection Server
 *
 * Local-only request/response socket for debugging a handler without going
 * through the control plane. Requests are handled concurrently: a slow debug
 * dot never holds up a metrics scrape. Replies share one send queue.
 */

import * as zmq from "zeromq";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { errorCodeOf, toErrorMessage } from "./errors.js";
import { introspectionRequestSchema } from "./schemas.js";
import type {
  IntrospectionRequest,
  IntrospectionResponse,
  IntrospectionService,
} from "./types.js";

const log = createSubsystemLogger("egress-handler/server");

export type IntrospectionServer = {
  address: string;
  stop(): Promise<void>;
};

function parseRequest(raw: string): IntrospectionRequest | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = introspectionRequestSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export async function handleIntrospectionRequest(
  service: IntrospectionService,
  req: IntrospectionRequest,
): Promise<IntrospectionResponse> {
  try {
    switch (req.type) {
      case "pipeline-dot": {
        const { dotFile } = await service.getPipelineDot();
        return { type: "pipeline-dot", success: true, dotFile };
      }
      case "pprof": {
        const { pprofFile } = await service.getPProf(req);
        return { type: "pprof", success: true, pprofFile: pprofFile.toString("base64") };
      }
      case "metrics": {
        const { metrics } = await service.getMetrics();
        return { type: "metrics", success: true, metrics };
      }
    }
  } catch (err) {
    return { type: req.type, success: false, code: errorCodeOf(err), error: toErrorMessage(err) };
  }
}

export async function startIntrospectionServer(
  service: IntrospectionService,
  address: string,
): Promise<IntrospectionServer> {
  const socket = new zmq.Router();
  await socket.bind(address);
  log.info(`Introspection server listening on ${address}`);

  let stopped = false;

  // Queue for serializing replies (a zmq socket accepts one send at a time)
  let sendQueue: Promise<void> = Promise.resolve();

  function reply(routingId: Buffer, res: IntrospectionResponse) {
    sendQueue = sendQueue.then(async () => {
      if (stopped) {
        return;
      }
      try {
        await socket.send([routingId, "", JSON.stringify(res)]);
      } catch (err) {
        log.warn(`Failed to send ${res.type} reply: ${String(err)}`);
      }
    });
  }

  async function handle(routingId: Buffer, raw: string) {
    const req = parseRequest(raw);
    if (!req) {
      reply(routingId, {
        type: "error",
        success: false,
        code: "invalid_argument",
        error: "malformed introspection request",
      });
      return;
    }
    reply(routingId, await handleIntrospectionRequest(service, req));
  }

  async function runLoop() {
    try {
      for await (const frames of socket) {
        // REQ peers send [routingId, empty delimiter, body]
        const routingId = frames[0];
        const body = frames[frames.length - 1];
        if (!routingId || !body || frames.length < 2) {
          continue;
        }
        void handle(routingId, body.toString());
      }
    } catch (err) {
      if (!stopped) {
        log.error(`Introspection server loop failed: ${String(err)}`);
      }
    }
  }

  void runLoop();

  return {
    address,
    async stop() {
      if (stopped) {
        return;
      }
      stopped = true;
      await sendQueue;
      socket.close();
      log.info("Introspection server stopped");
    },
  };
}
