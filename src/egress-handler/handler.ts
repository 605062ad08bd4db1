/**
 * Egress Handler
 *
 * Supervises exactly one egress pipeline for the lifetime of the process:
 * - Control plane: UpdateStream/StopEgress on the message bus, scoped by egress id
 * - Introspection plane: debug dot, profiles and metrics on a local socket
 * - Run loop: reconciles kill signals and pipeline completion into a single
 *   report-then-teardown sequence
 */

import * as path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { MessageBus } from "./bus.js";
import type { PipelineConfig } from "./config.js";
import { createEgressHandlerServer, type EgressHandlerServer } from "./egress-rpc.js";
import {
  EgressError,
  deadlineExceeded,
  errEgressNotFound,
  fatal,
  isFatal,
  toErrorMessage,
} from "./errors.js";
import { createFuse } from "./fuse.js";
import { defaultRegistry, renderMetrics, type MetricsRegistry } from "./metrics.js";
import type { EgressPipeline, PipelineFactory } from "./pipeline.js";
import { createInspectorProfiler, type Profiler } from "./pprof.js";
import { INTROSPECTION_SOCKET_NAME } from "./protocol.js";
import { startIntrospectionServer, type IntrospectionServer } from "./server.js";
import type {
  EgressHandlerService,
  EgressInfo,
  IOInfoService,
  IntrospectionService,
} from "./types.js";

const log = createSubsystemLogger("egress-handler");

// =============================================================================
// Types
// =============================================================================

export type ServeIntrospection = (
  service: IntrospectionService,
  address: string,
) => Promise<IntrospectionServer>;

export type HandlerDeps = {
  bus: MessageBus;
  /** Status reporter */
  ioClient: IOInfoService;
  createPipeline: PipelineFactory;
  /** Default: V8 inspector */
  profiler?: Profiler;
  /** Default: prom-client global registry */
  metrics?: MetricsRegistry;
  /** Default: ZeroMQ router on the job's socket address */
  serveIntrospection?: ServeIntrospection;
};

export interface Handler extends EgressHandlerService, IntrospectionService {
  readonly egressId: string;
  /** Run the pipeline to completion. Call at most once. */
  run(): Promise<void>;
  /** Request a graceful stop from outside the control plane */
  kill(): void;
}

export function getSocketAddress(tmpDir: string): string {
  return `ipc://${path.join(tmpDir, INTROSPECTION_SOCKET_NAME)}`;
}

type LoopEvent = { kind: "kill" } | { kind: "result"; info: EgressInfo };

function snapshot(info: EgressInfo): EgressInfo {
  return { ...info, streamUrls: [...info.streamUrls] };
}

// =============================================================================
// Construction
// =============================================================================

export async function createHandler(conf: PipelineConfig, deps: HandlerDeps): Promise<Handler> {
  const egressId = conf.info.egressId;
  const profiler = deps.profiler ?? createInspectorProfiler();
  const metrics = deps.metrics ?? defaultRegistry;
  const serveIntrospection = deps.serveIntrospection ?? startIntrospectionServer;

  const kill = createFuse();
  let pipeline: EgressPipeline | null = null;
  let rpcServer: EgressHandlerServer | null = null;
  let introspection: IntrospectionServer | null = null;
  let running = false;

  function requirePipeline(): EgressPipeline {
    if (!pipeline) {
      throw errEgressNotFound();
    }
    return pipeline;
  }

  async function stopSurfaces() {
    if (rpcServer) {
      try {
        await rpcServer.shutdown();
      } catch (err) {
        log.warn(`Failed to shut down rpc server: ${String(err)}`);
      }
      rpcServer = null;
    }
    if (introspection) {
      try {
        await introspection.stop();
      } catch (err) {
        log.warn(`Failed to stop introspection server: ${String(err)}`);
      }
      introspection = null;
    }
  }

  async function report(info: EgressInfo) {
    try {
      await deps.ioClient.updateEgress(info);
    } catch (err) {
      log.warn(`Failed to send egress update: ${String(err)}`, { egressId, status: info.status });
    }
  }

  async function runPipeline(active: EgressPipeline): Promise<EgressInfo> {
    try {
      return await active.run();
    } catch (err) {
      log.error(`Pipeline run failed: ${String(err)}`, { egressId });
      const now = Date.now();
      return {
        ...snapshot(active.info),
        status: "failed",
        updatedAt: now,
        endedAt: now,
        error: toErrorMessage(err),
      };
    }
  }

  const handler: Handler = {
    egressId,

    async run() {
      if (running) {
        throw new EgressError("handler already running", { code: "internal" });
      }
      const active = requirePipeline();
      running = true;

      const waits = new Map<LoopEvent["kind"], Promise<LoopEvent>>([
        ["kill", kill.watch().then((): LoopEvent => ({ kind: "kill" }))],
        ["result", runPipeline(active).then((info): LoopEvent => ({ kind: "result", info }))],
      ]);
      let graceTimer: NodeJS.Timeout | null = null;

      try {
        for (;;) {
          const event = await Promise.race(waits.values());
          waits.delete(event.kind);

          if (event.kind === "kill") {
            log.info("Kill signal received, sending EOS", { egressId });
            active.sendEOS();
            if (conf.stopGraceMs > 0) {
              graceTimer = setTimeout(() => {
                log.warn(`Pipeline has not stopped ${conf.stopGraceMs}ms after EOS`, { egressId });
              }, conf.stopGraceMs);
            }
            continue;
          }

          log.info("Egress finished", { egressId, status: event.info.status });
          await report(event.info);
          await stopSurfaces();
          pipeline = null;
          return;
        }
      } finally {
        if (graceTimer) {
          clearTimeout(graceTimer);
        }
      }
    },

    kill() {
      kill.break();
    },

    async updateStream(req) {
      const active = requirePipeline();
      await active.updateStream(req);
      return snapshot(active.info);
    },

    async stopEgress() {
      const active = requirePipeline();
      active.sendEOS();
      return snapshot(active.info);
    },

    async getPipelineDot() {
      const active = requirePipeline();
      let timer: NodeJS.Timeout | null = null;
      const dot = active.getDebugDot();
      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(deadlineExceeded("timed out requesting pipeline debug info")),
          conf.debugDotTimeoutMs,
        );
      });

      try {
        return { dotFile: await Promise.race([dot, deadline]) };
      } catch (err) {
        // The pipeline may still answer after the deadline; nobody is waiting
        dot.catch((lateErr: unknown) => {
          log.debug(`Discarded late debug dot failure: ${String(lateErr)}`);
        });
        throw err;
      } finally {
        if (timer) {
          clearTimeout(timer);
        }
      }
    },

    async getPProf(req) {
      requirePipeline();
      const pprofFile = await profiler.getProfileData(req.profileName, req.timeout, req.debug);
      return { pprofFile };
    },

    async getMetrics() {
      requirePipeline();
      const rendered = await renderMetrics(metrics);
      log.debug("metrics returned from handler process", { count: rendered.count });
      return { metrics: rendered.text };
    },
  };

  // Control plane
  const server = createEgressHandlerServer(handler, deps.bus);
  rpcServer = server;
  try {
    await server.registerUpdateStreamTopic(egressId);
    await server.registerStopEgressTopic(egressId);
  } catch (err) {
    await stopSurfaces();
    throw fatal(err);
  }

  // Introspection plane
  const address = getSocketAddress(conf.tmpDir);
  try {
    introspection = await serveIntrospection(handler, address);
  } catch (err) {
    await stopSurfaces();
    throw fatal(err);
  }

  try {
    pipeline = await deps.createPipeline(conf);
  } catch (err) {
    if (!isFatal(err)) {
      // user error, send update
      const now = Date.now();
      await report({
        ...snapshot(conf.info),
        status: "failed",
        startedAt: now,
        updatedAt: now,
        endedAt: now,
        error: toErrorMessage(err),
      });
    }
    await stopSurfaces();
    throw err;
  }

  log.info("Egress handler ready", { egressId, address });
  return handler;
}
