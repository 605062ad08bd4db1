/**
 * Egress Pipeline
 *
 * The managed job a handler supervises. The handler only relies on the
 * EgressPipeline interface; createCommandPipeline is the implementation the
 * process entry point uses, which runs the media pipeline as a child process
 * and streams to the configured outputs.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { PipelineConfig } from "./config.js";
import { EgressError, toErrorMessage, userError } from "./errors.js";
import type { EgressInfo, UpdateStreamRequest } from "./types.js";

const log = createSubsystemLogger("egress-handler/pipeline");

export interface EgressPipeline {
  /** Live descriptor, owned by the pipeline */
  readonly info: EgressInfo;
  /** Start the pipeline and resolve with the terminal descriptor */
  run(): Promise<EgressInfo>;
  /** Request a graceful stop. Safe to call more than once. */
  sendEOS(): void;
  updateStream(req: UpdateStreamRequest): Promise<void>;
  /** Graphviz rendering of the running pipeline */
  getDebugDot(): Promise<string>;
}

export type PipelineFactory = (conf: PipelineConfig) => Promise<EgressPipeline>;

// =============================================================================
// Output URLs
// =============================================================================

const SUPPORTED_PROTOCOLS = new Set(["rtmp:", "rtmps:", "srt:", "file:", "http:", "https:"]);

export function validateStreamUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw userError(`invalid stream url: ${raw}`);
  }
  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw userError(`unsupported stream protocol: ${url.protocol}`);
  }
  if (url.protocol !== "file:" && !url.hostname) {
    throw userError(`stream url has no host: ${raw}`);
  }
  return raw;
}

function dotQuote(value: string): string {
  return JSON.stringify(value);
}

// =============================================================================
// Command Pipeline
// =============================================================================

export async function createCommandPipeline(conf: PipelineConfig): Promise<EgressPipeline> {
  const streamUrls = conf.info.streamUrls.map(validateStreamUrl);
  if (streamUrls.length === 0) {
    throw userError("egress has no outputs");
  }

  const info: EgressInfo = { ...conf.info, status: "starting", streamUrls };
  let child: ChildProcess | null = null;
  let eosRequested = false;
  let finished = false;

  function touch() {
    info.updatedAt = Date.now();
  }

  function finish(status: EgressInfo["status"], error?: string): EgressInfo {
    finished = true;
    const now = Date.now();
    info.status = status;
    info.updatedAt = now;
    info.endedAt = now;
    if (error) {
      info.error = error;
    }
    log.info(`Egress ${info.egressId} finished`, { status, error });
    return { ...info, streamUrls: [...info.streamUrls] };
  }

  return {
    info,

    run() {
      if (child || finished) {
        return Promise.reject(new EgressError("pipeline already ran", { code: "internal" }));
      }
      if (eosRequested) {
        // Stopped before it started
        info.startedAt = Date.now();
        return Promise.resolve(finish("aborted"));
      }

      return new Promise<EgressInfo>((resolve) => {
        const proc = spawn(conf.command, [...conf.args, ...info.streamUrls], {
          env: process.env,
          stdio: ["pipe", "inherit", "inherit"],
          detached: false,
        });
        child = proc;

        const now = Date.now();
        info.startedAt = now;
        info.updatedAt = now;
        info.status = "active";
        log.info(`Egress ${info.egressId} started`, { pid: proc.pid, command: conf.command });

        // stdin closes early when the command does not read it
        proc.stdin?.on("error", (err) => {
          log.debug(`Pipeline stdin closed: ${err.message}`);
        });

        proc.on("error", (err) => {
          if (!finished) {
            resolve(finish("failed", err.message));
          }
        });

        proc.on("close", (code, signal) => {
          if (finished) {
            return;
          }
          if (eosRequested || code === 0) {
            resolve(finish("complete"));
          } else if (signal) {
            resolve(finish("failed", `terminated by ${signal}`));
          } else {
            resolve(finish("failed", `exited with code ${code ?? "unknown"}`));
          }
        });
      });
    },

    sendEOS() {
      if (eosRequested || finished) {
        return;
      }
      eosRequested = true;
      if (!child) {
        return;
      }
      info.status = "ending";
      touch();
      log.info(`Sending EOS to egress ${info.egressId}`);
      child.kill("SIGINT");
    },

    async updateStream(req) {
      if (!child || finished || info.status !== "active") {
        throw new EgressError("pipeline is not running", { code: "unavailable" });
      }
      const added = req.addOutputUrls.map(validateStreamUrl);
      for (const url of req.removeOutputUrls) {
        if (!info.streamUrls.includes(url)) {
          throw new EgressError(`stream not found: ${url}`, { code: "not_found" });
        }
      }

      const command = JSON.stringify({
        type: "update-stream",
        add: added,
        remove: req.removeOutputUrls,
      });
      const stdin = child.stdin;
      if (!stdin || !stdin.writable) {
        throw new EgressError("pipeline control channel closed", { code: "unavailable" });
      }
      await new Promise<void>((resolve, reject) => {
        stdin.write(`${command}\n`, (err) => {
          if (err) {
            reject(new EgressError(toErrorMessage(err), { code: "unavailable", cause: err }));
          } else {
            resolve();
          }
        });
      });

      info.streamUrls = [
        ...info.streamUrls.filter((url) => !req.removeOutputUrls.includes(url)),
        ...added.filter((url) => !info.streamUrls.includes(url)),
      ];
      touch();
    },

    async getDebugDot() {
      const lines = [
        `digraph pipeline {`,
        `  label=${dotQuote(`${info.egressId} (${info.status})`)};`,
        `  source [label=${dotQuote(conf.command)}];`,
      ];
      info.streamUrls.forEach((url, i) => {
        lines.push(`  sink_${i} [label=${dotQuote(url)}];`);
        lines.push(`  source -> sink_${i};`);
      });
      lines.push(`}`);
      return lines.join("\n");
    },
  };
}
