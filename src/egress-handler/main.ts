#!/usr/bin/env node
/**
 * Egress handler process.
 *
 * Usage: egress-handler --config=<file> [--tmp-dir=<dir>] [--bus-pub=<addr>] [--bus-sub=<addr>]
 *
 * The config may also come from EGRESS_HANDLER_CONFIG. SIGINT/SIGTERM ask the
 * pipeline to finish; the process exits once the final status is reported.
 */

import * as fs from "node:fs";
import { pathToFileURL } from "node:url";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { loadPipelineConfig } from "./config.js";
import { createIOInfoClient } from "./egress-rpc.js";
import { toErrorMessage } from "./errors.js";
import { createHandler } from "./handler.js";
import { registerProcessMetrics } from "./metrics.js";
import { createCommandPipeline } from "./pipeline.js";
import { createZmqMessageBus } from "./zmq-bus.js";

const log = createSubsystemLogger("egress-handler/main");

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const conf = loadPipelineConfig(argv);
  if (conf.logLevel) {
    process.env.EGRESS_LOG_LEVEL = conf.logLevel;
  }
  fs.mkdirSync(conf.tmpDir, { recursive: true });

  registerProcessMetrics();

  const bus = createZmqMessageBus(conf.bus);
  const ioClient = createIOInfoClient(bus, { timeoutMs: conf.rpcTimeoutMs });

  try {
    const handler = await createHandler(conf, {
      bus,
      ioClient,
      createPipeline: createCommandPipeline,
    });

    const onSignal = (signal: NodeJS.Signals) => {
      log.info(`Received ${signal}, stopping egress`, { egressId: handler.egressId });
      handler.kill();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    await handler.run();
    return 0;
  } catch (err) {
    log.error(`Egress handler failed: ${toErrorMessage(err)}`, { egressId: conf.info.egressId });
    return 1;
  } finally {
    await ioClient.close();
    await bus.close();
  }
}

/** True when `scriptPath` (argv[1], possibly an npm bin symlink) resolves to `moduleUrl` */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  let resolved: string;
  try {
    resolved = fs.realpathSync(scriptPath);
  } catch (err) {
    log.debug(`Cannot resolve entry script ${scriptPath}: ${toErrorMessage(err)}`);
    return false;
  }
  return pathToFileURL(resolved).href === moduleUrl;
}

// Only run if this is the main module
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main()
    .then((code) => {
      process.exit(code);
    })
    .catch((err: unknown) => {
      log.error(`Failed to start egress handler: ${toErrorMessage(err)}`);
      process.exit(1);
    });
}
