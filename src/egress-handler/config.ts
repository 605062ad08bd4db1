/**
 * Handler process configuration.
 *
 * The parent service launches one handler per egress and passes the config as
 * JSON, either in a file (--config=<path>) or in EGRESS_HANDLER_CONFIG.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { EgressError, fatal } from "./errors.js";
import {
  DEFAULT_BUS_PUBLISH_ADDRESS,
  DEFAULT_BUS_SUBSCRIBE_ADDRESS,
  DEFAULT_DEBUG_DOT_TIMEOUT_MS,
  DEFAULT_RPC_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_MS,
} from "./protocol.js";
import { egressInfoSchema } from "./schemas.js";

export const CONFIG_ENV_VAR = "EGRESS_HANDLER_CONFIG";

export const pipelineConfigSchema = z.object({
  info: egressInfoSchema,
  /** Job-scoped temp directory; the introspection socket lives here */
  tmpDir: z.string().min(1),
  /** Media pipeline executable */
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  bus: z
    .object({
      publishAddress: z.string().min(1).default(DEFAULT_BUS_PUBLISH_ADDRESS),
      subscribeAddress: z.string().min(1).default(DEFAULT_BUS_SUBSCRIBE_ADDRESS),
    })
    .default({}),
  rpcTimeoutMs: z.number().int().positive().default(DEFAULT_RPC_TIMEOUT_MS),
  debugDotTimeoutMs: z.number().int().positive().default(DEFAULT_DEBUG_DOT_TIMEOUT_MS),
  /** 0 disables the stop-grace warning */
  stopGraceMs: z.number().int().nonnegative().default(DEFAULT_STOP_GRACE_MS),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export function parsePipelineConfig(input: unknown): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new EgressError(`invalid handler config: ${details}`, {
      code: "invalid_argument",
      fatal: true,
    });
  }
  return parsed.data;
}

type ArgOverrides = {
  configPath?: string;
  tmpDir?: string;
  publishAddress?: string;
  subscribeAddress?: string;
};

function parseArgs(argv: readonly string[]): ArgOverrides {
  const overrides: ArgOverrides = {};
  for (const arg of argv) {
    if (arg.startsWith("--config=")) {
      overrides.configPath = arg.slice("--config=".length);
    } else if (arg.startsWith("--tmp-dir=")) {
      overrides.tmpDir = arg.slice("--tmp-dir=".length);
    } else if (arg.startsWith("--bus-pub=")) {
      overrides.publishAddress = arg.slice("--bus-pub=".length);
    } else if (arg.startsWith("--bus-sub=")) {
      overrides.subscribeAddress = arg.slice("--bus-sub=".length);
    }
  }
  return overrides;
}

function readRawConfig(overrides: ArgOverrides, env: NodeJS.ProcessEnv): string {
  if (overrides.configPath) {
    try {
      return fs.readFileSync(overrides.configPath, "utf-8");
    } catch (err) {
      throw fatal(err);
    }
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return fromEnv;
  }
  throw new EgressError(`no handler config: pass --config=<file> or set ${CONFIG_ENV_VAR}`, {
    code: "invalid_argument",
    fatal: true,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadPipelineConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const overrides = parseArgs(argv);
  const raw = readRawConfig(overrides, env);

  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (err) {
    throw new EgressError(`handler config is not valid JSON`, {
      code: "invalid_argument",
      fatal: true,
      cause: err,
    });
  }
  if (!isRecord(input)) {
    return parsePipelineConfig(input);
  }

  const bus = isRecord(input.bus) ? { ...input.bus } : {};
  if (overrides.publishAddress) {
    bus.publishAddress = overrides.publishAddress;
  }
  if (overrides.subscribeAddress) {
    bus.subscribeAddress = overrides.subscribeAddress;
  }
  return parsePipelineConfig({
    ...input,
    ...(overrides.tmpDir ? { tmpDir: overrides.tmpDir } : {}),
    bus,
  });
}
