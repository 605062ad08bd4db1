import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadPipelineConfig, parsePipelineConfig } from "./config.js";

const MINIMAL = {
  info: { egressId: "EG_conf" },
  tmpDir: "/tmp/egress/EG_conf",
  command: "egress-pipeline",
};

describe("parsePipelineConfig", () => {
  it("fills in defaults", () => {
    const conf = parsePipelineConfig(MINIMAL);

    expect(conf).toEqual({
      info: {
        egressId: "EG_conf",
        status: "starting",
        startedAt: 0,
        updatedAt: 0,
        endedAt: 0,
        streamUrls: [],
      },
      tmpDir: "/tmp/egress/EG_conf",
      command: "egress-pipeline",
      args: [],
      bus: {
        publishAddress: "tcp://127.0.0.1:18890",
        subscribeAddress: "tcp://127.0.0.1:18891",
      },
      rpcTimeoutMs: 5000,
      debugDotTimeoutMs: 2000,
      stopGraceMs: 60000,
    });
  });

  it("lists every problem in one fatal error", () => {
    let caught: unknown;
    try {
      parsePipelineConfig({ info: { egressId: "EG_conf" } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toMatchObject({
      code: "invalid_argument",
      fatal: true,
      message: "invalid handler config: tmpDir: Required; command: Required",
    });
  });

  it("rejects a negative stop grace", () => {
    expect(() => parsePipelineConfig({ ...MINIMAL, stopGraceMs: -1 })).toThrow(
      /^invalid handler config: stopGraceMs: /,
    );
  });
});

describe("loadPipelineConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "egress-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads the config from the environment", () => {
    const conf = loadPipelineConfig([], { EGRESS_HANDLER_CONFIG: JSON.stringify(MINIMAL) });

    expect(conf.info.egressId).toBe("EG_conf");
    expect(conf.tmpDir).toBe("/tmp/egress/EG_conf");
  });

  it("prefers the config file and applies flag overrides", () => {
    const file = path.join(dir, "handler.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ ...MINIMAL, bus: { subscribeAddress: "tcp://10.0.0.5:7001" } }),
    );

    const conf = loadPipelineConfig(
      [`--config=${file}`, "--tmp-dir=/run/egress/EG_conf", "--bus-pub=tcp://10.0.0.5:7000"],
      { EGRESS_HANDLER_CONFIG: JSON.stringify({ ...MINIMAL, command: "ignored" }) },
    );

    expect(conf.command).toBe("egress-pipeline");
    expect(conf.tmpDir).toBe("/run/egress/EG_conf");
    expect(conf.bus).toEqual({
      publishAddress: "tcp://10.0.0.5:7000",
      subscribeAddress: "tcp://10.0.0.5:7001",
    });
  });

  it("fails without a config", () => {
    expect(() => loadPipelineConfig([], {})).toThrow(
      "no handler config: pass --config=<file> or set EGRESS_HANDLER_CONFIG",
    );
  });

  it("fails on a missing config file", () => {
    let caught: unknown;
    try {
      loadPipelineConfig([`--config=${path.join(dir, "missing.json")}`], {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ fatal: true });
  });

  it("fails on malformed JSON", () => {
    expect(() => loadPipelineConfig([], { EGRESS_HANDLER_CONFIG: "{nope" })).toThrow(
      "handler config is not valid JSON",
    );
  });

  it("validates non-object configs", () => {
    expect(() => loadPipelineConfig([], { EGRESS_HANDLER_CONFIG: "[]" })).toThrow(
      "invalid handler config: <root>: Expected object, received array",
    );
  });
});
