import { describe, expect, it } from "vitest";
import { parsePipelineConfig, type PipelineConfig } from "./config.js";
import { createCommandPipeline, validateStreamUrl, type EgressPipeline } from "./pipeline.js";

const STREAM_URL = "rtmp://example.test/live/key";

function shellConfig(script: string, streamUrls: string[] = [STREAM_URL]): PipelineConfig {
  return parsePipelineConfig({
    info: { egressId: "EG_pipe", streamUrls },
    tmpDir: "/tmp/egress-pipeline-test",
    command: "sh",
    // stream urls are appended, so the first one lands in $0
    args: ["-c", script],
  });
}

async function waitForStatus(pipeline: EgressPipeline, status: string) {
  for (let i = 0; i < 100 && pipeline.info.status !== status; i++) {
    await new Promise((r) => setTimeout(r, 10));
  }
  expect(pipeline.info.status).toBe(status);
}

describe("validateStreamUrl", () => {
  it("accepts supported outputs", () => {
    expect(validateStreamUrl(STREAM_URL)).toBe(STREAM_URL);
    expect(validateStreamUrl("srt://example.test:9000")).toBe("srt://example.test:9000");
    expect(validateStreamUrl("file:///tmp/out.mp4")).toBe("file:///tmp/out.mp4");
  });

  it("rejects malformed urls", () => {
    expect(() => validateStreamUrl("not a url")).toThrow("invalid stream url: not a url");
  });

  it("rejects unsupported protocols", () => {
    expect(() => validateStreamUrl("ftp://example.test/out")).toThrow(
      "unsupported stream protocol: ftp:",
    );
  });

  it("rejects urls without a host", () => {
    expect(() => validateStreamUrl("rtmp:///live")).toThrow("stream url has no host: rtmp:///live");
  });

  it("raises user errors", () => {
    let caught: unknown;
    try {
      validateStreamUrl("ftp://example.test/out");
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: "invalid_argument", fatal: false });
  });
});

describe("command pipeline", () => {
  it("refuses an egress with no outputs", async () => {
    await expect(createCommandPipeline(shellConfig("exit 0", []))).rejects.toMatchObject({
      message: "egress has no outputs",
      fatal: false,
    });
  });

  it("refuses invalid outputs", async () => {
    await expect(createCommandPipeline(shellConfig("exit 0", ["gopher://x"]))).rejects.toThrow(
      "unsupported stream protocol: gopher:",
    );
  });

  it("completes when the command exits cleanly", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exit 0"));
    expect(pipeline.info.status).toBe("starting");

    const info = await pipeline.run();

    expect(info.status).toBe("complete");
    expect(info.startedAt).toBeGreaterThan(0);
    expect(info.endedAt).toBeGreaterThanOrEqual(info.startedAt);
    expect(info.error).toBeUndefined();
  });

  it("fails with the exit code", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exit 3"));

    const info = await pipeline.run();

    expect(info.status).toBe("failed");
    expect(info.error).toBe("exited with code 3");
  });

  it("fails when the command cannot be started", async () => {
    const conf = parsePipelineConfig({
      info: { egressId: "EG_pipe", streamUrls: [STREAM_URL] },
      tmpDir: "/tmp/egress-pipeline-test",
      command: "/nonexistent/egress-pipeline",
    });
    const pipeline = await createCommandPipeline(conf);

    const info = await pipeline.run();

    expect(info.status).toBe("failed");
    expect(info.error).toBe("spawn /nonexistent/egress-pipeline ENOENT");
  });

  it("completes after EOS", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exec sleep 10"));
    const running = pipeline.run();
    await waitForStatus(pipeline, "active");

    pipeline.sendEOS();
    pipeline.sendEOS();
    expect(pipeline.info.status).toBe("ending");

    const info = await running;
    expect(info.status).toBe("complete");
  });

  it("aborts when EOS arrives before run", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exit 7"));

    pipeline.sendEOS();
    const info = await pipeline.run();

    expect(info.status).toBe("aborted");
    expect(info.error).toBeUndefined();
  });

  it("runs once", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exit 0"));
    await pipeline.run();

    await expect(pipeline.run()).rejects.toThrow("pipeline already ran");
  });

  it("updates outputs while running", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exec sleep 10"));
    const running = pipeline.run();
    await waitForStatus(pipeline, "active");

    await pipeline.updateStream({
      egressId: "EG_pipe",
      addOutputUrls: ["srt://example.test:9000"],
      removeOutputUrls: [STREAM_URL],
    });
    expect(pipeline.info.streamUrls).toEqual(["srt://example.test:9000"]);

    await expect(
      pipeline.updateStream({
        egressId: "EG_pipe",
        addOutputUrls: [],
        removeOutputUrls: [STREAM_URL],
      }),
    ).rejects.toMatchObject({ code: "not_found", message: `stream not found: ${STREAM_URL}` });

    await expect(
      pipeline.updateStream({
        egressId: "EG_pipe",
        addOutputUrls: ["ftp://example.test/out"],
        removeOutputUrls: [],
      }),
    ).rejects.toMatchObject({ code: "invalid_argument" });
    expect(pipeline.info.streamUrls).toEqual(["srt://example.test:9000"]);

    pipeline.sendEOS();
    await running;
  });

  it("refuses updates when not running", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exit 0"));

    await expect(
      pipeline.updateStream({ egressId: "EG_pipe", addOutputUrls: [], removeOutputUrls: [] }),
    ).rejects.toMatchObject({ code: "unavailable", message: "pipeline is not running" });
  });

  it("renders the output graph", async () => {
    const pipeline = await createCommandPipeline(shellConfig("exit 0"));

    await expect(pipeline.getDebugDot()).resolves.toBe(
      [
        "digraph pipeline {",
        '  label="EG_pipe (starting)";',
        '  source [label="sh"];',
        `  sink_0 [label="${STREAM_URL}"];`,
        "  source -> sink_0;",
        "}",
      ].join("\n"),
    );
  });
});
