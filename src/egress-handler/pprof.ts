/**
 * Process profiler backed by the V8 inspector.
 *
 * Profiles come back as the inspector's JSON documents (.cpuprofile,
 * .heapsnapshot, .heapprofile), which Chrome DevTools opens directly.
 */

import { Session } from "node:inspector/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { EgressError } from "./errors.js";

const log = createSubsystemLogger("egress-handler/pprof");

export type ProfileName = "cpu" | "heap" | "allocs";

export const PROFILE_NAMES: readonly ProfileName[] = ["cpu", "heap", "allocs"];

export interface Profiler {
  getProfileData(profileName: string, timeoutSeconds: number, debug: number): Promise<Buffer>;
}

function isProfileName(value: string): value is ProfileName {
  return PROFILE_NAMES.some((name) => name === value);
}

function encode(document: unknown, debug: number): Buffer {
  return Buffer.from(debug > 0 ? JSON.stringify(document, null, 2) : JSON.stringify(document));
}

async function captureCpu(session: Session, seconds: number): Promise<unknown> {
  await session.post("Profiler.enable");
  try {
    await session.post("Profiler.start");
    await sleep(seconds * 1000);
    const { profile } = await session.post("Profiler.stop");
    return profile;
  } finally {
    await session.post("Profiler.disable");
  }
}

async function captureHeapSnapshot(session: Session): Promise<string> {
  const chunks: string[] = [];
  session.on("HeapProfiler.addHeapSnapshotChunk", (message) => {
    chunks.push(message.params.chunk);
  });
  await session.post("HeapProfiler.takeHeapSnapshot", { reportProgress: false });
  return chunks.join("");
}

async function captureAllocations(session: Session, seconds: number): Promise<unknown> {
  await session.post("HeapProfiler.enable");
  try {
    await session.post("HeapProfiler.startSampling");
    await sleep(seconds * 1000);
    const { profile } = await session.post("HeapProfiler.stopSampling");
    return profile;
  } finally {
    await session.post("HeapProfiler.disable");
  }
}

export function createInspectorProfiler(): Profiler {
  return {
    async getProfileData(profileName, timeoutSeconds, debug) {
      if (!isProfileName(profileName)) {
        throw new EgressError(`profile not found: ${profileName}`, { code: "not_found" });
      }
      const seconds = Math.max(0, timeoutSeconds);
      log.debug("capturing profile", { profileName, seconds, debug });

      const session = new Session();
      session.connect();
      try {
        switch (profileName) {
          case "cpu":
            return encode(await captureCpu(session, seconds), debug);
          case "allocs":
            return encode(await captureAllocations(session, seconds), debug);
          case "heap": {
            const snapshot = await captureHeapSnapshot(session);
            // Snapshots are already JSON; only reformat when asked to
            return debug > 0 ? encode(JSON.parse(snapshot), debug) : Buffer.from(snapshot);
          }
        }
      } finally {
        session.disconnect();
      }
    },
  };
}
