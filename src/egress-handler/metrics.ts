/**
 * Metrics rendering for the introspection socket.
 *
 * The parent process scrapes each handler through this and merges the result
 * into its own exposition, so the output is plain Prometheus text.
 */

import { collectDefaultMetrics, register, type Registry } from "prom-client";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("egress-handler/metrics");

export type MetricsRegistry = Pick<Registry, "getMetricsAsArray" | "getSingleMetricAsString">;

export type RenderedMetrics = {
  text: string;
  /** Number of sample lines written */
  count: number;
};

export const defaultRegistry: MetricsRegistry = register;

const withProcessMetrics = new WeakSet<Registry>();

/**
 * Register the process and Node.js runtime collectors (CPU, memory, event loop
 * lag, GC, handles) on a registry. Repeat calls are no-ops.
 */
export function registerProcessMetrics(registry: Registry = register): void {
  if (withProcessMetrics.has(registry)) {
    return;
  }
  withProcessMetrics.add(registry);
  collectDefaultMetrics({ register: registry });
}

function countSamples(family: string): number {
  let count = 0;
  for (const line of family.split("\n")) {
    if (line.length > 0 && !line.startsWith("#")) {
      count++;
    }
  }
  return count;
}

/**
 * Render every metric family in registration order. The first family that
 * fails aborts the render.
 */
export async function renderMetrics(registry: MetricsRegistry): Promise<RenderedMetrics> {
  const families = registry.getMetricsAsArray();
  log.debug("rendering metrics", { families: families.length });

  const chunks: string[] = [];
  let count = 0;
  for (const family of families) {
    let rendered: string;
    try {
      rendered = await registry.getSingleMetricAsString(family.name);
    } catch (err) {
      log.error(`error writing metric family ${family.name}: ${String(err)}`);
      throw err;
    }
    chunks.push(`${rendered}\n`);
    count += countSamples(rendered);
  }

  return { text: chunks.join(""), count };
}
