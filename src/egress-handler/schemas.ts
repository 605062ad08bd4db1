import { z } from "zod";

export const egressStatusSchema = z.enum([
  "starting",
  "active",
  "ending",
  "complete",
  "failed",
  "aborted",
]);

export const egressInfoSchema = z.object({
  egressId: z.string().min(1),
  roomName: z.string().optional(),
  status: egressStatusSchema.default("starting"),
  startedAt: z.number().int().nonnegative().default(0),
  updatedAt: z.number().int().nonnegative().default(0),
  endedAt: z.number().int().nonnegative().default(0),
  error: z.string().optional(),
  streamUrls: z.array(z.string()).default([]),
});

export const updateStreamRequestSchema = z.object({
  egressId: z.string(),
  addOutputUrls: z.array(z.string()).default([]),
  removeOutputUrls: z.array(z.string()).default([]),
});

export const stopEgressRequestSchema = z.object({
  egressId: z.string(),
});

export const pprofRequestSchema = z.object({
  type: z.literal("pprof"),
  profileName: z.string().min(1),
  timeout: z.number().int().nonnegative().default(0),
  debug: z.number().int().nonnegative().default(0),
});

export const introspectionRequestSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("pipeline-dot") }),
  pprofRequestSchema,
  z.object({ type: z.literal("metrics") }),
]);
