/**
 * Egress Handler Types
 *
 * Job descriptor, control-plane requests and the wire shapes of the local
 * introspection socket.
 */

import type { ErrorCode } from "./errors.js";

// =============================================================================
// Job Descriptor
// =============================================================================

export type EgressStatus = "starting" | "active" | "ending" | "complete" | "failed" | "aborted";

export type EgressInfo = {
  egressId: string;
  roomName?: string;
  status: EgressStatus;
  /** Epoch milliseconds, 0 until set */
  startedAt: number;
  updatedAt: number;
  endedAt: number;
  error?: string;
  streamUrls: string[];
};

// =============================================================================
// Control Plane (message bus)
// =============================================================================

export type UpdateStreamRequest = {
  egressId: string;
  addOutputUrls: string[];
  removeOutputUrls: string[];
};

export type StopEgressRequest = {
  egressId: string;
};

// =============================================================================
// Introspection Plane (local socket)
// =============================================================================

export type PipelineDotRequest = {
  type: "pipeline-dot";
};

export type PProfRequest = {
  type: "pprof";
  profileName: string;
  /** Capture duration in seconds for sampled profiles */
  timeout: number;
  debug: number;
};

export type MetricsRequest = {
  type: "metrics";
};

export type IntrospectionRequest = PipelineDotRequest | PProfRequest | MetricsRequest;

type Failure = {
  success: false;
  code: ErrorCode;
  error: string;
};

export type PipelineDotResponse =
  | { type: "pipeline-dot"; success: true; dotFile: string }
  | ({ type: "pipeline-dot" } & Failure);

export type PProfResponse =
  /** pprofFile is base64 on the wire */
  | { type: "pprof"; success: true; pprofFile: string }
  | ({ type: "pprof" } & Failure);

export type MetricsResponse =
  | { type: "metrics"; success: true; metrics: string }
  | ({ type: "metrics" } & Failure);

/** Reply to a request the server could not parse */
export type InvalidRequestResponse = { type: "error" } & Failure;

export type IntrospectionResponse =
  | PipelineDotResponse
  | PProfResponse
  | MetricsResponse
  | InvalidRequestResponse;

/** What the handler exposes on the introspection socket */
export interface IntrospectionService {
  getPipelineDot(): Promise<{ dotFile: string }>;
  getPProf(req: Omit<PProfRequest, "type">): Promise<{ pprofFile: Buffer }>;
  getMetrics(): Promise<{ metrics: string }>;
}

/** What the handler exposes on the message bus */
export interface EgressHandlerService {
  updateStream(req: UpdateStreamRequest): Promise<EgressInfo>;
  stopEgress(req: StopEgressRequest): Promise<EgressInfo>;
}

/** Status-tracking side of the control plane */
export interface IOInfoService {
  updateEgress(info: EgressInfo): Promise<void>;
}
