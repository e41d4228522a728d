import { v4 as uuid } from "uuid";

export type Trace = {
  traceId: string;
  startedAt: number;
};

// Caller-supplied ids are capped so a hostile header cannot bloat every log line.
const MAX_TRACE_ID = 128;

export const createTrace = (seed?: string): Trace => {
  const trimmed = seed?.trim().slice(0, MAX_TRACE_ID);
  const traceId = trimmed ? trimmed : uuid();
  return { traceId, startedAt: Date.now() };
};

export const msSinceStart = (trace: Trace) => Date.now() - trace.startedAt;
