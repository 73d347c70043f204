import { randomUUID } from "node:crypto";

export type Trace = {
  traceId: string;
  startedAt: number;
  marks: Record<string, number>;
};

export const createTrace = (traceId?: string): Trace => {
  const id = traceId && traceId.trim() ? traceId.trim() : `req_${randomUUID().slice(0, 8)}`;
  return { traceId: id, startedAt: Date.now(), marks: {} };
};

/** Records the elapsed time since the trace started under `stage`. */
export const mark = (trace: Trace, stage: string) => {
  trace.marks[stage] = Date.now() - trace.startedAt;
};

export const msSinceStart = (trace: Trace) => Date.now() - trace.startedAt;
