import { randomUUID } from "node:crypto";
import { CommandError } from "../util/errors";

export interface SessionState {
  id: string;
  createdAt: number;
  activeVoice: string;
  speechRate: number;
  running: boolean;
  handled: number;
  failed: number;
}

export const createSession = (activeVoice: string, speechRate = 1.0): SessionState => ({
  id: `sess_${randomUUID().slice(0, 8)}`,
  createdAt: Date.now(),
  activeVoice,
  speechRate,
  running: true,
  handled: 0,
  failed: 0,
});

/**
 * Picks the startup voice: the preferred one when the catalog has it,
 * otherwise the first voice in sorted order.
 */
export const resolveDefaultVoice = (preferred: string, voices: ReadonlySet<string>): string => {
  if (voices.has(preferred)) return preferred;
  const [first] = [...voices].sort();
  if (first === undefined) throw new Error("voice catalog is empty");
  return first;
};

export const setVoice = (s: SessionState, voices: ReadonlySet<string>, voice: string) => {
  if (!voices.has(voice)) {
    throw new CommandError(`voice '${voice}' not available, keeping '${s.activeVoice}'`);
  }
  s.activeVoice = voice;
};

const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Plain decimal or exponent notation; no hex, binary, `inf` or `nan`. */
export const isDecimalNumber = (raw: string) => FLOAT_RE.test(raw);

export const parseSpeechRate = (raw: string): number => {
  const value = isDecimalNumber(raw) ? Number(raw) : NaN;
  if (!Number.isFinite(value) || value <= 0) {
    throw new CommandError(`invalid speed '${raw}'`);
  }
  return value;
};

export const setSpeechRate = (s: SessionState, raw: string) => {
  s.speechRate = parseSpeechRate(raw);
};

export const stopSession = (s: SessionState) => {
  s.running = false;
};
