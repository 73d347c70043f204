import type { SynthesisResult } from "../tts/types";

export type PlayOutcome =
  | { kind: "ok" }
  | { kind: "not-found" }
  | { kind: "timeout" }
  | { kind: "failed"; code: number | null; stderr: string };

/** One way of playing a WAV file, e.g. a PipeWire or ALSA command line player. */
export interface AudioBackend {
  name: string;
  play(wavPath: string): Promise<PlayOutcome>;
}

export interface PlaybackReport {
  backend: string;
  attempted: string[];
  elapsedMs: number;
}

export interface AudioOutput {
  play(result: SynthesisResult): Promise<PlaybackReport>;
}
