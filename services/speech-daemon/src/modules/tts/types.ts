export interface SynthesisResult {
  /** mono float samples in [-1, 1] */
  samples: Float32Array;
  sampleRate: number;
}

export interface SynthesisEngine {
  /** Voice identifiers the loaded voice bank provides. Fixed for the engine's lifetime. */
  listVoices(): ReadonlySet<string>;
  synthesize(text: string, voice: string, speed: number): Promise<SynthesisResult>;
}
