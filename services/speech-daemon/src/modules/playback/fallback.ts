import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { writeWavFile } from "../../util/audio";
import { PlaybackError, type PlaybackAttempt } from "../../util/errors";
import { log } from "../../util/log";
import type { SynthesisResult } from "../tts/types";
import type { AudioBackend, AudioOutput, PlaybackReport, PlayOutcome } from "./types";

/**
 * Plays a synthesis result through the first backend that exits zero.
 *
 * The samples are written to a WAV file in a fresh temp directory, which is
 * removed once the chain finishes, whichever way it finishes. A backend that
 * is missing, times out, throws, or exits non-zero just moves the chain on.
 */
export class FallbackAudioOutput implements AudioOutput {
  constructor(
    private backends: AudioBackend[],
    private opts: { tmpRoot?: string } = {},
  ) {}

  async play(result: SynthesisResult): Promise<PlaybackReport> {
    const started = Date.now();
    const tmpDir = await fs.mkdtemp(path.join(this.opts.tmpRoot ?? os.tmpdir(), "speech-daemon-play-"));
    const wavPath = path.join(tmpDir, `speech_${randomUUID().slice(0, 8)}.wav`);

    try {
      await writeWavFile(wavPath, result);

      const attempts: PlaybackAttempt[] = [];
      for (const backend of this.backends) {
        let outcome: PlayOutcome;
        try {
          outcome = await backend.play(wavPath);
        } catch (e) {
          outcome = { kind: "failed", code: null, stderr: e instanceof Error ? e.message : String(e) };
        }

        if (outcome.kind === "ok") {
          const report = {
            backend: backend.name,
            attempted: [...attempts.map((a) => a.backend), backend.name],
            elapsedMs: Date.now() - started,
          };
          log.info("playback finished", { ...report });
          return report;
        }

        const attempt: PlaybackAttempt =
          outcome.kind === "failed"
            ? { backend: backend.name, outcome: "failed", code: outcome.code, stderr: outcome.stderr }
            : { backend: backend.name, outcome: outcome.kind };
        log.debug("audio backend unavailable, trying next", { ...attempt });
        attempts.push(attempt);
      }

      throw new PlaybackError(attempts);
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }
}
