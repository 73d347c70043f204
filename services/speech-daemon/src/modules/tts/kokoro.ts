import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { randomUUID } from "node:crypto";
import AdmZip from "adm-zip";
import { decodeWav } from "../../util/audio";
import { LoadError, SynthesisError } from "../../util/errors";
import { execFile, resolveExecutable } from "../../util/exec";
import { log } from "../../util/log";
import type { SynthesisEngine, SynthesisResult } from "./types";

export interface KokoroOptions {
  binPath: string;
  modelPath: string;
  voicesPath: string;
  lang: string;
  timeoutMs: number;
}

/**
 * Lists the voices in a Kokoro voice bank. The v1.0 bank is a numpy `.npz`
 * archive with one `<voice>.npy` entry per voice; older banks are JSON objects
 * keyed by voice.
 */
export const readVoiceBank = async (voicesPath: string): Promise<string[]> => {
  if (voicesPath.endsWith(".json")) {
    const parsed: unknown = JSON.parse(await fs.readFile(voicesPath, "utf8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error("voice bank json is not an object");
    }
    return Object.keys(parsed).sort();
  }

  const zip = new AdmZip(await fs.readFile(voicesPath));
  return zip
    .getEntries()
    .filter((e) => !e.isDirectory && e.entryName.endsWith(".npy"))
    .map((e) => path.basename(e.entryName, ".npy"))
    .sort();
};

export class KokoroTts implements SynthesisEngine {
  private constructor(
    private opts: KokoroOptions,
    private voices: ReadonlySet<string>,
  ) {}

  /** Checks both asset files and reads the voice catalog. Throws `LoadError`. */
  static async load(opts: KokoroOptions): Promise<KokoroTts> {
    for (const file of [opts.modelPath, opts.voicesPath]) {
      try {
        await fs.access(file);
      } catch (e) {
        throw new LoadError(`kokoro asset not readable: ${file}`, { cause: e });
      }
    }

    let voices: string[];
    try {
      voices = await readVoiceBank(opts.voicesPath);
    } catch (e) {
      throw new LoadError(`failed to read voice bank ${opts.voicesPath}`, { cause: e });
    }
    if (voices.length === 0) {
      throw new LoadError(`voice bank ${opts.voicesPath} contains no voices`);
    }

    log.info("kokoro loaded", { modelPath: opts.modelPath, voicesPath: opts.voicesPath, voices });
    return new KokoroTts(opts, new Set(voices));
  }

  listVoices(): ReadonlySet<string> {
    return this.voices;
  }

  async ready(): Promise<{ ok: boolean; details?: Record<string, unknown> }> {
    const details = {
      binPath: this.opts.binPath,
      modelPath: this.opts.modelPath,
      voicesPath: this.opts.voicesPath,
      voices: this.voices.size,
    };
    if (!(await resolveExecutable(this.opts.binPath))) {
      return { ok: false, details: { ...details, error: `kokoro binary ${this.opts.binPath} is not an executable on PATH` } };
    }
    try {
      await fs.access(this.opts.modelPath);
      await fs.access(this.opts.voicesPath);
      return { ok: true, details };
    } catch (e) {
      return { ok: false, details: { ...details, error: e instanceof Error ? e.message : String(e) } };
    }
  }

  async synthesize(text: string, voice: string, speed: number): Promise<SynthesisResult> {
    if (!this.voices.has(voice)) throw new SynthesisError(`unknown voice ${voice}`);

    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "speech-daemon-tts-"));
    const wavPath = path.join(tmpDir, `kokoro_${randomUUID().slice(0, 8)}.wav`);

    try {
      const started = Date.now();

      // kokoro-tts reads text from stdin when the input file is "-"
      const res = await execFile(
        this.opts.binPath,
        [
          "-",
          wavPath,
          "--model",
          this.opts.modelPath,
          "--voices",
          this.opts.voicesPath,
          "--voice",
          voice,
          "--speed",
          String(speed),
          "--lang",
          this.opts.lang,
          "--format",
          "wav",
        ],
        { inputText: text + "\n", timeoutMs: this.opts.timeoutMs },
      ).catch((e: unknown) => {
        throw new SynthesisError(`failed to start ${this.opts.binPath}`, { cause: e });
      });

      if (res.timedOut) {
        throw new SynthesisError(`kokoro timed out after ${this.opts.timeoutMs}ms`);
      }
      if (res.code !== 0) {
        log.warn("kokoro exited non-zero", { code: res.code, stderr: res.stderr.slice(0, 500) });
        throw new SynthesisError(`kokoro failed (code ${res.code})`);
      }

      let result: SynthesisResult;
      try {
        result = decodeWav(await fs.readFile(wavPath));
      } catch (e) {
        throw new SynthesisError("kokoro produced no usable wav", { cause: e });
      }

      log.info("tts synthesized", {
        elapsedMs: Date.now() - started,
        sampleCount: result.samples.length,
        sampleRate: result.sampleRate,
        textPreview: text.slice(0, 80),
      });
      return result;
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }
}
