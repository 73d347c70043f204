import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PassThrough, Readable } from "node:stream";
import { startDaemon, type ReadyEngine } from "./app";
import { loadConfig } from "./config";
import type { Ack } from "./core/daemon";
import type { AudioOutput, PlaybackReport } from "./modules/playback/types";
import type { SynthesisResult } from "./modules/tts/types";
import { LoadError } from "./util/errors";
import { execFile } from "./util/exec";

class FakeEngine implements ReadyEngine {
  texts: string[] = [];
  voicesUsed: string[] = [];

  constructor(private voices: ReadonlySet<string> = new Set(["af_bella", "af_sarah"])) {}

  listVoices(): ReadonlySet<string> {
    return this.voices;
  }

  async ready() {
    return { ok: true };
  }

  async synthesize(text: string, voice: string): Promise<SynthesisResult> {
    this.texts.push(text);
    this.voicesUsed.push(voice);
    return { samples: new Float32Array([0, 0.5]), sampleRate: 24_000 };
  }
}

class FakeOutput implements AudioOutput {
  async play(): Promise<PlaybackReport> {
    return { backend: "aplay", attempted: ["aplay"], elapsedMs: 0 };
  }
}

async function waitFor(predicate: () => boolean, timeout = 2000) {
  const start = Date.now();
  return new Promise<void>((resolve, reject) => {
    const check = () => {
      if (predicate()) {
        resolve();
        return;
      }
      if (Date.now() - start > timeout) {
        reject(new Error("timed out waiting for condition"));
        return;
      }
      setTimeout(check, 5);
    };
    check();
  });
}

const linesOf = (...lines: string[]) => Readable.from([lines.map((l) => `${l}\n`).join("")]);

describe("startDaemon", () => {
  let engine: FakeEngine;
  let acks: Ack[];
  let signals: EventEmitter;

  beforeEach(() => {
    engine = new FakeEngine();
    acks = [];
    signals = new EventEmitter();
  });

  const deps = (input?: Readable) => ({
    loadEngine: async () => engine,
    output: new FakeOutput(),
    writeAck: (ack: Ack) => acks.push(ack),
    signals,
    input,
  });

  it("exits with code 1 when the engine fails to load", async () => {
    const input = new PassThrough();
    const code = await startDaemon(loadConfig({}), {
      ...deps(input),
      loadEngine: async () => {
        throw new LoadError("model file missing");
      },
    });

    expect(code).toBe(1);
    expect(acks).toEqual([]);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("serves requests until QUIT and exits with code 0", async () => {
    const input = linesOf("SPEAK:hello", "QUIT", "SPEAK:ignored");
    const code = await startDaemon(loadConfig({}), deps(input));

    expect(code).toBe(0);
    expect(acks).toEqual(["OK"]);
    expect(engine.texts).toEqual(["hello"]);
    expect(input.destroyed).toBe(true);
  });

  it("falls back to the first catalog voice when the default is missing", async () => {
    engine = new FakeEngine(new Set(["bf_emma", "am_adam"]));
    await startDaemon(loadConfig({ DEFAULT_VOICE: "af_bella" }), deps(linesOf("SPEAK:hello")));
    expect(engine.voicesUsed).toEqual(["am_adam"]);
  });

  it("stops on SIGTERM and removes its signal handlers", async () => {
    const input = new PassThrough();
    const running = startDaemon(loadConfig({}), deps(input));
    await waitFor(() => signals.listenerCount("SIGTERM") === 1);
    expect(signals.listenerCount("SIGINT")).toBe(1);

    signals.emit("SIGTERM", "SIGTERM");

    expect(await running).toBe(0);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
    expect(signals.listenerCount("SIGINT")).toBe(0);
  });

  describe("with INBOUND_PATH", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "inbound-test-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("keeps reading a FIFO across separate writers", async () => {
      const fifo = path.join(dir, "speech.fifo");
      expect((await execFile("mkfifo", [fifo])).code).toBe(0);
      const running = startDaemon(loadConfig({ INBOUND_PATH: fifo }), deps());

      await fs.appendFile(fifo, "SPEAK:one\n");
      await waitFor(() => acks.length === 1);
      await fs.appendFile(fifo, "SPEAK:two\n");
      await waitFor(() => acks.length === 2);

      expect(acks).toEqual(["OK", "OK"]);
      expect(engine.texts).toEqual(["one", "two"]);

      signals.emit("SIGTERM", "SIGTERM");
      // releases the read still waiting on the pipe so the stream can close
      await fs.appendFile(fifo, "\n");
      expect(await running).toBe(0);
    });

    it("ends at the last line of a regular file", async () => {
      const file = path.join(dir, "requests.txt");
      await fs.writeFile(file, "VOICE:af_sarah\nSPEAK:from a file\n");

      expect(await startDaemon(loadConfig({ INBOUND_PATH: file }), deps())).toBe(0);
      expect(acks).toEqual(["OK", "OK"]);
      expect(engine.voicesUsed).toEqual(["af_sarah"]);
    });
  });
});
