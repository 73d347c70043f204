import { describe, it, expect, beforeEach } from "vitest";
import { PassThrough, Readable } from "node:stream";
import type { AudioOutput, PlaybackReport } from "../modules/playback/types";
import type { SynthesisEngine, SynthesisResult } from "../modules/tts/types";
import { PlaybackError, SynthesisError } from "../util/errors";
import { SpeechDaemon, type Ack } from "./daemon";
import { createSession } from "./session";

type SynthCall = { text: string; voice: string; speed: number };

class FakeEngine implements SynthesisEngine {
  calls: SynthCall[] = [];
  failWith: Error | null = null;
  gate: Promise<void> | null = null;

  constructor(private voices: ReadonlySet<string> = new Set(["af_bella", "af_sarah", "am_adam"])) {}

  listVoices(): ReadonlySet<string> {
    return this.voices;
  }

  async synthesize(text: string, voice: string, speed: number): Promise<SynthesisResult> {
    this.calls.push({ text, voice, speed });
    if (this.gate) await this.gate;
    if (this.failWith) throw this.failWith;
    return { samples: new Float32Array([0, 0.5, -0.5]), sampleRate: 24_000 };
  }
}

class FakeOutput implements AudioOutput {
  played: SynthesisResult[] = [];
  fail = false;

  async play(result: SynthesisResult): Promise<PlaybackReport> {
    this.played.push(result);
    if (this.fail) throw new PlaybackError([{ backend: "pw-play", outcome: "not-found" }]);
    return { backend: "pw-play", attempted: ["pw-play"], elapsedMs: 0 };
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

describe("SpeechDaemon", () => {
  let engine: FakeEngine;
  let output: FakeOutput;
  let acks: Ack[];
  let daemon: SpeechDaemon;

  beforeEach(() => {
    engine = new FakeEngine();
    output = new FakeOutput();
    acks = [];
    daemon = new SpeechDaemon({
      engine,
      output,
      session: createSession("af_bella"),
      writeAck: (ack) => acks.push(ack),
    });
  });

  it("acks a voice change, speed change and speech, and nothing for QUIT", async () => {
    await daemon.run(linesOf("VOICE:af_sarah", "SPEED:1.0", "SPEAK:Hello world", "QUIT"));

    expect(acks).toEqual(["OK", "OK", "OK"]);
    expect(engine.calls).toEqual([{ text: "Hello world", voice: "af_sarah", speed: 1.0 }]);
    expect(output.played).toHaveLength(1);
    expect(daemon.session.running).toBe(false);
    expect(daemon.session.handled).toBe(3);
    expect(daemon.session.failed).toBe(0);
  });

  it("uses each catalog voice for the following speech", async () => {
    for (const voice of ["af_bella", "af_sarah", "am_adam"]) {
      expect(await daemon.handleLine(`VOICE:${voice}`)).toBe("OK");
      expect(await daemon.handleLine("SPEAK:hello")).toBe("OK");
      expect(engine.calls.at(-1)).toEqual({ text: "hello", voice, speed: 1.0 });
    }
  });

  it("rejects an unknown voice and keeps the current one", async () => {
    await daemon.handleLine("VOICE:af_sarah");
    expect(await daemon.handleLine("VOICE:not-a-real-voice")).toBe("ERROR");
    expect(daemon.session.activeVoice).toBe("af_sarah");
  });

  it("acks the same voice command twice with no state change", async () => {
    expect(await daemon.handleLine("VOICE:am_adam")).toBe("OK");
    const voice = daemon.session.activeVoice;
    const speed = daemon.session.speechRate;
    expect(await daemon.handleLine("VOICE:am_adam")).toBe("OK");
    expect(daemon.session.activeVoice).toBe(voice);
    expect(daemon.session.speechRate).toBe(speed);
  });

  it("applies a valid speed to later speech and rejects a malformed one", async () => {
    expect(await daemon.handleLine("SPEED:1.5")).toBe("OK");
    expect(await daemon.handleLine("SPEAK:faster")).toBe("OK");
    expect(engine.calls).toEqual([{ text: "faster", voice: "af_bella", speed: 1.5 }]);

    expect(await daemon.handleLine("SPEED:abc")).toBe("ERROR");
    expect(daemon.session.speechRate).toBe(1.5);
  });

  it("speaks unmatched lines verbatim", async () => {
    expect(await daemon.handleLine("  Good morning, Dana.  ")).toBe("OK");
    expect(engine.calls).toEqual([{ text: "Good morning, Dana.", voice: "af_bella", speed: 1.0 }]);
  });

  it("rejects an empty SPEAK without synthesizing", async () => {
    expect(await daemon.handleLine("SPEAK:   ")).toBe("ERROR");
    expect(engine.calls).toEqual([]);
  });

  it("skips blank lines without an ack", async () => {
    await daemon.run(linesOf("", "   ", "SPEAK:one", "\t"));
    expect(acks).toEqual(["OK"]);
  });

  it("turns synthesis and playback failures into ERROR and keeps reading", async () => {
    engine.failWith = new SynthesisError("kokoro failed (code 1)");
    const lines = ["SPEAK:first", "SPEAK:second", "SPEAK:third"];
    const input = new PassThrough();
    const running = daemon.run(input);

    input.write(`${lines[0]}\n`);
    await waitFor(() => acks.length === 1);
    engine.failWith = null;
    output.fail = true;
    input.write(`${lines[1]}\n`);
    await waitFor(() => acks.length === 2);
    output.fail = false;
    input.end(`${lines[2]}\n`);
    await running;

    expect(acks).toEqual(["ERROR", "ERROR", "OK"]);
    expect(engine.calls.map((c) => c.text)).toEqual(["first", "second", "third"]);
    expect(daemon.session.failed).toBe(2);
  });

  it("stops at QUIT even when more lines follow", async () => {
    await daemon.run(linesOf("SPEAK:before", "QUIT", "SPEAK:after"));
    expect(acks).toEqual(["OK"]);
    expect(engine.calls.map((c) => c.text)).toEqual(["before"]);
  });

  it("ends cleanly when the input closes", async () => {
    await daemon.run(linesOf("SPEAK:only line"));
    expect(acks).toEqual(["OK"]);
    expect(daemon.session.running).toBe(true);
  });

  it("rejects lines over the length limit", async () => {
    const small = new SpeechDaemon({
      engine,
      output,
      session: createSession("af_bella"),
      writeAck: (ack) => acks.push(ack),
      maxLineLength: 10,
    });
    expect(await small.handleLine("SPEAK:hello world")).toBe("ERROR");
    expect(await small.handleLine("SPEAK:hi")).toBe("OK");
    expect(engine.calls.map((c) => c.text)).toEqual(["hi"]);
  });

  it("returns promptly when stopped while waiting for input", async () => {
    const input = new PassThrough();
    const running = daemon.run(input);
    daemon.stop();
    await running;
    expect(acks).toEqual([]);
    expect(daemon.session.running).toBe(false);
  });

  it("finishes and acks the in-flight request when stopped mid-request", async () => {
    let release = () => {};
    engine.gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const input = new PassThrough();
    const running = daemon.run(input);

    input.write("SPEAK:first\nSPEAK:second\n");
    await waitFor(() => engine.calls.length === 1);
    daemon.stop();
    release();
    await running;

    expect(acks).toEqual(["OK"]);
    expect(engine.calls.map((c) => c.text)).toEqual(["first"]);
  });
});
