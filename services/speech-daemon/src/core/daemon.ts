import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import type { AudioOutput } from "../modules/playback/types";
import type { SynthesisEngine } from "../modules/tts/types";
import { CommandError } from "../util/errors";
import { errorFields, log } from "../util/log";
import { createTrace, mark, msSinceStart, type Trace } from "../util/trace";
import { parseCommand, type Command } from "./commands";
import { setSpeechRate, setVoice, stopSession, type SessionState } from "./session";

export type Ack = "OK" | "ERROR";

export interface DaemonDeps {
  engine: SynthesisEngine;
  output: AudioOutput;
  session: SessionState;
  writeAck: (ack: Ack) => void;
  maxLineLength?: number;
}

export const DEFAULT_MAX_LINE_LENGTH = 65_536;

/**
 * Reads commands one line at a time and answers each handled line with a
 * single ack. A line is fully handled (synthesis and playback included)
 * before the next one is read.
 */
export class SpeechDaemon {
  private voices: ReadonlySet<string>;
  private maxLineLength: number;
  private reader: Interface | null = null;

  constructor(private deps: DaemonDeps) {
    this.voices = deps.engine.listVoices();
    this.maxLineLength = deps.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  }

  get session(): SessionState {
    return this.deps.session;
  }

  /** Returns the ack for `raw`, or null when the line gets none (blank, QUIT). */
  async handleLine(raw: string): Promise<Ack | null> {
    const line = raw.trim();
    if (!line) return null;

    const trace = createTrace();
    const cmd = parseCommand(line);
    if (cmd.kind === "quit") {
      log.info("quit command received", { traceId: trace.traceId });
      this.stop();
      return null;
    }

    this.session.handled += 1;
    if (line.length > this.maxLineLength) {
      log.warn("line too long, rejected", { traceId: trace.traceId, length: line.length, max: this.maxLineLength });
      this.session.failed += 1;
      return "ERROR";
    }

    try {
      await this.dispatch(cmd, trace);
      return "OK";
    } catch (e) {
      this.session.failed += 1;
      const fields = { traceId: trace.traceId, command: cmd.kind, elapsedMs: msSinceStart(trace), ...errorFields(e) };
      if (e instanceof CommandError) log.warn("command rejected", fields);
      else log.error("request failed", fields);
      return "ERROR";
    }
  }

  async run(input: Readable): Promise<void> {
    if (!this.session.running) return;
    const reader = createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.reader = reader;
    log.info("server ready, waiting for requests", {
      sessionId: this.session.id,
      voice: this.session.activeVoice,
      speed: this.session.speechRate,
    });

    try {
      for await (const line of reader) {
        // lines already buffered when stop() ran are dropped
        if (!this.session.running) break;
        const ack = await this.handleLine(line);
        if (ack) this.deps.writeAck(ack);
        if (!this.session.running) break;
      }
    } finally {
      reader.close();
      this.reader = null;
    }

    log.info("server shutting down", {
      sessionId: this.session.id,
      handled: this.session.handled,
      failed: this.session.failed,
    });
  }

  /** Ends the read loop. A request already in flight still completes and is acked. */
  stop() {
    stopSession(this.session);
    this.reader?.close();
  }

  private async dispatch(cmd: Exclude<Command, { kind: "quit" }>, trace: Trace): Promise<void> {
    switch (cmd.kind) {
      case "voice":
        setVoice(this.session, this.voices, cmd.voice);
        log.info("voice changed", { traceId: trace.traceId, voice: this.session.activeVoice });
        return;

      case "speed":
        setSpeechRate(this.session, cmd.value);
        log.info("speed changed", { traceId: trace.traceId, speed: this.session.speechRate });
        return;

      case "speak":
        await this.speak(cmd.text, trace);
        return;

      default: {
        const _exhaustive: never = cmd;
        return _exhaustive;
      }
    }
  }

  private async speak(text: string, trace: Trace): Promise<void> {
    if (!text) throw new CommandError("empty text");

    const { activeVoice: voice, speechRate: speed } = this.session;
    log.info("generating speech", { traceId: trace.traceId, voice, speed, textPreview: text.slice(0, 50) });

    const result = await this.deps.engine.synthesize(text, voice, speed);
    mark(trace, "synthesized");

    const report = await this.deps.output.play(result);
    mark(trace, "played");

    log.info("speech completed", {
      traceId: trace.traceId,
      backend: report.backend,
      attempted: report.attempted,
      marks: trace.marks,
      elapsedMs: msSinceStart(trace),
    });
  }
}
