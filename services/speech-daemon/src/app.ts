import type { Server } from "node:http";
import type { Readable } from "node:stream";
import type { DaemonConfig } from "./config";
import { SpeechDaemon, type Ack } from "./core/daemon";
import { createSession, resolveDefaultVoice } from "./core/session";
import { startHealthServer, type HealthSource } from "./health";
import { openInbound } from "./inbound";
import { FallbackAudioOutput } from "./modules/playback/fallback";
import { createBackends } from "./modules/playback/players";
import type { AudioOutput } from "./modules/playback/types";
import { KokoroTts, type KokoroOptions } from "./modules/tts/kokoro";
import type { SynthesisEngine } from "./modules/tts/types";
import { errorFields, log } from "./util/log";

export type ReadyEngine = SynthesisEngine & Pick<HealthSource, "ready">;

type SignalSource = Pick<NodeJS.EventEmitter, "once" | "off">;

export interface StartDeps {
  loadEngine?: (opts: KokoroOptions) => Promise<ReadyEngine>;
  output?: AudioOutput;
  input?: Readable;
  writeAck?: (ack: Ack) => void;
  signals?: SignalSource;
}

const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

const writeStdout = (ack: Ack) => {
  process.stdout.write(`${ack}\n`);
};

/**
 * Loads the engine, builds the session and serves requests until the input
 * ends, QUIT arrives or a shutdown signal is received. Resolves with the
 * process exit code: 1 when the engine cannot be loaded, 0 otherwise.
 */
export const startDaemon = async (config: DaemonConfig, deps: StartDeps = {}): Promise<number> => {
  log.info("speech daemon starting", { pid: process.pid, inbound: config.inboundPath ?? "stdin" });

  const loadEngine = deps.loadEngine ?? ((opts: KokoroOptions) => KokoroTts.load(opts));
  let engine: ReadyEngine;
  try {
    engine = await loadEngine(config.kokoro);
  } catch (e) {
    log.error("failed to initialize kokoro", errorFields(e));
    return 1;
  }

  const voices = engine.listVoices();
  const voice = resolveDefaultVoice(config.defaultVoice, voices);
  if (voice !== config.defaultVoice) {
    log.warn("default voice not in voice bank, using first available", {
      requested: config.defaultVoice,
      using: voice,
    });
  }

  const session = createSession(voice, config.defaultSpeed);
  const daemon = new SpeechDaemon({
    engine,
    output: deps.output ?? new FallbackAudioOutput(createBackends(config.players, config.playbackTimeoutMs)),
    session,
    writeAck: deps.writeAck ?? writeStdout,
    maxLineLength: config.maxLineLength,
  });

  const input = deps.input ?? openInbound(config.inboundPath);
  const signals = deps.signals ?? process;
  const onSignal = (signal: NodeJS.Signals) => {
    log.info("received shutdown signal", { signal });
    daemon.stop();
  };
  for (const s of SHUTDOWN_SIGNALS) signals.once(s, onSignal);

  let health: Server | undefined;
  try {
    if (config.healthPort !== undefined) {
      health = await startHealthServer(
        { session, voices, players: config.players, ready: () => engine.ready() },
        config.healthPort,
      );
    }
    await daemon.run(input);
  } finally {
    for (const s of SHUTDOWN_SIGNALS) signals.off(s, onSignal);
    input.destroy();
    health?.close();
  }
  return 0;
};
