import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_MAX_LINE_LENGTH } from "./core/daemon";
import { isDecimalNumber } from "./core/session";
import { DEFAULT_PLAYERS, knownPlayerNames } from "./modules/playback/players";
import { isLogThreshold, type LogThreshold } from "./util/log";

const MODELS_DIR = "/opt/kokoro-tts/models";

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

const expandHome = (v: string) => (v === "~" || v.startsWith("~/") ? path.join(os.homedir(), v.slice(1)) : v);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  KOKORO_BIN: z.string().trim().min(1).default("kokoro-tts"),
  KOKORO_MODEL_PATH: z.string().trim().min(1).default(path.join(MODELS_DIR, "kokoro-v1.0.onnx")),
  KOKORO_VOICES_PATH: z.string().trim().min(1).default(path.join(MODELS_DIR, "voices.bin")),
  KOKORO_LANG: z.string().trim().min(1).default("en-us"),
  DEFAULT_VOICE: z.string().trim().min(1).default("af_bella"),
  DEFAULT_SPEED: z
    .string()
    .trim()
    .default("1.0")
    .refine(isDecimalNumber, { message: "expected a decimal number" })
    .transform(Number)
    .pipe(z.number().finite().positive()),
  SYNTH_TIMEOUT_MS: positiveInt(120_000),
  PLAYBACK_TIMEOUT_MS: positiveInt(10_000),
  AUDIO_PLAYERS: z
    .string()
    .default(DEFAULT_PLAYERS.join(","))
    .transform((v) =>
      v
        .split(",")
        .map((p) => p.trim())
        .filter(Boolean),
    )
    .pipe(
      z
        .array(z.string().refine((p) => knownPlayerNames.includes(p), (p) => ({ message: `unknown audio player ${p}` })))
        .min(1),
    ),
  INBOUND_PATH: optionalString,
  MAX_LINE_LENGTH: positiveInt(DEFAULT_MAX_LINE_LENGTH),
  LOG_FILE: z
    .string()
    .trim()
    .min(1)
    .default(path.join(os.homedir(), ".cache", "speech-daemon", "speech-daemon.log"))
    .transform(expandHome),
  LOG_LEVEL: z.string().trim().default("info").refine(isLogThreshold, { message: "expected debug|info|warn|error|silent" }),
  HEALTH_PORT: optionalString.pipe(z.coerce.number().int().min(0).max(65_535).optional()),
});

export type DaemonConfig = {
  kokoro: { binPath: string; modelPath: string; voicesPath: string; lang: string; timeoutMs: number };
  defaultVoice: string;
  defaultSpeed: number;
  players: string[];
  playbackTimeoutMs: number;
  inboundPath?: string;
  maxLineLength: number;
  logFile: string;
  logLevel: LogThreshold;
  healthPort?: number;
};

/** Validates `env` into a config. Throws with every offending variable listed. */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): DaemonConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    kokoro: {
      binPath: e.KOKORO_BIN,
      modelPath: e.KOKORO_MODEL_PATH,
      voicesPath: e.KOKORO_VOICES_PATH,
      lang: e.KOKORO_LANG,
      timeoutMs: e.SYNTH_TIMEOUT_MS,
    },
    defaultVoice: e.DEFAULT_VOICE,
    defaultSpeed: e.DEFAULT_SPEED,
    players: e.AUDIO_PLAYERS,
    playbackTimeoutMs: e.PLAYBACK_TIMEOUT_MS,
    inboundPath: e.INBOUND_PATH,
    maxLineLength: e.MAX_LINE_LENGTH,
    logFile: e.LOG_FILE,
    logLevel: e.LOG_LEVEL,
    healthPort: e.HEALTH_PORT,
  };
};
