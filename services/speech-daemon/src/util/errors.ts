export type DaemonErrorCode =
  | "LOAD_FAILED"
  | "SYNTHESIS_FAILED"
  | "PLAYBACK_FAILED"
  | "BAD_COMMAND";

export class DaemonError extends Error {
  constructor(
    readonly code: DaemonErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The model or voice bank could not be loaded. Fatal at startup. */
export class LoadError extends DaemonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("LOAD_FAILED", message, options);
  }
}

export class SynthesisError extends DaemonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SYNTHESIS_FAILED", message, options);
  }
}

export interface PlaybackAttempt {
  backend: string;
  outcome: "not-found" | "timeout" | "failed";
  code?: number | null;
  stderr?: string;
}

/** Every audio backend was tried and none exited zero. */
export class PlaybackError extends DaemonError {
  constructor(readonly attempts: PlaybackAttempt[]) {
    super(
      "PLAYBACK_FAILED",
      `all audio backends failed (${attempts.map((a) => `${a.backend}:${a.outcome}`).join(", ") || "none configured"})`,
    );
  }
}

/** A command line was well-formed enough to classify but its argument was rejected. */
export class CommandError extends DaemonError {
  constructor(message: string) {
    super("BAD_COMMAND", message);
  }
}
