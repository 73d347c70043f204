import { execFile, isNotFound } from "../../util/exec";
import type { AudioBackend, PlayOutcome } from "./types";

/** Wraps a command line player that takes the WAV path as its last argument. */
export const commandBackend = (
  name: string,
  bin: string,
  args: string[],
  timeoutMs: number,
): AudioBackend => ({
  name,
  async play(wavPath: string): Promise<PlayOutcome> {
    try {
      const res = await execFile(bin, [...args, wavPath], { timeoutMs });
      if (res.timedOut) return { kind: "timeout" };
      if (res.code === 0) return { kind: "ok" };
      return { kind: "failed", code: res.code, stderr: res.stderr.slice(0, 500) };
    } catch (e) {
      if (isNotFound(e)) return { kind: "not-found" };
      throw e;
    }
  },
});

const knownPlayers: Record<string, { bin: string; args: string[] }> = {
  "pw-play": { bin: "pw-play", args: [] },
  paplay: { bin: "paplay", args: [] },
  aplay: { bin: "aplay", args: ["-q"] },
  ffplay: { bin: "ffplay", args: ["-nodisp", "-autoexit", "-loglevel", "error"] },
  afplay: { bin: "afplay", args: [] },
};

export const knownPlayerNames = Object.keys(knownPlayers);

export const DEFAULT_PLAYERS = ["pw-play", "paplay", "aplay"];

/** Builds the fallback chain in the given order, most preferred first. */
export const createBackends = (names: string[], timeoutMs: number): AudioBackend[] =>
  names.map((name) => {
    const player = knownPlayers[name];
    if (!player) throw new Error(`unknown audio player ${name}`);
    return commandBackend(name, player.bin, player.args, timeoutMs);
  });
