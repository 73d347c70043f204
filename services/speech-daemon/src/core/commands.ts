// Command tokens are reserved words: a sentence that happens to start with
// "SPEAK:", "VOICE:" or "SPEED:", or that is exactly "QUIT", is taken as the
// command. There is no escaping; callers that send arbitrary text rely on the
// verbatim fallback for everything else.

export type Command =
  | { kind: "speak"; text: string; explicit: boolean }
  | { kind: "voice"; voice: string }
  | { kind: "speed"; value: string }
  | { kind: "quit" };

const prefixed = [
  { prefix: "SPEAK:", build: (arg: string): Command => ({ kind: "speak", text: arg, explicit: true }) },
  { prefix: "VOICE:", build: (arg: string): Command => ({ kind: "voice", voice: arg }) },
  { prefix: "SPEED:", build: (arg: string): Command => ({ kind: "speed", value: arg }) },
].sort((a, b) => b.prefix.length - a.prefix.length);

/** Classifies one already-trimmed, non-empty input line. */
export const parseCommand = (line: string): Command => {
  if (line === "QUIT") return { kind: "quit" };

  for (const { prefix, build } of prefixed) {
    if (line.startsWith(prefix)) return build(line.slice(prefix.length).trim());
  }

  return { kind: "speak", text: line, explicit: false };
};
