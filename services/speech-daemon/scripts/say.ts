/*
  Sends text to a running speech daemon through its FIFO.

  Examples:
    npm run say -- --text "hello"
    npm run say -- --fifo /tmp/speech-daemon.fifo --voice af_sarah --speed 1.2 --text "hello"
*/

import fs from "node:fs/promises";

const arg = (name: string): string | undefined => {
  const idx = process.argv.indexOf(name);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
};

const fifo = arg("--fifo") ?? process.env.INBOUND_PATH ?? "/tmp/speech-daemon.fifo";
const text = arg("--text");
const voice = arg("--voice");
const speed = arg("--speed");

const main = async () => {
  if (!text && !voice && !speed) {
    throw new Error("Provide --text, --voice or --speed");
  }

  const stat = await fs.stat(fifo).catch(() => undefined);
  if (!stat?.isFIFO()) {
    throw new Error(`speech daemon not running (no fifo at ${fifo})`);
  }

  const lines: string[] = [];
  if (voice) lines.push(`VOICE:${voice}`);
  if (speed) lines.push(`SPEED:${speed}`);
  // newlines would split the text into several commands
  if (text) lines.push(`SPEAK:${text.replace(/\s*\n\s*/g, " ")}`);

  // one write so a concurrent sender cannot interleave between our lines
  await fs.appendFile(fifo, lines.map((l) => `${l}\n`).join(""));
};

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
