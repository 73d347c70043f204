import fs from "node:fs";
import type { Readable } from "node:stream";

/**
 * Opens the command stream. Without a path that is stdin. A FIFO is opened
 * read-write: the daemon then holds a writer of its own, so the stream stays
 * open between clients instead of ending when the first one closes. Regular
 * files end at their last line.
 */
export const openInbound = (inboundPath?: string): Readable => {
  if (!inboundPath) return process.stdin;
  if (fs.statSync(inboundPath).isFIFO()) {
    const fd = fs.openSync(inboundPath, "r+");
    return fs.createReadStream(inboundPath, { fd, encoding: "utf8" });
  }
  return fs.createReadStream(inboundPath, { encoding: "utf8" });
};
