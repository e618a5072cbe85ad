import { once } from "node:events";
import type { ServerResponse } from "node:http";
import type { SubscriberChannel } from "./hub.js";

export const sseHeaders = {
  "content-type": "text/event-stream; charset=utf-8",
  "cache-control": "no-cache, no-transform",
  connection: "keep-alive",
  "x-accel-buffering": "no",
} as const;

export const formatSseEvent = (event: string, data: string): string =>
  `event: ${event}\n${data
    .split("\n")
    .map((line) => `data: ${line}`)
    .join("\n")}\n\n`;

/**
 * Writes hub messages to an event-stream response as `capture` events once
 * `opened` settles. A full socket buffer holds the next write until the
 * response drains.
 */
export const createSseChannel = (
  response: ServerResponse,
  opened: Promise<void> = Promise.resolve()
): SubscriberChannel => ({
  async send(message) {
    await opened;
    if (response.writableEnded || response.destroyed) {
      throw new Error("event stream already closed");
    }
    if (!response.write(formatSseEvent("capture", message))) {
      await Promise.race([once(response, "drain"), once(response, "close")]);
    }
  },
  close() {
    if (!response.writableEnded) {
      response.end();
    }
  },
});

export const writeSseComment = (response: ServerResponse, comment: string): void => {
  if (!response.writableEnded && !response.destroyed) {
    response.write(`: ${comment}\n\n`);
  }
};
