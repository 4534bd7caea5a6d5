import { getLogger } from "../core/logger.js";
import { parseJsonRpcText } from "../core/jsonrpc.js";
import { errorMessage } from "../errors.js";
import type { JsonRpcId, JsonRpcMessage, JsonRpcResponse } from "../types.js";

export interface SseFrame {
  event: string;
  data: string;
  id?: string;
}

const log = getLogger("rpc");

/**
 * Decodes an event stream one frame at a time. Returning early from the consumer
 * cancels the underlying body, so a caller that only needs the first matching frame
 * never buffers the remainder.
 */
export async function* parseSseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<SseFrame> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let event = "";
  let data: string[] = [];
  let lastId: string | undefined;

  const dispatch = (): SseFrame | null => {
    if (data.length === 0) {
      event = "";
      return null;
    }

    const frame: SseFrame = { event: event || "message", data: data.join("\n") };
    if (lastId !== undefined) {
      frame.id = lastId;
    }
    event = "";
    data = [];
    return frame;
  };

  const consumeLine = (line: string): SseFrame | null => {
    if (line === "") {
      return dispatch();
    }

    if (line.startsWith(":")) {
      return null;
    }

    const colon = line.indexOf(":");
    const field = colon < 0 ? line : line.slice(0, colon);
    let value = colon < 0 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }

    if (field === "data") {
      data.push(value);
    } else if (field === "event") {
      event = value;
    } else if (field === "id" && !value.includes("\0")) {
      lastId = value;
    }

    return null;
  };

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      let newlineIndex = buffer.indexOf("\n");
      while (newlineIndex >= 0) {
        let line = buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);
        if (line.endsWith("\r")) {
          line = line.slice(0, -1);
        }

        const frame = consumeLine(line);
        if (frame) {
          yield frame;
        }
        newlineIndex = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      consumeLine(buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer);
    }

    const last = dispatch();
    if (last) {
      yield last;
    }
  } finally {
    try {
      await reader.cancel();
    } catch (error) {
      log.debug(`Event stream cancel failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Returns the first frame carrying a response to `expectedId`, whatever its event
 * name. Other JSON-RPC messages seen before it are handed to `onMessage`; frames
 * that are not JSON-RPC are skipped.
 */
export async function readSseResponse(
  frames: AsyncIterable<SseFrame>,
  expectedId: JsonRpcId,
  onMessage?: (message: JsonRpcMessage) => void
): Promise<JsonRpcResponse | null> {
  for await (const frame of frames) {
    const classified = parseJsonRpcText(frame.data);
    if (!classified) {
      log.debug("Skipping event stream frame that is not JSON-RPC");
      continue;
    }

    if (classified.kind === "response" && classified.message.id === expectedId) {
      return classified.message;
    }

    onMessage?.(classified.message);
  }

  return null;
}

export function encodeSseMessage(payload: JsonRpcMessage): string {
  return `event: message\ndata: ${JSON.stringify(payload)}\n\n`;
}
