import {
  type Clock,
  normalizeSymbol,
  type RawObservation,
} from "@price-collector/primitives";
import WebSocket from "ws";
import { z } from "zod";
import { errorMessage, ProtocolError } from "../errors.ts";
import type { Logger } from "../logger.ts";
import type { FeedStatus, ObservationSink, PriceFeed } from "./types.ts";

const updateSchema = z.object({
  type: z.literal("update"),
  payload: z.object({
    symbol: z.string().min(1),
    value: z.coerce.number().finite(),
    timestamp: z.coerce.number().finite(),
  }),
});

const envelopeSchema = z.object({ type: z.string() }).passthrough();

/**
 * Returns null for control frames (pong, subscription acks) and throws
 * `ProtocolError` for anything that claims to be an update but is not one.
 */
export function parsePushMessage(
  raw: string,
  quote: string,
): RawObservation | null {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    throw new ProtocolError("Push message is not JSON");
  }

  const envelope = envelopeSchema.safeParse(message);
  if (!envelope.success || envelope.data.type !== "update") {
    return null;
  }

  const update = updateSchema.safeParse(message);
  if (!update.success) {
    throw new ProtocolError(
      `Malformed update: ${update.error.issues.map((issue) => issue.path.join(".")).join(", ")}`,
    );
  }

  const { symbol, value, timestamp } = update.data.payload;
  return {
    symbol: normalizeSymbol(symbol, quote),
    price: value,
    observedAt: Math.floor(timestamp / 1000),
    sequenceId: 0,
  };
}

interface PushFeedOptions {
  name?: string;
  url: string;
  topic: string;
  quote: string;
  pingIntervalMs: number;
  reconnectDelayMs: number;
  clock: Clock;
  logger: Logger;
  sink: ObservationSink;
}

/**
 * Subscribes to a live price topic. Probes the socket on a fixed interval
 * whether or not data is flowing, and reconnects after a fixed delay on any
 * connect or read failure until `stop` is called.
 */
export class PushFeedAdapter implements PriceFeed {
  readonly name: string;
  private readonly options: PushFeedOptions;
  private ws: WebSocket | null = null;
  private running = false;
  private connected = false;
  private pingTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private lastObservationAt: number | null = null;
  private errors = 0;
  private reconnects = 0;
  private dropped = 0;

  constructor(options: PushFeedOptions) {
    this.options = options;
    this.name = options.name ?? "push";
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.options.logger.info(
      { url: this.options.url, topic: this.options.topic },
      "starting push feed",
    );
    this.connect();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.stopProbe();

    const socket = this.ws;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }
    const closed = new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
    });
    if (socket.readyState === WebSocket.OPEN) {
      socket.close();
    } else {
      socket.terminate();
    }
    await closed;
    this.options.logger.info("push feed stopped");
  }

  status(): FeedStatus {
    return {
      name: this.name,
      kind: "push",
      connected: this.connected,
      lastObservationAt: this.lastObservationAt,
      errors: this.errors,
      detail: {
        url: this.options.url,
        reconnects: this.reconnects,
        dropped: this.dropped,
      },
    };
  }

  private connect(): void {
    const socket = new WebSocket(this.options.url);
    this.ws = socket;

    socket.on("open", () => {
      this.connected = true;
      socket.send(
        JSON.stringify({
          action: "subscribe",
          subscriptions: [{ topic: this.options.topic, type: "update" }],
        }),
      );
      this.options.logger.info({ topic: this.options.topic }, "subscribed to push feed");
      this.startProbe(socket);
    });

    socket.on("message", (data) => {
      this.handleMessage(data.toString());
    });

    socket.on("error", (error) => {
      this.errors += 1;
      this.options.logger.error(
        { error: errorMessage(error) },
        "push feed connection error",
      );
    });

    socket.on("close", () => {
      this.connected = false;
      this.stopProbe();
      if (this.ws === socket) {
        this.ws = null;
      }
      if (this.running) {
        this.scheduleReconnect();
      }
    });
  }

  private handleMessage(raw: string): void {
    let observation: RawObservation | null;
    try {
      observation = parsePushMessage(raw, this.options.quote);
    } catch (error) {
      this.dropped += 1;
      this.options.logger.warn(
        { error: errorMessage(error) },
        "dropped push message",
      );
      return;
    }
    if (!observation) {
      return;
    }
    this.lastObservationAt = this.options.clock();
    this.options.sink(observation);
  }

  private startProbe(socket: WebSocket): void {
    this.stopProbe();
    this.pingTimer = setInterval(() => {
      if (socket.readyState !== WebSocket.OPEN) return;
      socket.send(JSON.stringify({ type: "ping" }), (error) => {
        if (error) {
          this.options.logger.warn(
            { error: errorMessage(error) },
            "push feed ping failed",
          );
        }
      });
    }, this.options.pingIntervalMs);
  }

  private stopProbe(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.options.logger.info(
      { delayMs: this.options.reconnectDelayMs },
      "push feed disconnected, reconnecting",
    );
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.running) return;
      this.reconnects += 1;
      this.connect();
    }, this.options.reconnectDelayMs);
  }
}
