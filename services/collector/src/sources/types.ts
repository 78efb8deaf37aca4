import type { RawObservation } from "@price-collector/primitives";

/**
 * Request/response source. `connect` builds whatever the adapter derives
 * from an endpoint (clients, resolved contract metadata) and is called
 * again after every endpoint rotation. `poll` throws `RateLimitedError`,
 * `SourceUnavailableError` or `ProtocolError`.
 */
export interface PollAdapter {
  readonly kind: string;
  connect(endpoint: string): Promise<void>;
  poll(symbol: string): Promise<RawObservation>;
}

export type ObservationSink = (observation: RawObservation) => void;

export interface FeedStatus {
  name: string;
  kind: string;
  connected: boolean;
  lastObservationAt: number | null;
  errors: number;
  detail?: Record<string, unknown>;
}

/**
 * Lifecycle every feed exposes to the service, whether it polls or is
 * pushed to. Observations leave through the sink given at construction.
 */
export interface PriceFeed {
  readonly name: string;
  start(): void;
  stop(): Promise<void>;
  status(): FeedStatus;
}
