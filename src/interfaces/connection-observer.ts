/**
 * Lifecycle notifications for the owner of a client.
 *
 * Callbacks run asynchronously on the sender's side of the pipeline, never
 * inside a producer's logging call. An observer that throws is logged and
 * otherwise ignored.
 * @module
 */

import type { LogshipError } from "../errors.js";

export interface ConnectEvent {
  /** False for the first successful connect of a pipeline, true afterwards. */
  reconnect: boolean;
  banner: string;
  host: string;
  port: number;
}

export interface ConnectionObserver {
  onConnect(event: ConnectEvent): void;
  onDisconnect(): void;
  onError(error: LogshipError): void;
}

export const noopObserver: ConnectionObserver = {
  onConnect() {},
  onDisconnect() {},
  onError() {},
};

/** Fill the missing callbacks of a partial observer with no-ops. */
export function toObserver(partial: Partial<ConnectionObserver> | undefined): ConnectionObserver {
  if (!partial) return noopObserver;
  return {
    onConnect: partial.onConnect?.bind(partial) ?? noopObserver.onConnect,
    onDisconnect: partial.onDisconnect?.bind(partial) ?? noopObserver.onDisconnect,
    onError: partial.onError?.bind(partial) ?? noopObserver.onError,
  };
}
