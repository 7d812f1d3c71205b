import type { ChannelKind } from "./types.js";

/**
 * Base class of every recoverable failure raised by the monitor.
 */
export class MonitorError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Connection, handshake or certificate parsing failure for one endpoint.
 *
 * The message is the underlying socket or TLS error text, unchanged.
 */
export class ProbeError extends MonitorError {
  constructor(
    message: string,
    readonly hostname: string,
    readonly port: number,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ChannelSendError extends MonitorError {
  constructor(
    message: string,
    readonly channel: ChannelKind,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Unreadable, corrupt or incompatible state file. Always recovered with an empty store.
 */
export class StateLoadError extends MonitorError {
  constructor(
    message: string,
    readonly path: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends MonitorError {
  constructor(
    message: string,
    readonly path: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
