/**
 * Diagnostics and observability for @qa-relay/fetch-client
 *
 * Uses Node.js diagnostics_channel for emitting request events.
 */
import diagnostics_channel from 'node:diagnostics_channel';
import type { TransportMode } from '@qa-relay/quota-tracker';
import type { DiagnosticsEvent } from './types.mjs';

/**
 * Channel names
 */
export const CHANNELS = {
  REQUEST_START: 'qa-relay:request:start',
  REQUEST_END: 'qa-relay:request:end',
  REQUEST_ERROR: 'qa-relay:request:error',
} as const;

const EVENT_NAMES: ReadonlySet<unknown> = new Set(['request:start', 'request:end', 'request:error']);

function isDiagnosticsEvent(message: unknown): message is DiagnosticsEvent {
  return (
    typeof message === 'object' &&
    message !== null &&
    'name' in message &&
    EVENT_NAMES.has(message.name)
  );
}

/**
 * Get or create a diagnostics channel
 */
function getChannel(name: string): diagnostics_channel.Channel {
  return diagnostics_channel.channel(name);
}

/**
 * Emit request start event
 */
export function emitRequestStart(mode: TransportMode, url: string): void {
  const channel = getChannel(CHANNELS.REQUEST_START);
  if (channel.hasSubscribers) {
    const event: DiagnosticsEvent = {
      name: 'request:start',
      timestamp: Date.now(),
      mode,
      url,
    };
    channel.publish(event);
  }
}

/**
 * Emit request end event
 */
export function emitRequestEnd(mode: TransportMode, url: string, status: number, duration: number): void {
  const channel = getChannel(CHANNELS.REQUEST_END);
  if (channel.hasSubscribers) {
    const event: DiagnosticsEvent = {
      name: 'request:end',
      timestamp: Date.now(),
      duration,
      mode,
      url,
      status,
    };
    channel.publish(event);
  }
}

/**
 * Emit request error event
 */
export function emitRequestError(
  mode: TransportMode,
  url: string,
  error: Error,
  duration: number,
  status?: number
): void {
  const channel = getChannel(CHANNELS.REQUEST_ERROR);
  if (channel.hasSubscribers) {
    const event: DiagnosticsEvent = {
      name: 'request:error',
      timestamp: Date.now(),
      duration,
      mode,
      url,
      status,
      error,
    };
    channel.publish(event);
  }
}

function subscribe(name: string, handler: (event: DiagnosticsEvent) => void): () => void {
  const channel = getChannel(name);
  const listener = (message: unknown): void => {
    if (isDiagnosticsEvent(message)) {
      handler(message);
    }
  };
  channel.subscribe(listener);
  return () => {
    channel.unsubscribe(listener);
  };
}

/**
 * Subscribe to request start events
 */
export function onRequestStart(handler: (event: DiagnosticsEvent) => void): () => void {
  return subscribe(CHANNELS.REQUEST_START, handler);
}

/**
 * Subscribe to request end events
 */
export function onRequestEnd(handler: (event: DiagnosticsEvent) => void): () => void {
  return subscribe(CHANNELS.REQUEST_END, handler);
}

/**
 * Subscribe to request error events
 */
export function onRequestError(handler: (event: DiagnosticsEvent) => void): () => void {
  return subscribe(CHANNELS.REQUEST_ERROR, handler);
}

/**
 * Subscribe to all events
 */
export function onAllEvents(handler: (event: DiagnosticsEvent) => void): () => void {
  const unsubscribes = [
    onRequestStart(handler),
    onRequestEnd(handler),
    onRequestError(handler),
  ];

  return () => {
    for (const unsubscribe of unsubscribes) {
      unsubscribe();
    }
  };
}
