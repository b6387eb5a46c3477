import {getLogLevel} from './config';

/**
 * All the kinds of events we log.
 */
export enum EventType {
  // The solver did something.
  SYSTEM = 'sdk_system', // "sdk" = Sudoku

  // Something bad happened.
  ERROR = 'sdk_error',
}

/**
 * Extra information we might include with an event.
 */
export declare interface EventParams {
  category?: string;
  detail?: string;
  elapsedMs?: number;
}

/** Where logged events end up. */
export type EventSink = (event: EventType, params: EventParams) => void;

/**
 * Writes events to the console, honoring the configured log level.
 */
export function consoleSink(event: EventType, params: EventParams): void {
  const level = getLogLevel();
  if (level === 'none') return;
  const line = formatEvent(event, params);
  if (event === EventType.ERROR) {
    console.error(line);
  } else if (level === 'all') {
    console.log(line);
  }
}

/** Renders an event as a single line of text. */
export function formatEvent(event: EventType, params: EventParams): string {
  const parts: string[] = [event];
  if (params.category) parts.push(params.category);
  if (params.detail) parts.push(params.detail);
  if (params.elapsedMs !== undefined) parts.push(`${params.elapsedMs}ms`);
  return parts.join(': ');
}

let sink: EventSink = consoleSink;

/**
 * Sends future events to the given sink.
 *
 * @returns The sink that was in place before.
 */
export function setEventSink(next: EventSink): EventSink {
  const prev = sink;
  sink = next;
  return prev;
}

/**
 * Logs something that happened.
 * @param event What happened.
 */
export function logEvent(event: EventType, params: EventParams = {}) {
  sink(event, params);
}
