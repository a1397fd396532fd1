/**
 * Kind of live log entry.
 */
export type LiveLogKind = 'request' | 'response' | 'error' | 'info';

/**
 * One entry of the live request/response log.
 */
export interface LiveLogEntry {
  /** ISO timestamp */
  timestamp: string;
  kind: LiveLogKind;
  message: string;
  url?: string;
  /** 1-based attempt number */
  attempt?: number;
  maxAttempts?: number;
  /** HTTP status for responses */
  status?: number;
  /** Response body (possibly truncated) */
  body?: string;
}

/**
 * Receiver of live log entries.
 *
 * Writing is observational: callers ignore anything a sink does.
 */
export interface LogSink {
  write(entry: LiveLogEntry): void;
}
