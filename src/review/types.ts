/**
 * Types for the review API and the poll pipeline
 */

// ===========================================
// API Types
// ===========================================

export type HomeworkStatus = 'approved' | 'reviewing' | 'rejected';

export interface ReviewApiClientConfig {
  /** OAuth token of the review API */
  token: string;
  endpoint: string;
  requestTimeoutMs: number;
}

// ===========================================
// Error Types
// ===========================================

export type PollError =
  | {
      kind: 'APIRequestError';
      message: string;
      endpoint: string;
      /** HTTP status, absent for network-layer failures */
      statusCode?: number;
    }
  | { kind: 'ParseError'; message: string }
  | {
      kind: 'InvalidResponse';
      message: string;
      observedType?: string;
      missingKeys?: string[];
    }
  | { kind: 'MissingField'; message: string; missingKeys: string[] }
  | { kind: 'UnknownStatus'; message: string; status: unknown }
  | { kind: 'Unexpected'; message: string };

export type Result<T> = { ok: true; value: T } | { ok: false; error: PollError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: PollError): Result<T> {
  return { ok: false, error };
}

/**
 * Name of a value's type the way it shows up in error messages
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
