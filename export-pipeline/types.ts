/**
 * Export Pipeline Types
 */

import type { SensorReading } from '../payload/types';

// ─────────────────────────────────────────────────────────────────────────────
// Write Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sink-agnostic form of one line of line protocol
 */
export interface WritePoint {
  measurement: string;
  tags: Record<string, string>;
  intFields: Record<string, number>;
  floatFields: Record<string, number>;
  timestamp: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Sink
// ─────────────────────────────────────────────────────────────────────────────

export interface ISink {
  /** Rejects when the batch was not accepted */
  write(bucket: string, points: WritePoint[]): Promise<void>;
  close(): Promise<void>;
}

export type SinkErrorKind = 'WriteFailed';

export class SinkError extends Error {
  constructor(
    public readonly kind: SinkErrorKind,
    message: string,
    public readonly pointCount: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'SinkError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

export type ExportResult =
  | { success: true; written: number }
  | { success: false; error: SinkError };

export interface IExporter {
  export(readings: readonly SensorReading[]): Promise<ExportResult>;
}

export interface ExportPipelineOptions {
  bucket: string;
  measurement: string;
}

export interface ExportFailedEvent {
  error: SinkError;
  readings: number;
  timestamp: Date;
}
