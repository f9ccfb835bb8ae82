/**
 * Export Pipeline
 * Turns one tick's readings into write points and ships them as a single batch.
 *
 * A failed batch is reported and dropped; nothing is buffered for the next
 * call.
 */

import { EventEmitter } from 'events';
import type { SensorReading } from '../payload/types';
import { createLogger } from '../shared/logger';
import {
  ExportFailedEvent,
  ExportPipelineOptions,
  ExportResult,
  IExporter,
  ISink,
  SinkError,
  WritePoint,
} from './types';

const logger = createLogger('ExportPipeline');

export function toWritePoint(reading: SensorReading, measurement: string): WritePoint {
  return {
    measurement,
    tags: {
      name: reading.sourceName,
      address: reading.sourceAddress,
    },
    intFields: {
      pressure: reading.pressure,
      tx_power: reading.txPower,
      movement_counter: reading.movementCounter,
      measurement_sequence: reading.measurementSequence,
    },
    floatFields: {
      temperature: reading.temperature,
      humidity: reading.humidity,
      acceleration_x: reading.accelerationX,
      acceleration_y: reading.accelerationY,
      acceleration_z: reading.accelerationZ,
      battery_voltage: reading.batteryVoltage,
    },
    timestamp: reading.collectedAt,
  };
}

export class ExportPipeline extends EventEmitter implements IExporter {
  constructor(private sink: ISink, private options: ExportPipelineOptions) {
    super();
  }

  async export(readings: readonly SensorReading[]): Promise<ExportResult> {
    if (readings.length === 0) {
      return { success: true, written: 0 };
    }

    const points = readings.map(reading => toWritePoint(reading, this.options.measurement));

    try {
      await this.sink.write(this.options.bucket, points);
    } catch (cause) {
      const message = cause instanceof Error ? cause.message : String(cause);
      const error = new SinkError('WriteFailed', `Write of ${points.length} points failed: ${message}`, points.length, cause);

      logger.warn(error.message);
      const event: ExportFailedEvent = { error, readings: readings.length, timestamp: new Date() };
      this.emit('exportFailed', event);
      return { success: false, error };
    }

    logger.debug(`Wrote ${points.length} points to ${this.options.bucket}`);
    return { success: true, written: points.length };
  }

  close(): Promise<void> {
    return this.sink.close();
  }
}
