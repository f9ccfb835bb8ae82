/**
 * Payload Decoder
 * Turns the fixed-layout sensor notification into physical measurements.
 *
 * Wire layout (big-endian bit cursor, MSB first):
 *   tag:8 | temperature:u16 | humidity:u16 | pressure:u16
 *   | accX:i16 | accY:i16 | accZ:i16 | battery:u11 | txPower:u5
 *   | movement:u8 | sequence:u16
 *
 * Anything past the last field (e.g. a trailing MAC) is ignored.
 */

import { BitReader } from './BitReader';
import {
  DecodeError,
  DecodeResult,
  PAYLOAD_LAYOUT,
  PAYLOAD_MIN_BYTES,
  SCALING,
  SensorMeasurements,
  SensorReading,
} from './types';

export function decodePayload(raw: Uint8Array): DecodeResult {
  if (raw.length < PAYLOAD_MIN_BYTES) {
    return {
      success: false,
      error: new DecodeError('Truncated', PAYLOAD_MIN_BYTES, raw.length),
    };
  }

  const reader = new BitReader(raw);
  reader.skip(PAYLOAD_LAYOUT.FORMAT_TAG_BITS);

  // Read order is the wire order - do not reorder these statements
  const temperature = reader.readUnsigned(PAYLOAD_LAYOUT.TEMPERATURE_BITS) * SCALING.TEMPERATURE_STEP;
  const humidity = reader.readUnsigned(PAYLOAD_LAYOUT.HUMIDITY_BITS) * SCALING.HUMIDITY_STEP;
  const pressure = reader.readUnsigned(PAYLOAD_LAYOUT.PRESSURE_BITS) + SCALING.PRESSURE_OFFSET;
  const accelerationX = reader.readSigned(PAYLOAD_LAYOUT.ACCELERATION_BITS) / SCALING.ACCELERATION_DIVISOR;
  const accelerationY = reader.readSigned(PAYLOAD_LAYOUT.ACCELERATION_BITS) / SCALING.ACCELERATION_DIVISOR;
  const accelerationZ = reader.readSigned(PAYLOAD_LAYOUT.ACCELERATION_BITS) / SCALING.ACCELERATION_DIVISOR;
  const batteryVoltage =
    reader.readUnsigned(PAYLOAD_LAYOUT.BATTERY_VOLTAGE_BITS) * SCALING.BATTERY_STEP + SCALING.BATTERY_OFFSET;
  const txPower = reader.readUnsigned(PAYLOAD_LAYOUT.TX_POWER_BITS) * SCALING.TX_POWER_STEP + SCALING.TX_POWER_OFFSET;
  const movementCounter = reader.readUnsigned(PAYLOAD_LAYOUT.MOVEMENT_COUNTER_BITS);
  const measurementSequence = reader.readUnsigned(PAYLOAD_LAYOUT.MEASUREMENT_SEQUENCE_BITS);

  return {
    success: true,
    measurements: {
      temperature,
      humidity,
      pressure,
      accelerationX,
      accelerationY,
      accelerationZ,
      batteryVoltage,
      txPower,
      movementCounter,
      measurementSequence,
    },
  };
}

/**
 * Tag decoded measurements with their source. The result is frozen.
 */
export function createReading(
  measurements: SensorMeasurements,
  sourceName: string,
  sourceAddress: string,
  collectedAt: Date
): SensorReading {
  return Object.freeze({
    ...measurements,
    sourceName,
    sourceAddress,
    collectedAt,
  });
}

/**
 * One-line summary for the log
 */
export function describeReading(reading: SensorReading): string {
  return (
    `${reading.sourceName} (${reading.sourceAddress}) #${reading.measurementSequence}: ` +
    `${reading.temperature.toFixed(2)}°C, ${reading.humidity.toFixed(2)}%RH, ${reading.pressure}Pa`
  );
}
