/**
 * Payload Encoder
 * Inverse of the decoder, used by the simulated transport to produce
 * notifications. Each quantity is quantised to its raw field and clamped
 * to the field's range.
 */

import {
  PAYLOAD_FORMAT_TAG,
  PAYLOAD_LAYOUT,
  PAYLOAD_MIN_BYTES,
  SCALING,
  SensorMeasurements,
} from './types';

class BitWriter {
  private position = 0;
  readonly bytes: Buffer;

  constructor(byteLength: number) {
    this.bytes = Buffer.alloc(byteLength);
  }

  writeUnsigned(value: number, bits: number): void {
    for (let i = bits - 1; i >= 0; i--) {
      const bit = Math.floor(value / 2 ** i) & 1;
      if (bit) {
        this.bytes[this.position >> 3] |= 0x80 >> (this.position & 7);
      }
      this.position++;
    }
  }

  writeSigned(value: number, bits: number): void {
    this.writeUnsigned(value < 0 ? value + 2 ** bits : value, bits);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function unsignedField(value: number, bits: number): number {
  return clamp(Math.round(value), 0, 2 ** bits - 1);
}

function signedField(value: number, bits: number): number {
  return clamp(Math.round(value), -(2 ** (bits - 1)), 2 ** (bits - 1) - 1);
}

export function encodePayload(measurements: SensorMeasurements): Buffer {
  const writer = new BitWriter(PAYLOAD_MIN_BYTES);
  const L = PAYLOAD_LAYOUT;

  writer.writeUnsigned(PAYLOAD_FORMAT_TAG, L.FORMAT_TAG_BITS);
  writer.writeUnsigned(unsignedField(measurements.temperature / SCALING.TEMPERATURE_STEP, L.TEMPERATURE_BITS), L.TEMPERATURE_BITS);
  writer.writeUnsigned(unsignedField(measurements.humidity / SCALING.HUMIDITY_STEP, L.HUMIDITY_BITS), L.HUMIDITY_BITS);
  writer.writeUnsigned(unsignedField(measurements.pressure - SCALING.PRESSURE_OFFSET, L.PRESSURE_BITS), L.PRESSURE_BITS);

  for (const axis of [measurements.accelerationX, measurements.accelerationY, measurements.accelerationZ]) {
    writer.writeSigned(signedField(axis * SCALING.ACCELERATION_DIVISOR, L.ACCELERATION_BITS), L.ACCELERATION_BITS);
  }

  writer.writeUnsigned(
    unsignedField((measurements.batteryVoltage - SCALING.BATTERY_OFFSET) / SCALING.BATTERY_STEP, L.BATTERY_VOLTAGE_BITS),
    L.BATTERY_VOLTAGE_BITS
  );
  writer.writeUnsigned(
    unsignedField((measurements.txPower - SCALING.TX_POWER_OFFSET) / SCALING.TX_POWER_STEP, L.TX_POWER_BITS),
    L.TX_POWER_BITS
  );
  writer.writeUnsigned(unsignedField(measurements.movementCounter, L.MOVEMENT_COUNTER_BITS), L.MOVEMENT_COUNTER_BITS);
  writer.writeUnsigned(unsignedField(measurements.measurementSequence, L.MEASUREMENT_SEQUENCE_BITS), L.MEASUREMENT_SEQUENCE_BITS);

  return writer.bytes;
}
