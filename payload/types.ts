/**
 * Sensor payload types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Payload Layout
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Field widths in bits, in wire order, after the leading format-tag byte
 */
export const PAYLOAD_LAYOUT = {
  FORMAT_TAG_BITS: 8,
  TEMPERATURE_BITS: 16,
  HUMIDITY_BITS: 16,
  PRESSURE_BITS: 16,
  ACCELERATION_BITS: 16, // x, y, z each
  BATTERY_VOLTAGE_BITS: 11,
  TX_POWER_BITS: 5,
  MOVEMENT_COUNTER_BITS: 8,
  MEASUREMENT_SEQUENCE_BITS: 16,
} as const;

export const PAYLOAD_TOTAL_BITS =
  PAYLOAD_LAYOUT.FORMAT_TAG_BITS +
  PAYLOAD_LAYOUT.TEMPERATURE_BITS +
  PAYLOAD_LAYOUT.HUMIDITY_BITS +
  PAYLOAD_LAYOUT.PRESSURE_BITS +
  PAYLOAD_LAYOUT.ACCELERATION_BITS * 3 +
  PAYLOAD_LAYOUT.BATTERY_VOLTAGE_BITS +
  PAYLOAD_LAYOUT.TX_POWER_BITS +
  PAYLOAD_LAYOUT.MOVEMENT_COUNTER_BITS +
  PAYLOAD_LAYOUT.MEASUREMENT_SEQUENCE_BITS;

export const PAYLOAD_MIN_BYTES = Math.ceil(PAYLOAD_TOTAL_BITS / 8);

/** Format tag the simulated transport writes; the decoder skips the tag */
export const PAYLOAD_FORMAT_TAG = 0x05;

export const SCALING = {
  TEMPERATURE_STEP: 0.005,      // °C per LSB
  HUMIDITY_STEP: 0.0025,        // %RH per LSB
  PRESSURE_OFFSET: 50000,       // Pa
  ACCELERATION_DIVISOR: 1000,   // mg → g
  BATTERY_STEP: 0.001,          // V per LSB
  BATTERY_OFFSET: 1.6,          // V
  TX_POWER_STEP: 2,             // dBm per LSB
  TX_POWER_OFFSET: -40,         // dBm
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Decoded Values
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Physical quantities carried by one payload
 */
export interface SensorMeasurements {
  temperature: number;          // °C
  humidity: number;             // %RH
  pressure: number;             // Pa
  accelerationX: number;        // g
  accelerationY: number;        // g
  accelerationZ: number;        // g
  batteryVoltage: number;       // V
  txPower: number;              // dBm
  movementCounter: number;      // wraps at 256
  measurementSequence: number;  // wraps at 65536
}

/**
 * One decoded reading, tagged with its source and the collection time
 */
export interface SensorReading extends Readonly<SensorMeasurements> {
  readonly sourceName: string;
  readonly sourceAddress: string;
  readonly collectedAt: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors & Results
// ─────────────────────────────────────────────────────────────────────────────

export type DecodeErrorKind = 'Truncated';

export class DecodeError extends Error {
  constructor(
    public readonly kind: DecodeErrorKind,
    public readonly requiredBytes: number,
    public readonly actualBytes: number
  ) {
    super(`${kind} payload: need ${requiredBytes} bytes, got ${actualBytes}`);
    this.name = 'DecodeError';
  }
}

export type DecodeResult =
  | { success: true; measurements: SensorMeasurements }
  | { success: false; error: DecodeError };
