/**
 * Sensor Payload Module
 */

export { decodePayload, createReading, describeReading } from './PayloadDecoder';
export { encodePayload } from './PayloadEncoder';
export { BitReader, BitReaderOverflowError } from './BitReader';
export {
  DecodeError,
  PAYLOAD_LAYOUT,
  PAYLOAD_TOTAL_BITS,
  PAYLOAD_MIN_BYTES,
  PAYLOAD_FORMAT_TAG,
  SCALING,
} from './types';

export type {
  DecodeErrorKind,
  DecodeResult,
  SensorMeasurements,
  SensorReading,
} from './types';
