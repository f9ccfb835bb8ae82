import { ExportPipeline, toWritePoint } from './ExportPipeline';
import { toPoint } from './InfluxSink';
import { ExportFailedEvent, ISink, SinkError, WritePoint } from './types';
import { createReading } from '../payload/PayloadDecoder';
import { SensorMeasurements } from '../payload/types';

const MEASUREMENTS: SensorMeasurements = {
  temperature: 24.5,
  humidity: 50,
  pressure: 100000,
  accelerationX: 1,
  accelerationY: -1,
  accelerationZ: 0,
  batteryVoltage: 3,
  txPower: 8,
  movementCounter: 42,
  measurementSequence: 256,
};

const COLLECTED_AT = new Date('2024-03-01T12:00:00Z');

function reading(name: string, address: string) {
  return createReading(MEASUREMENTS, name, address, COLLECTED_AT);
}

function fakeSink(): ISink & { write: jest.Mock; close: jest.Mock } {
  return {
    write: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

describe('toWritePoint', () => {
  it('maps every reading field to a tag or typed field', () => {
    expect(toWritePoint(reading('kitchen', 'AA:BB:CC:DD:EE:01'), 'environment')).toEqual({
      measurement: 'environment',
      tags: { name: 'kitchen', address: 'AA:BB:CC:DD:EE:01' },
      intFields: {
        pressure: 100000,
        tx_power: 8,
        movement_counter: 42,
        measurement_sequence: 256,
      },
      floatFields: {
        temperature: 24.5,
        humidity: 50,
        acceleration_x: 1,
        acceleration_y: -1,
        acceleration_z: 0,
        battery_voltage: 3,
      },
      timestamp: COLLECTED_AT,
    });
  });
});

describe('ExportPipeline', () => {
  it('writes one batch per call', async () => {
    const sink = fakeSink();
    const pipeline = new ExportPipeline(sink, { bucket: 'sensors', measurement: 'environment' });

    const result = await pipeline.export([
      reading('kitchen', 'AA:BB:CC:DD:EE:01'),
      reading('garage', 'AA:BB:CC:DD:EE:02'),
    ]);

    expect(result).toEqual({ success: true, written: 2 });
    expect(sink.write).toHaveBeenCalledTimes(1);
    const [bucket, points] = sink.write.mock.calls[0];
    expect(bucket).toBe('sensors');
    expect(points.map((point: WritePoint) => point.tags.name)).toEqual(['kitchen', 'garage']);
  });

  it('skips the sink for an empty batch', async () => {
    const sink = fakeSink();
    const pipeline = new ExportPipeline(sink, { bucket: 'sensors', measurement: 'environment' });

    await expect(pipeline.export([])).resolves.toEqual({ success: true, written: 0 });
    expect(sink.write).not.toHaveBeenCalled();
  });

  it('reports a failed write and stays usable', async () => {
    const sink = fakeSink();
    sink.write.mockRejectedValueOnce(new Error('503 Service Unavailable'));
    const pipeline = new ExportPipeline(sink, { bucket: 'sensors', measurement: 'environment' });
    const failures: ExportFailedEvent[] = [];
    pipeline.on('exportFailed', (event: ExportFailedEvent) => failures.push(event));

    const failed = await pipeline.export([reading('kitchen', 'AA:BB:CC:DD:EE:01')]);

    expect(failed.success).toBe(false);
    if (!failed.success) {
      expect(failed.error).toBeInstanceOf(SinkError);
      expect(failed.error.kind).toBe('WriteFailed');
      expect(failed.error.message).toBe('Write of 1 points failed: 503 Service Unavailable');
    }
    expect(failures).toHaveLength(1);
    expect(failures[0].readings).toBe(1);

    await expect(pipeline.export([reading('kitchen', 'AA:BB:CC:DD:EE:01')])).resolves.toEqual({
      success: true,
      written: 1,
    });
  });
});

describe('toPoint', () => {
  it('renders integer and float fields in line protocol', () => {
    const line = toPoint(toWritePoint(reading('kitchen', 'AA:BB:CC:DD:EE:01'), 'environment')).toLineProtocol();

    expect(line).toMatch(/^environment,/);
    expect(line).toContain('address=AA:BB:CC:DD:EE:01');
    expect(line).toContain('name=kitchen');
    expect(line).toContain('pressure=100000i');
    expect(line).toContain('movement_counter=42i');
    expect(line).toContain('temperature=24.5');
  });
});
