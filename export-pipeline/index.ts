export { ExportPipeline, toWritePoint } from './ExportPipeline';
export { InfluxSink, toPoint } from './InfluxSink';
export type { InfluxSinkOptions } from './InfluxSink';
export { SinkError } from './types';
export type {
  WritePoint,
  ISink,
  SinkErrorKind,
  ExportResult,
  IExporter,
  ExportPipelineOptions,
  ExportFailedEvent,
} from './types';
