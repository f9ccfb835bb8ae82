export {
  ConfigError,
  ConfigFileSchema,
  DEFAULT_CONFIG_FILE,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from './CollectorConfig';
export type { CollectorConfig, ConfigErrorKind, ConfigFile, SinkConfig } from './CollectorConfig';
