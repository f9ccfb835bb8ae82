export * from './types';
export * from './DeviceIdentifier';
export {
  DeviceRegistry,
  InvalidTransitionError,
  DeviceNotFoundError,
  DuplicateDeviceError,
} from './DeviceRegistry';
