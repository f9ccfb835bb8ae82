/**
 * BLE Bridge Constants - environmental beacon protocol
 */

export const BLE_CONFIG = {
  // Nordic UART service; the beacon pushes its sensor payload on the TX characteristic
  SERVICE_UUID: '6e400001-b5a3-f393-e0a9-e50e24dcca9e',
  NOTIFY_CHARACTERISTIC_UUID: '6e400003-b5a3-f393-e0a9-e50e24dcca9e',

  // Only devices whose advertised name contains this are considered
  DEVICE_NAME_PATTERN: 'Ruuvi',

  SCAN_WINDOW: 5000,
  CONNECTION_TIMEOUT: 30000,
  ADAPTER_READY_TIMEOUT: 15000,
} as const;

/**
 * Lower-case, dash-free form used to compare UUIDs across host stacks
 */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}

export const NOTIFY_CHARACTERISTIC = normalizeUuid(BLE_CONFIG.NOTIFY_CHARACTERISTIC_UUID);
