/**
 * Hand a device back to discovery: detach its connection, move it to FAILED
 * and close the link. Used for link loss and for persistent read failures.
 */

import type { IConnection } from '../ble-bridge/interfaces/ITransport';
import { DeviceRegistry } from '../registry-management/DeviceRegistry';
import { DeviceState } from '../registry-management/types';
import { CollectorLogger } from '../shared/logger';

export interface ReleaseReason {
  kind: string;
  message: string;
}

/**
 * @returns false when `connection` was no longer the device's live link
 */
export function releaseConnection(
  registry: DeviceRegistry,
  name: string,
  connection: IConnection,
  reason: ReleaseReason,
  logger: CollectorLogger
): Promise<boolean> {
  return registry.runExclusive(name, async () => {
    if (registry.getConnection(name) !== connection) {
      return false;
    }

    registry.detachConnection(name);
    if (registry.get(name)?.state === DeviceState.SUBSCRIBED) {
      registry.markFailed(name, reason);
    }
    logger.logConnection(name, connection.address, 'Released', { kind: reason.kind, reason: reason.message });

    if (connection.isConnected) {
      try {
        await connection.disconnect();
      } catch (error) {
        logger.warn(`${name}: disconnect after release failed`, error);
      }
    }
    return true;
  });
}
