/**
 * Scan result filtering shared by every transport
 */

import { ScanFilter } from './interfaces/ITransport';

/**
 * @param address - normalized hardware address
 * @param name - advertised local name (may be empty)
 */
export function matchesFilter(address: string, name: string, filter: ScanFilter): boolean {
  if (filter.addresses.length > 0 && !filter.addresses.includes(address)) {
    return false;
  }
  if (filter.namePatterns.length === 0) {
    return true;
  }
  const nameLower = name.toLowerCase();
  return filter.namePatterns.some(pattern => nameLower.includes(pattern.toLowerCase()));
}
