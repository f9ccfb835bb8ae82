/**
 * Hardware address helpers.
 *
 * Host stacks disagree on address spelling (lower case, upper case, no
 * separators); everything inside the collector uses AA:BB:CC:DD:EE:FF.
 */

const HEX_ADDRESS = /^[0-9A-F]{12}$/;
const CANONICAL_ADDRESS = /^([0-9A-F]{2}:){5}[0-9A-F]{2}$/;

/**
 * Normalize an address to colon-separated upper case.
 * Returns the trimmed input upper-cased when it is not a 48-bit address
 * (macOS reports opaque peripheral UUIDs instead).
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim().toUpperCase();
  const hex = trimmed.replace(/[:\-]/g, '');
  if (!HEX_ADDRESS.test(hex)) {
    return trimmed;
  }
  return hex.match(/.{2}/g)?.join(':') ?? trimmed;
}

export function isValidAddress(address: string): boolean {
  return CANONICAL_ADDRESS.test(normalizeAddress(address));
}
