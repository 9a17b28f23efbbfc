/**
 * Bluetooth address extraction from OS hardware id strings
 *
 * Hardware id formats are platform specific, e.g. on Windows:
 *   BTHENUM\{00001101-0000-1000-8000-00805F9B34FB}_LOCALMFG&0002\7&2A6B5F1&0&6622FA2B78F1_C00000000
 * This is a heuristic: the address is the 12-hex-digit run in that string.
 */

import { BLUETOOTH_BASE_UUID_NODE } from "./interface";

const HEX_RUN = /[0-9A-F]+/g;
const ADDRESS_LENGTH = 12;

/**
 * Regroup 12 hex digits as XX:XX:XX:XX:XX:XX
 */
export function formatBluetoothAddress(digits: string): string {
  const groups: string[] = [];
  for (let i = 0; i < ADDRESS_LENGTH; i += 2) {
    groups.push(digits.slice(i, i + 2));
  }
  return groups.join(":").toUpperCase();
}

/**
 * Find the Bluetooth address in a hardware id
 * @returns Colon-separated uppercase address, or null when there is none
 */
export function parseBluetoothAddress(
  hardwareId: string | null | undefined
): string | null {
  if (!hardwareId) return null;

  const runs = hardwareId.toUpperCase().match(HEX_RUN) ?? [];
  const exact = runs.filter((run) => run.length === ADDRESS_LENGTH);

  // 1. A run of exactly 12, skipping the Base UUID node when there is another
  const candidate =
    exact.find((run) => run !== BLUETOOTH_BASE_UUID_NODE) ?? exact[0];
  if (candidate) {
    return formatBluetoothAddress(candidate);
  }

  // 2. First 12 digits of a longer run
  const longer = runs.find((run) => run.length > ADDRESS_LENGTH);
  return longer ? formatBluetoothAddress(longer.slice(0, ADDRESS_LENGTH)) : null;
}
