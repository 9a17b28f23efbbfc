/**
 * Bluetooth port filtering and printer selection
 */

import { parseBluetoothAddress } from "./address";
import {
  BLUETOOTH_KEYWORD,
  type DiscoveredPort,
  type SerialPortListing,
} from "./interface";

export function isBluetoothPort(port: SerialPortListing): boolean {
  return (port.description ?? "").toLowerCase().includes(BLUETOOTH_KEYWORD);
}

/**
 * Keep Bluetooth-backed ports (OS order preserved) and derive their addresses
 */
export function findBluetoothPrinters(
  ports: SerialPortListing[]
): DiscoveredPort[] {
  return ports.filter(isBluetoothPort).map((port) => ({
    port: port.path,
    description: port.description ?? "",
    bluetoothAddress: parseBluetoothAddress(port.hardwareId),
  }));
}

/**
 * Pick the preferred port if discovered, else the first one
 */
export function selectPrinter(
  printers: DiscoveredPort[],
  preferredPort?: string
): DiscoveredPort | null {
  if (preferredPort) {
    const preferred = printers.find((p) => p.port === preferredPort);
    if (preferred) return preferred;
  }
  return printers[0] ?? null;
}
