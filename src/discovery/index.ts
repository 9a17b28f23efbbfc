/**
 * Printer Discovery Module
 * Re-exports all discovery components
 */

export * from "./interface";
export * from "./address";
export * from "./bluetooth";
export * from "./serialport";
export * from "./mock";

import type { DiscoveredPort, PrinterDiscovery } from "./interface";
import { SerialPortDiscovery } from "./serialport";

/**
 * Create default discovery instance
 */
export function createDiscovery(): PrinterDiscovery {
  return new SerialPortDiscovery();
}

/**
 * Find Bluetooth-backed serial ports that may be printers
 * Rejects if the OS enumeration itself fails
 */
export async function discoverPrinters(
  discovery: PrinterDiscovery = createDiscovery()
): Promise<DiscoveredPort[]> {
  return discovery.findPrinters();
}
