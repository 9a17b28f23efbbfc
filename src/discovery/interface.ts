/**
 * Printer Discovery Interface
 * High-level code depends on this abstraction, never on SerialPort.list() directly
 */

/**
 * One entry of the OS serial port enumeration
 */
export interface SerialPortListing {
  path: string;
  description?: string;
  hardwareId?: string;
  manufacturer?: string;
  vendorId?: string;
  productId?: string;
}

/**
 * A Bluetooth-backed serial port that may have a printer behind it
 */
export interface DiscoveredPort {
  port: string;
  description: string;
  bluetoothAddress: string | null;
}

export interface PrinterDiscovery {
  /**
   * List all serial ports the OS exposes
   */
  listSerialPorts(): Promise<SerialPortListing[]>;

  /**
   * List the Bluetooth-backed ports, in OS order
   */
  findPrinters(): Promise<DiscoveredPort[]>;
}

// Descriptions are matched case-insensitively against this keyword
export const BLUETOOTH_KEYWORD = "bluetooth";

// Node part of the Bluetooth Base UUID (0000xxxx-0000-1000-8000-00805F9B34FB).
// Windows SPP hardware ids embed it next to the real device address.
export const BLUETOOTH_BASE_UUID_NODE = "00805F9B34FB";
