/**
 * Serial Port Discovery
 * Enumerates ports through the serialport library (Windows, macOS, Linux)
 */

import { SerialPort } from "serialport";
import type {
  DiscoveredPort,
  PrinterDiscovery,
  SerialPortListing,
} from "./interface";
import { findBluetoothPrinters } from "./bluetooth";

type PortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number];

/**
 * Map a serialport entry to a listing.
 * Windows reports "Standard Serial over Bluetooth link (COM8)" as friendlyName;
 * other platforms only have the manufacturer.
 */
export function toListing(port: PortInfo): SerialPortListing {
  const friendlyName =
    "friendlyName" in port && typeof port.friendlyName === "string"
      ? port.friendlyName
      : undefined;

  return {
    path: port.path,
    description: friendlyName ?? port.manufacturer,
    hardwareId: port.pnpId,
    manufacturer: port.manufacturer,
    vendorId: port.vendorId,
    productId: port.productId,
  };
}

export class SerialPortDiscovery implements PrinterDiscovery {
  async listSerialPorts(): Promise<SerialPortListing[]> {
    const ports = await SerialPort.list();
    return ports.map(toListing);
  }

  async findPrinters(): Promise<DiscoveredPort[]> {
    return findBluetoothPrinters(await this.listSerialPorts());
  }
}
