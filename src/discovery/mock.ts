/**
 * Mock Printer Discovery for Testing
 * Can replace the real discovery anywhere a PrinterDiscovery is accepted
 */

import type {
  DiscoveredPort,
  PrinterDiscovery,
  SerialPortListing,
} from "./interface";
import { findBluetoothPrinters } from "./bluetooth";

export interface MockPorts {
  serialPorts?: SerialPortListing[];
  error?: Error | null;
}

export class MockDiscovery implements PrinterDiscovery {
  private ports: MockPorts;
  public listCalls = 0;

  constructor(ports: MockPorts = {}) {
    this.ports = ports;
  }

  async listSerialPorts(): Promise<SerialPortListing[]> {
    this.listCalls++;

    if (this.ports.error) {
      throw this.ports.error;
    }

    return this.ports.serialPorts || [];
  }

  async findPrinters(): Promise<DiscoveredPort[]> {
    return findBluetoothPrinters(await this.listSerialPorts());
  }

  // Helper to update mock state during test
  setPorts(ports: Partial<MockPorts>): void {
    this.ports = { ...this.ports, ...ports };
  }

  reset(): void {
    this.listCalls = 0;
  }
}
