/**
 * Printer Port
 * Promise wrapper around a serialport connection, injectable for testing
 */

import { SerialPort } from "serialport";

/**
 * Framing used for every printer connection: 8N1, no flow control
 */
export interface PortSettings {
  path: string;
  baudRate: number;
  dataBits: 8;
  parity: "none";
  stopBits: 1;
}

export interface PortEvents {
  onError?: (error: Error) => void;
  onClose?: () => void;
}

export interface PrinterPort {
  readonly isOpen: boolean;
  write(data: Buffer): Promise<void>;
  /** Resolves once buffered bytes have been handed to the driver */
  drain(): Promise<void>;
  close(): Promise<void>;
}

export type OpenPortFn = (
  settings: PortSettings,
  events: PortEvents
) => Promise<PrinterPort>;

export function portSettings(path: string, baudRate: number): PortSettings {
  return { path, baudRate, dataBits: 8, parity: "none", stopBits: 1 };
}

class SerialPrinterPort implements PrinterPort {
  constructor(private readonly serial: SerialPort) {}

  get isOpen(): boolean {
    return this.serial.isOpen;
  }

  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.serial.write(data, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  drain(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.serial.drain((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.serial.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Open a real serial port
 */
export const openSerialPort: OpenPortFn = (settings, events) =>
  new Promise((resolve, reject) => {
    const serial = new SerialPort({
      ...settings,
      rtscts: false, // No flow control
      xon: false,
      xoff: false,
      xany: false,
      autoOpen: false,
    });

    serial.open((err) => {
      if (err) {
        reject(err);
        return;
      }

      serial.on("error", (error: Error) => events.onError?.(error));
      serial.on("close", () => events.onClose?.());
      resolve(new SerialPrinterPort(serial));
    });
  });
