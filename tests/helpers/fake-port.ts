/**
 * In-process stand-in for a serial printer port
 */

import type {
  OpenPortFn,
  PortEvents,
  PortSettings,
  PrinterPort,
} from "../../src/serial/port";
import type { LogFn, LogLevel } from "../../src/log";

export class FakePrinterPort implements PrinterPort {
  isOpen = true;
  writes: Buffer[] = [];
  calls: string[] = [];
  writeError: Error | null = null;
  drainError: Error | null = null;
  closeError: Error | null = null;
  hangOnWrite = false;
  events: PortEvents = {};

  async write(data: Buffer): Promise<void> {
    this.calls.push("write");
    if (this.hangOnWrite) {
      return new Promise<void>(() => {});
    }
    if (this.writeError) throw this.writeError;
    this.writes.push(Buffer.from(data));
  }

  async drain(): Promise<void> {
    this.calls.push("drain");
    if (this.drainError) throw this.drainError;
  }

  async close(): Promise<void> {
    this.calls.push("close");
    if (this.closeError) throw this.closeError;
    this.isOpen = false;
    // serialport emits "close" after a successful close
    this.events.onClose?.();
  }

  written(): Buffer {
    return Buffer.concat(this.writes);
  }

  // Simulate the OS closing the port (Bluetooth link dropped)
  drop(): void {
    this.isOpen = false;
    this.events.onClose?.();
  }
}

export class FakeOpener {
  port = new FakePrinterPort();
  opened: PortSettings[] = [];
  error: Error | null = null;
  hang = false;
  release: (() => void) | null = null;

  open: OpenPortFn = (settings, events) => {
    this.opened.push(settings);
    const port = this.port;
    port.events = events;

    if (this.hang) {
      // Settles only when the test calls release()
      return new Promise<PrinterPort>((resolve) => {
        this.release = () => resolve(port);
      });
    }
    if (this.error) {
      return Promise.reject(this.error);
    }
    return Promise.resolve(port);
  };
}

export interface LogLine {
  level: LogLevel;
  message: string;
}

export function collectLog(): { log: LogFn; lines: LogLine[]; messages: () => string[] } {
  const lines: LogLine[] = [];
  return {
    log: (level, message) => lines.push({ level, message }),
    lines,
    messages: () => lines.map((l) => l.message),
  };
}
