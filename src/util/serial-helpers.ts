import { SerialPort } from 'serialport';
import type { PortInfo } from '@serialport/bindings-interface';

export const describePort = (port: PortInfo): string => {
  const details = [
    port.manufacturer,
    port.vendorId && port.productId ? `${port.vendorId}:${port.productId}` : undefined,
  ].filter(Boolean);
  return details.length ? `${port.path} (${details.join(', ')})` : port.path;
};

// the serial ports currently visible to the system, for diagnostics when one can't be opened
export const listPorts = async (): Promise<string[]> => {
  const list = await SerialPort.list();
  return list.map(describePort);
};
