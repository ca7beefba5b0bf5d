import asyncTimeout from '../util/async-timeout';
import type { SerialChannel } from '../serialport/serialport-promise';

export type ResetStrategy = 'dtr' | 'rts' | 'none';

export const DEFAULT_RESET_DELAY = 300;

/**
 * Restart the device by toggling the adapter's control lines. Both lines are
 * written on every call since the port fills in any flag left out.
 *  - dtr: deassert DTR, wait, reassert it, RTS stays asserted
 *  - rts: pull EN low through RTS, wait, release it, DTR stays deasserted
 */
export const resetDevice = async (
  serial: SerialChannel,
  strategy: ResetStrategy = 'dtr',
  settleMs = DEFAULT_RESET_DELAY,
): Promise<void> => {
  switch (strategy) {
    case 'dtr':
      await serial.set({ dtr: false, rts: true });
      await asyncTimeout(settleMs);
      await serial.set({ dtr: true, rts: true });
      break;
    case 'rts':
      await serial.set({ dtr: false, rts: true });
      await asyncTimeout(settleMs);
      await serial.set({ dtr: false, rts: false });
      break;
    case 'none':
      break;
    default:
      throw new Error(`Reset strategy ${strategy} not supported`);
  }
};
