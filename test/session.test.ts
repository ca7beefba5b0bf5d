import { expect } from 'chai';
import 'mocha';
import { SessionController, SessionOptions, SessionState, runSession } from '../src/session/index';
import { ChannelError, PortUnavailableError } from '../src/errors';
import { Logger, StdOut } from '../src/util/logger';
import { FakePortRegistry, FakeSerialPort, Sink } from './util';

const PORT = '/dev/ttyFAKE0';

// each reading moves the clock on by 100ms
const steppingClock = () => {
  let ms = 0;
  return () => {
    ms += 100;
    return ms;
  };
};

describe('SessionController', () => {
  let registry: FakePortRegistry;
  let serial: FakeSerialPort;
  let output: Sink;
  let logs: Sink;
  let states: SessionState[];

  const options = (opts: Partial<SessionOptions> = {}): SessionOptions => ({
    port: PORT,
    timeout: 1,
    resetDelay: 0,
    pollInterval: 0,
    output,
    logger: new Logger({ stdout: logs }),
    openChannel: () => serial,
    now: steppingClock(),
    onStateChange: (state) => states.push(state),
    ...opts,
  });

  beforeEach(() => {
    registry = new FakePortRegistry(PORT);
    serial = new FakeSerialPort(registry, PORT);
    output = new Sink();
    logs = new Sink();
    states = [];
  });

  it('should open, reset, stream then close in that order', async () => {
    serial.feed('boot\n', 'ready\n');
    const outcome = await runSession(options());
    expect(states).to.deep.equal(['open', 'resetting', 'streaming', 'closed']);
    expect(serial.calls).to.deep.equal([
      'open',
      'set dtr=false rts=true',
      'set dtr=true rts=true',
      'read',
      'close',
    ]);
    expect(outcome.reason).to.equal('timeout');
    expect(outcome.ok).to.be.true;
    expect(outcome.error).to.be.undefined;
  });

  it('should write every device line in arrival order', async () => {
    serial.feed('ets Jun  8 2016\r\n', 'boot:', '0x13\n', 'heap=302k\n');
    const outcome = await runSession(options());
    expect(output.text).to.equal('ets Jun  8 2016\nboot:0x13\nheap=302k\n');
    expect(outcome.lines).to.equal(3);
  });

  it('should emit a partial line when the session ends', async () => {
    serial.feed('ok\n', 'no newline');
    await runSession(options());
    expect(output.lines).to.deep.equal(['ok', 'no newline']);
  });

  it('should end after the timeout and say so', async () => {
    const outcome = await runSession(options());
    expect(outcome.reason).to.equal('timeout');
    // t0=100, stream starts at 200, stops at the first check past 1200
    expect(serial.reads).to.equal(10);
    expect(outcome.durationMs).to.equal(1300);
    expect(outcome.session?.port).to.equal(PORT);
    expect(outcome.session?.baudRate).to.equal(115200);
    expect(logs.lines).to.deep.equal([
      'Port: /dev/ttyFAKE0, Baud: 115200',
      'Timeout: 1s',
      'Device reset, waiting for output...',
      'Monitor ended after 1s timeout',
    ]);
  });

  it('should end after the timeout on the real clock', async () => {
    const outcome = await runSession(options({ timeout: 0.05, now: undefined, pollInterval: 5 }));
    expect(outcome.reason).to.equal('timeout');
    expect(outcome.durationMs).to.be.at.least(50);
    expect(serial.closeCount).to.equal(1);
    expect(logs.lines[3]).to.equal('Monitor ended after 0.05s timeout');
  });

  it('should stop promptly on interrupt and release the port', async () => {
    const controller = new AbortController();
    // abort as soon as the device says it is ready
    const stopOnReady: StdOut = {
      write: (data) => {
        output.write(data);
        if (data === 'ready\n') controller.abort();
      },
    };
    serial.feed('boot\n', 'ready\n', 'never seen\n');
    const outcome = await runSession(options({ timeout: 0, output: stopOnReady, signal: controller.signal }));
    expect(outcome.reason).to.equal('interrupted');
    expect(outcome.ok).to.be.true;
    expect(output.lines).to.deep.equal(['boot', 'ready']);
    expect(serial.reads).to.equal(2);
    expect(serial.closeCount).to.equal(1);
    expect(registry.locked.has(PORT)).to.be.false;
    expect(logs.lines).to.deep.equal([
      'Port: /dev/ttyFAKE0, Baud: 115200',
      'Timeout: none',
      'Device reset, waiting for output...',
      'Monitor stopped by user',
    ]);

    // the port can be opened again straight away
    const again = await runSession(options({ openChannel: () => new FakeSerialPort(registry, PORT) }));
    expect(again.ok).to.be.true;
  });

  it('should wake from an idle wait when interrupted', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const started = Date.now();
    const outcome = await runSession(options({
      timeout: 0, pollInterval: 60000, now: undefined, signal: controller.signal,
    }));
    expect(outcome.reason).to.equal('interrupted');
    expect(Date.now() - started).to.be.below(1000);
    expect(serial.closeCount).to.equal(1);
  });

  it('should leave the port alone when already interrupted', async () => {
    const controller = new AbortController();
    controller.abort();
    const outcome = await runSession(options({ signal: controller.signal }));
    expect(outcome.reason).to.equal('interrupted');
    expect(outcome.ok).to.be.true;
    expect(outcome.session).to.be.null;
    expect(serial.calls).to.deep.equal([]);
    expect(registry.locked.has(PORT)).to.be.false;
    expect(states).to.deep.equal(['closed']);
    expect(logs.lines[logs.lines.length - 1]).to.equal('Monitor stopped by user');
  });

  it('should turn a read failure into a channel error and still release', async () => {
    serial.feed('boot\n', new Error('device disconnected'));
    const outcome = await runSession(options());
    expect(outcome.reason).to.equal('error');
    expect(outcome.ok).to.be.false;
    expect(outcome.error).to.be.instanceOf(ChannelError);
    expect(outcome.error?.message).to.equal('Serial error on /dev/ttyFAKE0: device disconnected');
    expect(output.lines).to.deep.equal(['boot']);
    expect(serial.closeCount).to.equal(1);
    expect(states[states.length - 1]).to.equal('closed');
    expect(logs.lines[logs.lines.length - 1]).to.equal('ERROR: Serial error on /dev/ttyFAKE0: device disconnected');
  });

  it('should report a port that cannot be opened', async () => {
    const missing = new FakeSerialPort(registry, '/dev/ttyNONE');
    const outcome = await runSession(options({ port: '/dev/ttyNONE', openChannel: () => missing }));
    expect(outcome.reason).to.equal('error');
    expect(outcome.ok).to.be.false;
    expect(outcome.session).to.be.null;
    expect(outcome.error).to.be.instanceOf(PortUnavailableError);
    expect(outcome.error?.code).to.equal('PORT_UNAVAILABLE');
    expect(outcome.error?.message).to.equal(
      'Could not open serial port /dev/ttyNONE: Error: No such file or directory, cannot open /dev/ttyNONE',
    );
    expect(states).to.deep.equal(['closed']);
    expect(missing.calls).to.deep.equal([]);
  });

  it('should report a port held by another session', async () => {
    registry.locked.add(PORT);
    const outcome = await runSession(options());
    expect(outcome.error).to.be.instanceOf(PortUnavailableError);
    expect(serial.closeCount).to.equal(0);
  });

  it('should report a failed release once', async () => {
    serial.failClose = true;
    const outcome = await runSession(options());
    expect(outcome.reason).to.equal('error');
    expect(outcome.error).to.be.instanceOf(ChannelError);
    expect(outcome.error?.message).to.equal('Failed to release /dev/ttyFAKE0: close failed');
    expect(serial.closeCount).to.equal(1);
  });

  it('should keep the read failure over a later release failure', async () => {
    serial.failClose = true;
    serial.feed(new Error('framing error'));
    const outcome = await runSession(options());
    expect(outcome.error?.message).to.equal('Serial error on /dev/ttyFAKE0: framing error');
    expect(serial.closeCount).to.equal(1);
  });

  it('should toggle RTS for the rts reset strategy', async () => {
    await runSession(options({ reset: 'rts' }));
    expect(serial.calls.slice(1, 3)).to.deep.equal(['set dtr=false rts=true', 'set dtr=false rts=false']);
  });

  it('should leave the control lines alone without a reset', async () => {
    await runSession(options({ reset: 'none' }));
    expect(serial.calls).to.deep.equal(['open', 'read', 'close']);
  });

  it('should pass the port and baud rate to the channel', async () => {
    const opened: [string, number][] = [];
    await runSession(options({
      baudRate: 921600,
      openChannel: (port, baudRate) => {
        opened.push([port, baudRate]);
        return serial;
      },
    }));
    expect(opened).to.deep.equal([[PORT, 921600]]);
  });

  it('should refuse to run twice', async () => {
    const controller = new SessionController(options());
    await controller.run();
    try {
      await controller.run();
      expect.fail('second run should have failed');
    } catch (err) {
      expect(err).to.be.instanceOf(Error);
      expect(err instanceof Error && err.message).to.equal('A session cannot be reused, create a new one');
    }
    expect(serial.closeCount).to.equal(1);
  });
});
