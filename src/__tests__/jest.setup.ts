// Global test setup: quiet logs and no real network

// 1) Keep optional surfaces off unless a test enables them
process.env.STATUS_PORT = process.env.STATUS_PORT || 'disabled';
process.env.MQTT_BROKER = process.env.MQTT_BROKER || 'disabled';

// 2) Mute noisy console output (transient failures are logged at warn level)
const mute = process.env.JEST_SILENT !== '0';
if (mute) {
  const noop = () => {};
  jest.spyOn(console, 'error').mockImplementation(noop);
  jest.spyOn(console, 'warn').mockImplementation(noop);
  jest.spyOn(console, 'log').mockImplementation(noop);
}

// 3) Global mqtt mock so the publisher never opens a broker connection
jest.mock('mqtt', () => {
  const connect = jest.fn(() => ({
    on: jest.fn(),
    publish: jest.fn(
      (_topic: string, _payload: string, _opts: unknown, cb: (err?: Error) => void) => cb(),
    ),
    end: jest.fn(),
  }));
  return { __esModule: true, default: { connect }, connect };
});
