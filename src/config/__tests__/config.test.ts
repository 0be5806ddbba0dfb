import type { AppConfig } from '../../types/config.types';

const CONFIG_KEYS = [
  'BRIDGE_HOST',
  'BRIDGE_PORT',
  'BRIDGE_SEND_INTERVAL_SECONDS',
  'BRIDGE_ENCODER',
  'TAXI_START_DWELL_SECONDS',
  'FULL_STOP_DWELL_SECONDS',
  'FUEL_TANK_COUNT',
  'RECEIVER_HOST',
  'RECEIVER_PORT',
  'RECEIVER_MAX_LOG_LINES',
  'SIMULATION_TICK_MS',
  'SIMULATION_TIME_SCALE',
];

describe('config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.resetModules();
    process.env = { ...originalEnv, NODE_ENV: 'test' };
    CONFIG_KEYS.forEach((key) => {
      delete process.env[key];
    });
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  const loadConfig = async (): Promise<AppConfig> => (await import('../index')).default;

  it('falls back to defaults', async () => {
    expect(await loadConfig()).toEqual({
      env: 'test',
      bridge: { host: '127.0.0.1', port: 47777, sendIntervalMs: 500 },
      dwell: { taxiStartMs: 5000, fullStopMs: 10000 },
      signals: { fuelTankCount: 4 },
      encoder: 'auto',
      receiver: { host: '0.0.0.0', port: 47777, maxLogLines: 500 },
      simulation: { tickMs: 100, timeScale: 10 },
    });
  });

  it('reads seconds as fractional values', async () => {
    process.env.BRIDGE_SEND_INTERVAL_SECONDS = '0.25';
    process.env.TAXI_START_DWELL_SECONDS = '2.5';
    process.env.FULL_STOP_DWELL_SECONDS = 'soon';

    const config = await loadConfig();

    expect(config.bridge.sendIntervalMs).toBe(250);
    expect(config.dwell).toEqual({ taxiStartMs: 2500, fullStopMs: 10000 });
  });

  it('normalizes the encoder preference and clamps counts', async () => {
    process.env.BRIDGE_ENCODER = ' Minimal ';
    process.env.FUEL_TANK_COUNT = '0';
    process.env.BRIDGE_HOST = '10.0.0.5';

    const config = await loadConfig();

    expect(config.encoder).toBe('minimal');
    expect(config.signals.fuelTankCount).toBe(1);
    expect(config.bridge.host).toBe('10.0.0.5');
  });

  it('rejects an unknown encoder', async () => {
    process.env.BRIDGE_ENCODER = 'protobuf';
    await expect(loadConfig()).rejects.toThrow('BRIDGE_ENCODER must be one of auto, schema, minimal (got protobuf)');
  });

  it('rejects a port out of range', async () => {
    process.env.BRIDGE_PORT = '70000';
    await expect(loadConfig()).rejects.toThrow('BRIDGE_PORT must be between 1 and 65535 (got 70000)');
  });
});
