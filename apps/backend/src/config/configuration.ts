export interface CliOverrides {
  devicePath?: string;
  baudRate?: number;
  publishPort?: number;
  stationary?: boolean;
  logLevel?: string;
}

const parseNumberEnv = (value: string | undefined, fallback: number): number =>
  value !== undefined && value !== '' ? Number(value) : fallback;

const parseBooleanEnv = (value: string | undefined, fallback: boolean): boolean =>
  value !== undefined && value !== '' ? value === 'true' || value === '1' : fallback;

export const buildConfiguration = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: CliOverrides = {},
) => ({
  env: env.NODE_ENV ?? 'development',
  serial: {
    device: overrides.devicePath ?? env.SERIAL_DEVICE ?? '/dev/ttyACM0',
    baudRate: overrides.baudRate ?? parseNumberEnv(env.SERIAL_BAUD, 115200),
    readTimeoutMs: parseNumberEnv(env.SERIAL_READ_TIMEOUT_MS, 1000),
    reconnectDelayMs: parseNumberEnv(env.SERIAL_RECONNECT_DELAY_MS, 5000),
  },
  publisher: {
    host: env.PUBLISH_HOST ?? '0.0.0.0',
    port: overrides.publishPort ?? parseNumberEnv(env.PUBLISH_PORT, 4020),
    highWaterMark: parseNumberEnv(env.PUBLISH_HWM, 1000),
  },
  gps: {
    host: env.GPSD_HOST ?? '127.0.0.1',
    port: parseNumberEnv(env.GPSD_PORT, 2947),
    stationary: overrides.stationary ?? parseBooleanEnv(env.GPS_STATIONARY, false),
    fixTimeoutMs: parseNumberEnv(env.GPS_FIX_TIMEOUT_MS, 5000),
  },
  logging: {
    level: overrides.logLevel ?? env.LOG_LEVEL ?? 'info',
    structured: env.STRUCTURED_LOGS !== 'false',
  },
});

export type BridgeConfiguration = ReturnType<typeof buildConfiguration>;

export default () => buildConfiguration();
