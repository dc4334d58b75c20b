import { z } from 'zod';

const optionalInt = (min: number, max?: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : undefined))
    .pipe(
      (max === undefined ? z.number().int().min(min) : z.number().int().min(min).max(max)).optional(),
    );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  SERIAL_DEVICE: z.string().min(1).optional(),
  SERIAL_BAUD: optionalInt(1),
  SERIAL_READ_TIMEOUT_MS: optionalInt(10),
  SERIAL_RECONNECT_DELAY_MS: optionalInt(0),
  PUBLISH_HOST: z.string().min(1).optional(),
  PUBLISH_PORT: optionalInt(0, 65535),
  PUBLISH_HWM: optionalInt(1),
  GPSD_HOST: z.string().min(1).optional(),
  GPSD_PORT: optionalInt(1, 65535),
  GPS_STATIONARY: z.enum(['true', 'false', '1', '0']).optional(),
  GPS_FIX_TIMEOUT_MS: optionalInt(0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  STRUCTURED_LOGS: z
    .string()
    .optional()
    .transform((val) => (val ? val !== 'false' : true)),
});

export type EnvironmentVariables = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    const formatted = parsed.error.flatten();
    throw new Error(
      `Invalid environment configuration: ${JSON.stringify(formatted.fieldErrors, null, 2)}`,
    );
  }

  return parsed.data;
}
