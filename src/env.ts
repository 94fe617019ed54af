// Environment configuration for the triage API
// Load server, database and clinic-hours settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parseBoundedInt(
  value: string | undefined,
  defaultValue: number,
  name: string,
  min: number,
  max: number,
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < min || parsed > max) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseUtcOffset(value: string | undefined, fallback: string): string {
  const raw = strEnv(value);
  if (!raw) return fallback;
  if (!/^[+-](0\d|1[0-4]):[0-5]\d$/.test(raw)) {
    console.error(`Invalid CLINIC_UTC_OFFSET "${raw}", using default ${fallback}`);
    return fallback;
  }
  return raw;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Database
  DATABASE_PATH: strEnv(process.env.DATABASE_PATH, './data/db.sqlite'),

  // Clinic hours (local time at CLINIC_UTC_OFFSET)
  CLINIC_OPEN_HOUR: parseBoundedInt(process.env.CLINIC_OPEN_HOUR, 9, 'CLINIC_OPEN_HOUR', 0, 23),
  CLINIC_CLOSE_HOUR: parseBoundedInt(process.env.CLINIC_CLOSE_HOUR, 18, 'CLINIC_CLOSE_HOUR', 1, 24),
  APPOINTMENT_DURATION_MINUTES: parseBoundedInt(
    process.env.APPOINTMENT_DURATION_MINUTES,
    60,
    'APPOINTMENT_DURATION_MINUTES',
    5,
    480,
  ),
  CLINIC_UTC_OFFSET: parseUtcOffset(process.env.CLINIC_UTC_OFFSET, '-03:00'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export const API_VERSION = '1.0.0';

// Log configuration on startup
export function logConfiguration() {
  console.log('Triage API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Database: ${env.DATABASE_PATH}`);
  console.log(`  CORS origins: ${env.CORS_ORIGINS.join(', ') || 'none'}`);
  console.log(
    `  Clinic hours: ${env.CLINIC_OPEN_HOUR}h-${env.CLINIC_CLOSE_HOUR}h (UTC${env.CLINIC_UTC_OFFSET}), ` +
      `${env.APPOINTMENT_DURATION_MINUTES} min slots`,
  );
  if (env.CLINIC_OPEN_HOUR >= env.CLINIC_CLOSE_HOUR) {
    console.log('  ⚠️  CLINIC_OPEN_HOUR is not before CLINIC_CLOSE_HOUR - no slots will be offered');
  }
}
