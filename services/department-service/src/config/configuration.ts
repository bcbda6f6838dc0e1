export type StorageDriver = 'postgres' | 'memory';

export type ValidationMode = 'ordered' | 'annotated';

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
}

export interface KafkaConfig {
  enabled: boolean;
  clientId: string;
  brokers: string[];
  topic: string;
}

export interface AppConfig {
  port: number;
  corsOrigin: string;
  storage: StorageDriver;
  database: DatabaseConfig;
  kafka: KafkaConfig;
  departments: {
    validationMode: ValidationMode;
  };
}

const STORAGE_DRIVERS: readonly StorageDriver[] = ['postgres', 'memory'];
const VALIDATION_MODES: readonly ValidationMode[] = ['ordered', 'annotated'];

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.toLowerCase() === 'true';
}

function parseChoice<T extends string>(
  variable: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  if (value === undefined || value === '') {
    return fallback;
  }
  const choice = choices.find((candidate) => candidate === value);
  if (!choice) {
    throw new Error(`${variable} must be one of ${choices.join(', ')} (got '${value}')`);
  }
  return choice;
}

/**
 * Builds the service configuration from environment variables.
 * Throws when an enumerated setting holds an unknown value.
 */
export function configuration(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInteger(env.PORT, 3002),
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:3100',
    storage: parseChoice('DEPARTMENT_STORAGE', env.DEPARTMENT_STORAGE, STORAGE_DRIVERS, 'postgres'),
    database: {
      host: env.DATABASE_HOST || 'postgres',
      port: parseInteger(env.DATABASE_PORT, 5432),
      username: env.DATABASE_USER || 'postgres',
      password: env.DATABASE_PASSWORD || 'postgres',
      database: env.DATABASE_NAME || 'department_service',
      synchronize: parseBoolean(env.DATABASE_SYNCHRONIZE, false),
      logging: (env.NODE_ENV || 'development') === 'development',
    },
    kafka: {
      enabled: parseBoolean(env.KAFKA_ENABLED, false),
      clientId: env.KAFKA_CLIENT_ID || 'department-service',
      brokers: (env.KAFKA_BROKERS || 'kafka:29092').split(',').map((broker) => broker.trim()),
      topic: env.KAFKA_TOPIC || 'department.events',
    },
    departments: {
      validationMode: parseChoice(
        'DEPARTMENT_VALIDATION_MODE',
        env.DEPARTMENT_VALIDATION_MODE,
        VALIDATION_MODES,
        'ordered',
      ),
    },
  };
}
