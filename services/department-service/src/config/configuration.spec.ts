import { configuration } from './configuration';

describe('configuration', () => {
  it('falls back to defaults', () => {
    const config = configuration({});

    expect(config.port).toBe(3002);
    expect(config.storage).toBe('postgres');
    expect(config.database).toEqual({
      host: 'postgres',
      port: 5432,
      username: 'postgres',
      password: 'postgres',
      database: 'department_service',
      synchronize: false,
      logging: true,
    });
    expect(config.kafka).toEqual({
      enabled: false,
      clientId: 'department-service',
      brokers: ['kafka:29092'],
      topic: 'department.events',
    });
    expect(config.departments.validationMode).toBe('ordered');
  });

  it('reads values from the environment', () => {
    const config = configuration({
      PORT: '8080',
      NODE_ENV: 'production',
      DEPARTMENT_STORAGE: 'memory',
      DATABASE_PORT: '6543',
      DATABASE_SYNCHRONIZE: 'TRUE',
      KAFKA_ENABLED: 'true',
      KAFKA_BROKERS: 'broker-1:9092, broker-2:9092',
      DEPARTMENT_VALIDATION_MODE: 'annotated',
    });

    expect(config.port).toBe(8080);
    expect(config.storage).toBe('memory');
    expect(config.database.port).toBe(6543);
    expect(config.database.synchronize).toBe(true);
    expect(config.database.logging).toBe(false);
    expect(config.kafka.enabled).toBe(true);
    expect(config.kafka.brokers).toEqual(['broker-1:9092', 'broker-2:9092']);
    expect(config.departments.validationMode).toBe('annotated');
  });

  it('ignores unparsable numbers', () => {
    expect(configuration({ PORT: 'eighty' }).port).toBe(3002);
  });

  it('rejects an unknown storage driver', () => {
    expect(() => configuration({ DEPARTMENT_STORAGE: 'mongo' })).toThrow(
      "DEPARTMENT_STORAGE must be one of postgres, memory (got 'mongo')",
    );
  });

  it('rejects an unknown validation mode', () => {
    expect(() => configuration({ DEPARTMENT_VALIDATION_MODE: 'lenient' })).toThrow(
      "DEPARTMENT_VALIDATION_MODE must be one of ordered, annotated (got 'lenient')",
    );
  });
});
