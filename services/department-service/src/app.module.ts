import { DynamicModule, Module, Provider, Scope } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppConfig, configuration } from './config/configuration';
import { DepartmentController } from './controllers/department.controller';
import { HealthController } from './controllers/health.controller';
import { Department } from './entities/department.entity';
import { KafkaProducerService } from './kafka/kafka-producer.service';
import { DEPARTMENT_REPOSITORY } from './repositories/department.repository';
import { InMemoryDepartmentRepository } from './repositories/in-memory-department.repository';
import { TypeOrmDepartmentRepository } from './repositories/typeorm-department.repository';
import { DepartmentService } from './services/department.service';

@Module({})
export class AppModule {
  /**
   * Wires the service for the configured storage driver. `postgres` connects
   * through TypeORM; `memory` keeps everything in a single process-local store.
   */
  static forRoot(config: AppConfig = configuration()): DynamicModule {
    const persistence =
      config.storage === 'postgres'
        ? [
            TypeOrmModule.forRoot({
              type: 'postgres',
              host: config.database.host,
              port: config.database.port,
              username: config.database.username,
              password: config.database.password,
              database: config.database.database,
              entities: [Department],
              synchronize: config.database.synchronize,
              logging: config.database.logging,
            }),
            TypeOrmModule.forFeature([Department]),
          ]
        : [];

    const repositoryProvider: Provider =
      config.storage === 'postgres'
        ? { provide: DEPARTMENT_REPOSITORY, useClass: TypeOrmDepartmentRepository, scope: Scope.REQUEST }
        : { provide: DEPARTMENT_REPOSITORY, useValue: new InMemoryDepartmentRepository() };

    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => config],
        }),
        ...persistence,
      ],
      controllers: [DepartmentController, HealthController],
      providers: [repositoryProvider, DepartmentService, KafkaProducerService],
    };
  }
}
