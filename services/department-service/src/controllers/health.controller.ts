import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StorageDriver } from '../config/configuration';
import { KafkaProducerService } from '../kafka/kafka-producer.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly kafkaProducer: KafkaProducerService,
    private readonly configService: ConfigService,
  ) {}

  @Get()
  getHealth() {
    let kafka = 'disabled';
    if (this.kafkaProducer.isEnabled()) {
      kafka = this.kafkaProducer.isConnected() ? 'connected' : 'disconnected';
    }

    return {
      status: 'healthy',
      service: 'department-service',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      dependencies: {
        storage: this.configService.get<StorageDriver>('storage'),
        kafka,
      },
    };
  }

  @Get('live')
  getLive() {
    return {
      alive: true,
      message: 'Department service is alive',
    };
  }
}
