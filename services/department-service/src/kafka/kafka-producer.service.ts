import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kafka, Producer } from 'kafkajs';
import { KafkaConfig } from '../config/configuration';

export type DepartmentEventType = 'department.created' | 'department.updated' | 'department.deleted';

export interface DepartmentEventData {
  department_id: number;
  name?: string;
}

/**
 * Publishes department lifecycle events. Disabled unless `kafka.enabled` is set;
 * a failed publish is logged and never reaches the caller.
 */
@Injectable()
export class KafkaProducerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KafkaProducerService.name);
  private readonly config: KafkaConfig;
  private readonly producer?: Producer;
  private connected = false;

  constructor(configService: ConfigService) {
    this.config = configService.get<KafkaConfig>('kafka') ?? {
      enabled: false,
      clientId: 'department-service',
      brokers: [],
      topic: 'department.events',
    };

    if (this.config.enabled) {
      const kafka = new Kafka({
        clientId: this.config.clientId,
        brokers: this.config.brokers,
      });
      this.producer = kafka.producer();
    }
  }

  async onModuleInit() {
    if (!this.producer) {
      this.logger.log('Kafka disabled, department events will not be published');
      return;
    }
    try {
      await this.producer.connect();
      this.connected = true;
      this.logger.log('Kafka producer connected');
    } catch (error) {
      this.logger.error('Failed to connect Kafka producer', error instanceof Error ? error.stack : String(error));
    }
  }

  async onModuleDestroy() {
    if (this.producer && this.connected) {
      await this.producer.disconnect();
      this.connected = false;
    }
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async publishEvent(eventType: DepartmentEventType, data: DepartmentEventData): Promise<void> {
    if (!this.producer || !this.connected) {
      this.logger.debug(`Skipping ${eventType}: producer not connected`);
      return;
    }

    try {
      await this.producer.send({
        topic: this.config.topic,
        messages: [
          {
            key: eventType,
            value: JSON.stringify({
              eventType,
              data,
              service: this.config.clientId,
              timestamp: new Date().toISOString(),
            }),
          },
        ],
      });
      this.logger.log(`Event published: ${eventType}`);
    } catch (error) {
      this.logger.error(
        `Failed to publish ${eventType}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
