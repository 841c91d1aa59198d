import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { Logger } from 'nestjs-pino';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);
  const tcpPort = Number(configService.get<string | number>('TCP_PORT', 4010));

  // TCP microservice for the conversation orchestrator and indexer events
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: {
      host: configService.get<string>('TCP_HOST', '0.0.0.0'),
      port: tcpPort,
    },
  });

  await app.startAllMicroservices();
  logger.log(`📡 TCP microservice is running on port ${tcpPort}`);

  const port = Number(configService.get<string | number>('PORT', 50060));
  await app.listen(port);
  logger.log(`🚀 Response cache service is running on http://localhost:${port}`);
}

void bootstrap();
