import 'reflect-metadata';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ProxyAgent, setGlobalDispatcher } from 'undici';
import { AppModule } from './app.module';
import { loadConfig } from './config';
import { validationFailure } from './http/api-response';

async function bootstrap() {
  const proxyUrl = process.env.HTTPS_PROXY || process.env.HTTP_PROXY;
  if (proxyUrl) {
    setGlobalDispatcher(new ProxyAgent(proxyUrl));
  }

  const config = loadConfig();
  const app = await NestFactory.create<NestFastifyApplication>(AppModule.register(config), new FastifyAdapter());
  await app.register(helmet);
  await app.register(cors);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true, exceptionFactory: validationFailure }));
  app.enableShutdownHooks();

  await app.listen({ port: config.port, host: '0.0.0.0' });
}

bootstrap().catch((err) => {
  console.error('contract-workflow-service failed to start', err);
  process.exit(1);
});
