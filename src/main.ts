import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { lenientJson } from './common/middleware/lenient-json.middleware';
import { DOMAIN_DEFINITIONS, parseDomain } from './modules/simulation/definitions';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const domainName = parseDomain(process.env.ANALYTICS_DOMAIN);
  const definition = DOMAIN_DEFINITIONS[domainName];

  const app = await NestFactory.create(AppModule.forDomain(domainName), { bodyParser: false });
  app.use(...lenientJson());
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle(definition.service)
    .setDescription(`Synthetic Prometheus metrics for the ${domainName} analytics domain`)
    .setVersion('1.0')
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, swaggerConfig));

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') ?? definition.defaultPort;

  await app.listen(port);
  logger.log(`${definition.service} listening on port ${port}`);
  logger.log(`Metrics at http://localhost:${port}/actuator/prometheus, API docs at http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(`Startup failed: ${error instanceof Error ? error.message : String(error)}`, error instanceof Error ? error.stack : undefined);
  process.exit(1);
});
