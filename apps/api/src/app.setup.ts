// HTTP surface shared by main.ts and the e2e tests: prefix, validation, CORS, OpenAPI.
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { Env } from './config/env';

export function configureApp(app: INestApplication): void {
  const cfg = app.get<ConfigService<Env, true>>(ConfigService);

  const prefix = cfg.get('GLOBAL_PREFIX', { infer: true });
  if (prefix) app.setGlobalPrefix(prefix);

  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));

  const corsAllowed = cfg.get('CORS_ALLOWED_ORIGINS', { infer: true });
  app.enableCors({
    origin(origin, cb) {
      // server-to-server calls come without an Origin
      if (!origin) return cb(null, true);
      if (corsAllowed.includes(origin)) return cb(null, true);
      return cb(new Error('CORS blocked'), false);
    },
    allowedHeaders: ['Content-Type', 'x-admin-token'],
  });

  const builder = new DocumentBuilder()
    .setTitle('Exchange rate API')
    .setDescription('ECB euro foreign exchange reference rates, against any base currency')
    .setVersion('1.0');
  const server = cfg.get('OPENAPI_SERVER_URL', { infer: true });
  if (server) builder.addServer(server);
  const document = SwaggerModule.createDocument(app, builder.build());
  SwaggerModule.setup(cfg.get('DOCS_PATH', { infer: true }), app, document, { useGlobalPrefix: true });

  app.enableShutdownHooks();
}
