import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { ClientModule } from './client.module';
import { SessionClient } from './client/session-client.service';

/**
 * Small playground: connects with the `SESSION_*` settings, logs every
 * lifecycle event, and optionally follows one store query
 * (`SESSION_WATCH_QUERY`) until interrupted.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(ClientModule.forRoot());
  const logger = new Logger('Playground');
  const client = app.get(SessionClient);

  client.on('connected', () => logger.log('connected'));
  client.on('disconnected', (reason) => logger.log(`disconnected: ${reason}`));
  client.on('reconnecting', (attempt) => logger.log(`reconnecting (attempt ${attempt})`));
  client.on('reconnected', () => logger.log('reconnected'));
  client.on('error', (err) => logger.warn(`error: ${err.message}`));
  client.on('session_revoked', (reason) => logger.warn(`session revoked: ${reason}`));

  const welcome = await client.connect();
  logger.log(`Server ${welcome.version || 'unknown version'}, auth ${welcome.requiresAuth ? 'required' : 'not required'}`);

  const query = app.get(ConfigService).get<string>('SESSION_WATCH_QUERY');
  if (query) {
    await client.subscribe(query, undefined, (data) => logger.log(`${query}: ${JSON.stringify(data)}`));
  }

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, async () => {
      logger.log(`${sig} received, shutting down…`);
      await app.close();
      process.exit(0);
    });
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Playground').error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
