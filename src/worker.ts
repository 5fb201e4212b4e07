import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { WorkerModule } from './worker.module';
import { ExpiryReconciler } from './modules/expiry/expiry-reconciler.service';

/**
 * Background worker: expires overdue PENDING bookings every minute.
 * Safe to run as several instances.
 */
async function main(): Promise<void> {
  const logger = new Logger('Worker');

  const app = await NestFactory.createApplicationContext(WorkerModule);
  app.enableShutdownHooks();

  logger.log('Expiry worker started');

  // Catch up right away instead of waiting for the first tick
  await app.get(ExpiryReconciler).handleCron();
}

main().catch((error: unknown) => {
  new Logger('Worker').error(
    `Worker failed to start: ${error instanceof Error ? error.message : 'Unknown error'}`,
  );
  process.exit(1);
});
