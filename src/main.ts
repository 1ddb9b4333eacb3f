#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { StixFileLoaderService } from './stix_loader/modules/ingestion/stix-file-loader.service';
import { CliUsageError, errorMessage } from './stix_loader/core/exception/custom-exceptions';
import { CliCommand, USAGE, logLevelsFrom, parseCliArgs, runLoad } from './cli-options';

async function bootstrap(argv: string[]): Promise<void> {
  const logger = new Logger('StixGraphLoader');

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof CliUsageError)) {
      throw error;
    }
    logger.error(error.message);
    process.stderr.write(USAGE);
    process.exitCode = 2;
    return;
  }
  if (command.kind === 'help') {
    process.stdout.write(USAGE);
    return;
  }
  const load = command;

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFrom(process.env.LOG_LEVEL),
    abortOnError: false,
  });
  try {
    await runLoad(app.get(StixFileLoaderService), load);
  } catch (error) {
    logger.error(`loading ${load.file} failed: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).catch((error: unknown) => {
  new Logger('StixGraphLoader').error(errorMessage(error));
  process.exitCode = 1;
});
