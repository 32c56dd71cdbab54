#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ActionLogService } from './auxiliares/logger/action-log.service';
import { CliCommand, USAGE, parseCliArgs } from './cli/cli-args';
import { TimelineError, describeError, errorStack } from './common';
import { SampleDatabaseService } from './database/services';
import { TimelineExtractorService } from './timeline/services';
import { IExtractionOptions } from './timeline/interfaces';

const logger = new Logger('Main');

/**
 * Contexto sin HTTP con el action log instalado como logger
 */
async function createContext(): Promise<INestApplicationContext> {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  app.useLogger(app.get(ActionLogService));
  return app;
}

async function extract(options: IExtractionOptions): Promise<number> {
  const app = await createContext();

  try {
    await app.get(TimelineExtractorService).run(options);
    return 0;
  } catch (error) {
    if (error instanceof TimelineError) {
      logger.error(`Error: ${error.message}`);
      return error.exitCode;
    }
    logger.error(`Unexpected error: ${describeError(error)}`, errorStack(error));
    return 1;
  } finally {
    await app.close();
  }
}

async function sampleDb(output: string): Promise<number> {
  const app = await createContext();

  try {
    const summary = await app.get(SampleDatabaseService).createSampleDatabase(output);
    logger.log(`Sample database created at: ${summary.path}`);
    logger.log(`Total records: ${summary.totalRecords}`);
    if (summary.firstTimestamp && summary.lastTimestamp) {
      logger.log(
        `Date range: ${summary.firstTimestamp.toISOString()} to ${summary.lastTimestamp.toISOString()}`,
      );
    }
    return 0;
  } finally {
    await app.close();
  }
}

async function serve(port: number): Promise<number> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(ActionLogService));
  app.enableShutdownHooks();

  await app.listen(port);
  logger.log(`HTTP API listening on port ${port}`);
  return 0;
}

async function bootstrap(argv: string[]): Promise<number> {
  let cli: CliCommand;
  try {
    cli = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof TimelineError) {
      console.error(USAGE);
      console.error(`error: ${error.message}`);
      return error.exitCode;
    }
    throw error;
  }

  switch (cli.command) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'extract':
      return extract({ ...cli.options, commandLine: process.argv.join(' ') });
    case 'sample-db':
      return sampleDb(cli.output);
    case 'serve':
      return serve(cli.port);
  }
}

bootstrap(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Fatal: ${describeError(error)}`);
    process.exitCode = 1;
  });
