#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { Logger, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import {
  CliCommandArgs,
  CliUsageError,
  parseCliArguments,
  USAGE,
} from './cli/cli-arguments';
import { ExtractReportsCommand } from './cli/commands/extract-reports.command';
import { ExportSpreadsheetCommand } from './cli/commands/export-spreadsheet.command';

const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'fatal'];
const DEBUG_LOG_LEVELS: LogLevel[] = [...DEFAULT_LOG_LEVELS, 'debug', 'verbose'];

async function bootstrap(): Promise<number> {
  let command: CliCommandArgs;
  try {
    command = parseCliArguments(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  if (command.name === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: command.debug ? DEBUG_LOG_LEVELS : DEFAULT_LOG_LEVELS,
  });

  try {
    const configService = app.get(ConfigService<AllConfigType>);
    if (
      !command.debug &&
      configService.get('doseReports.debug', { infer: true })
    ) {
      app.useLogger(DEBUG_LOG_LEVELS);
    }

    if (command.name === 'extract') {
      return await app.get(ExtractReportsCommand).run(command);
    }
    return await app.get(ExportSpreadsheetCommand).run(command);
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    new Logger('Bootstrap').error(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error.stack : undefined,
    );
    process.exitCode = 1;
  });
