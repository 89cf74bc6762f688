#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, LogLevel, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError } from 'commander';
import { AppModule } from './app.module';
import { errorMessage } from './common/errors';
import { AppConfig, CliOverrides } from './config/configuration';
import { RcloneService } from './rclone/rclone.service';
import { DEFAULT_SEARCH_DAYS, TransferService } from './transfer/transfer.service';

interface RemoteOptions {
  rcloneRemote?: string;
  rcloneBasePath?: string;
  debug?: boolean;
}

interface RunOptions extends RemoteOptions {
  name: string;
  email: string;
  days: number;
  slack: boolean;
  slackWebhook?: string;
  dryRun?: boolean;
}

const logger = new Logger('Main');

function parseDays(value: string): number {
  const days = Number.parseInt(value, 10);
  if (!Number.isInteger(days) || days < 1) {
    throw new InvalidArgumentError('Must be a positive whole number of days.');
  }
  return days;
}

function logLevels(debug: boolean): LogLevel[] {
  return debug ? ['error', 'warn', 'log', 'debug', 'verbose'] : ['error', 'warn', 'log'];
}

async function createContext(overrides: CliOverrides): Promise<INestApplicationContext> {
  const app = await NestFactory.createApplicationContext(AppModule.forRoot(overrides), {
    logger: logLevels(Boolean(overrides.debug)),
  });
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  app.useLogger(logLevels(config.get('transfer', { infer: true }).debug));
  return app;
}

async function runTransfer(opts: RunOptions): Promise<number> {
  const app = await createContext({
    remoteName: opts.rcloneRemote,
    basePath: opts.rcloneBasePath,
    slackWebhookUrl: opts.slackWebhook,
    notify: opts.slack,
    dryRun: opts.dryRun,
    debug: opts.debug,
  });
  try {
    await app.get(TransferService).run({ meetingName: opts.name, email: opts.email, days: opts.days });
    return 0;
  } catch (error) {
    logger.error(`Application error: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    return 1;
  } finally {
    await app.close();
  }
}

async function checkRemote(opts: RemoteOptions): Promise<number> {
  const app = await createContext({ remoteName: opts.rcloneRemote, basePath: opts.rcloneBasePath, debug: opts.debug });
  try {
    const rclone = app.get(RcloneService);
    await rclone.checkAvailability();
    const info = await rclone.getRemoteInfo();
    if (info.type) logger.log(`Remote '${rclone.remoteName}' type: ${info.type}`);
    const connected = await rclone.testConnectivity();
    logger.log(connected ? 'rclone remote is reachable' : 'rclone remote is not reachable');
    return connected ? 0 : 1;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  } finally {
    await app.close();
  }
}

const program = new Command();

program
  .name('zoom-transfer')
  .description('Copy Zoom cloud recordings to an rclone remote and announce them on Slack')
  .version('0.1.0');

program
  .command('run', { isDefault: true })
  .description('Transfer the recordings of one meeting')
  .requiredOption('-n, --name <name>', 'name (or part of the topic) of the target recording')
  .requiredOption('-e, --email <email>', 'email of the Zoom user who owns the recording')
  .option('-d, --days <days>', 'number of days to search for recordings', parseDays, DEFAULT_SEARCH_DAYS)
  .option('--no-slack', 'disable Slack notifications')
  .option('--slack-webhook <url>', 'Slack incoming webhook URL (overrides SLACK_WEBHOOK_URL)')
  .option('--rclone-remote <remote>', 'rclone remote name (overrides RCLONE_REMOTE_NAME)')
  .option('--rclone-base-path <path>', 'base folder on the remote (overrides RCLONE_BASE_PATH)')
  .option('--dry-run', 'walk through the pipeline without downloading anything')
  .option('--debug', 'verbose logging')
  .action(async (opts: RunOptions) => {
    process.exitCode = await runTransfer(opts);
  });

program
  .command('check')
  .description('Verify that rclone is installed and the remote is reachable')
  .option('--rclone-remote <remote>', 'rclone remote name (overrides RCLONE_REMOTE_NAME)')
  .option('--rclone-base-path <path>', 'base folder on the remote (overrides RCLONE_BASE_PATH)')
  .option('--debug', 'verbose logging')
  .action(async (opts: RemoteOptions) => {
    process.exitCode = await checkRemote(opts);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exitCode = 1;
});
