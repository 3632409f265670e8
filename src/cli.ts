#!/usr/bin/env node
import 'reflect-metadata';
import { createInterface } from 'node:readline';
import { NestFactory } from '@nestjs/core';
import { config as loadEnv } from 'dotenv';
import { CliCommand, CliUsageError, parseCommand, USAGE } from './cli/command-parser';
import { CliModule } from './cli/cli.module';
import {
  CliIo,
  CommandRunner,
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
} from './cli/command-runner';
import { AppConfig, loadConfig, resolveLogLevels } from './config/app-config';
import { ConfigError } from './briefing/errors/briefing.errors';

function createIo(): { io: CliIo; close(): void } {
  const rl = createInterface({ input: process.stdin, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  return {
    io: {
      write: (line) => {
        process.stdout.write(`${line}\n`);
      },
      prompt: async (question) => {
        process.stdout.write(question);
        const next = await lines.next();
        return next.done ? null : next.value;
      },
    },
    close: () => rl.close(),
  };
}

/** First Ctrl-C stops the pipeline before its next stage; a second one quits. */
function abortOnInterrupt(): { signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    controller.abort();
    process.stderr.write(
      'interrupted: stopping before the next stage (Ctrl-C again to quit now)\n',
    );
  };
  process.on('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
    },
  };
}

async function main(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }
  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  loadEnv();
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const app = await NestFactory.createApplicationContext(
    CliModule.register(config),
    { logger: resolveLogLevels(config.logLevel) },
  );
  const { io, close } = createIo();
  const interrupt =
    command.kind === 'run' || command.kind === 'stage' ? abortOnInterrupt() : null;
  try {
    return await app.get(CommandRunner).execute(command, io, interrupt?.signal);
  } finally {
    interrupt?.dispose();
    close();
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    process.stderr.write(`${message}\n`);
    process.exitCode = EXIT_FAILURE;
  });
