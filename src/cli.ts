#!/usr/bin/env node

import { parseCommand, USAGE, type Command } from './command.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { HelloServer } from './hello/server.js';
import { requestHello } from './hello/client.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { describeHelloOutcome } from './protocol/hello.js';
import { runServer } from './run-server.js';

/**
 * Handle the `slotmux serve` command.
 */
async function handleServe(configPath: string | undefined, logger: Logger): Promise<void> {
  const config = loadConfig(configPath);
  const { server, httpServer } = await runServer({ mux: config.mux, status: config.status, logger });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    httpServer?.close();
    await server.stop();
  };
  process.once('SIGINT', () => {
    shutdown().catch((e) => logger.error('Shutdown failed:', e));
  });
  process.once('SIGTERM', () => {
    shutdown().catch((e) => logger.error('Shutdown failed:', e));
  });

  await server.serve();
  logger.info('Server stopped');
}

/**
 * Handle the `slotmux hello-server` command.
 */
async function handleHelloServer(configPath: string | undefined, logger: Logger): Promise<void> {
  const config = loadConfig(configPath);
  const server = new HelloServer({ ...config.hello, logger });
  await server.start();

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      logger.info('Shutting down...');
      server.stop().then(resolve, (e) => {
        logger.error('Shutdown failed:', e);
        resolve();
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}

/**
 * Handle the `slotmux hello <ipv4>` command. Returns the exit code.
 */
async function handleHello(address: string, configPath: string | undefined): Promise<number> {
  const config = loadConfig(configPath);
  try {
    const outcome = await requestHello(address, config.hello.port);
    console.log(describeHelloOutcome(outcome));
    return outcome.kind === 'match' ? 0 : 2;
  } catch (e) {
    console.error('Error:', errorMessage(e));
    return 1;
  }
}

async function main(): Promise<void> {
  let command: Command;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (e) {
    console.error('Error:', errorMessage(e));
    console.error(USAGE);
    process.exit(1);
  }

  const logger = createConsoleLogger();

  switch (command.name) {
    case 'help':
      console.log(USAGE);
      return;
    case 'serve':
      await handleServe(command.config, logger);
      return;
    case 'hello-server':
      await handleHelloServer(command.config, logger);
      return;
    case 'hello':
      process.exitCode = await handleHello(command.address, command.config);
      return;
  }
}

main().catch((e) => {
  console.error(`[${new Date().toISOString()}] Fatal error:`, errorMessage(e));
  process.exit(1);
});
