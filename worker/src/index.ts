import * as dotenv from 'dotenv';
import { loadConfig } from './config/AppConfig';
import { parseCliArgs, USAGE } from './cli/parseCliArgs';
import { createApp, run, EXIT_ERROR, EXIT_SUCCESS } from './app';
import { ConfigError, UsageError, describeError } from './utils/errors';
import { configureLogger, logger } from './utils/logger';

dotenv.config();

async function main(argv: string[]): Promise<number> {
  try {
    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      console.log(USAGE);
      return EXIT_SUCCESS;
    }

    const config = loadConfig(process.env, command.overrides);
    configureLogger(config.logging);

    const orchestrator = createApp(config);
    return await run(orchestrator, command);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return EXIT_ERROR;
    }
    if (err instanceof ConfigError) {
      logger.critical(err.message);
      return EXIT_ERROR;
    }
    throw err;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.critical(`Unexpected error: ${describeError(err)}`);
    process.exitCode = EXIT_ERROR;
  });
