/**
 * Stand-alone server entry point.
 */

import { loadConfig, validateConfig } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';
import { createDefaultToolchain } from './toolchain/defaults';

const config = loadConfig();
const validation = validateConfig(config);
if (!validation.valid) {
  logger.error('Invalid configuration', { errors: validation.errors });
  process.exit(1);
}
setLogLevel(config.logLevel);

const toolchain = createDefaultToolchain(config.localRepository);
const context = createAppContext({ config, toolchainFor: () => toolchain });
const app = createApp(context);

app.listen(config.port, () => {
  logger.info('Artifact tracker listening', { port: config.port });
});
