// src/index.ts

import { createApp } from './app';
import { createHarness } from './bootstrap';
import { loadConfig } from './config';
import { createLogger, setLogLevel } from './utils/logger';
import { describeError } from './utils/errors';

const logger = createLogger('server');

function main(): void {
    const config = loadConfig();
    setLogLevel(config.LOG_LEVEL);

    const harness = createHarness(config);
    const app = createApp(harness, config.MAX_TOKENS);

    app.listen(config.PORT, '127.0.0.1', () => {
        logger.info('Converter listening', {
            url: `http://127.0.0.1:${config.PORT}`,
            outputDir: config.OUTPUT_DIR,
            compiler: harness.sandbox.toolchain.compiler,
        });
    });
}

try {
    main();
} catch (error: unknown) {
    logger.error('Startup failed', { error: describeError(error) });
    process.exit(1);
}
