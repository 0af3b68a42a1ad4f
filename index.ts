import { parseCli } from './src/cli.ts';
import { loadEnv } from './src/envloader.ts';
import { initLogger } from './src/logger.ts';
import { loadConfig, loggingOptions, type MonitorConfig } from './src/config.ts';
import { ConfigurationError } from './src/errors.ts';
import { EXIT_CONFIG_ERROR, EXIT_FAILURE, runMonitor } from './src/monitor.ts';
import { resetTransporter } from './src/notify.ts';

async function main(): Promise<number> {
  const cli = parseCli(process.argv);

  // Load environment variables from .env file if it exists
  loadEnv(cli.envFile);

  // Initialize logger (must be after loadEnv to read NODE_LOG_FILE from .env)
  initLogger(loggingOptions());

  console.log('[tls-monitor] TLS certificate monitoring');

  let config: MonitorConfig;
  try {
    config = loadConfig(cli);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[config] ${err.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw err;
  }

  const report = await runMonitor(config);
  resetTransporter();
  return report.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[tls-monitor] Unexpected failure:', err);
    process.exitCode = EXIT_FAILURE;
  });
