import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { loadConfig } from './config.js';

const config = loadConfig();

// Reporting stays off unless a DSN is configured
Sentry.init({
  dsn: config.sentryDsn,
  enabled: Boolean(config.sentryDsn),
  environment: config.environment,
  tracesSampleRate: 0,
});

export { Sentry, config };
