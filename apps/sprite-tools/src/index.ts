import { Sentry, config } from './instrument.js';
import { runCli } from './cli/run.js';

async function main() {
  const code = await runCli(process.argv.slice(2), config);
  process.exitCode = code;
}

main().catch(async (error) => {
  console.error('sprite-tools error:', error);
  Sentry.captureException(error);
  await Sentry.flush(2000);
  process.exit(1);
});
