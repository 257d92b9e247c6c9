import { runCli } from '../src/cli/run.js';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error('Fatal error:', error);
  process.exitCode = 1;
}
