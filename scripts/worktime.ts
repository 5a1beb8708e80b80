import 'dotenv/config';
import { runCli } from '../src/cli';

async function runStandalone() {
  const code = await runCli(process.argv.slice(2), {
    env: process.env,
    cwd: process.cwd(),
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    color: Boolean(process.stdout.isTTY),
    selfCommand: [process.execPath, ...process.execArgv, process.argv[1]],
  });
  process.exitCode = code;
}

runStandalone().catch((err: unknown) => {
  console.error('Fatal:', err instanceof Error ? err.message : err);
  process.exitCode = 3;
});
