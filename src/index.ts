import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { run } from 'cmd-ts';
import { cli } from './app.js';
import { errorMessage } from './errors/custom-errors.js';
import { logger } from './utils/logger.js';

/**
 * tubescribe - YouTube transcripts as Markdown, Word and JSON
 */

export function installProcessHandlers(): void {
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });
}

export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  await run(cli, args);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  installProcessHandlers();
  main().catch((error: unknown) => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(1);
  });
}
