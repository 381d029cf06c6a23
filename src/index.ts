#!/usr/bin/env node
import { randomUUID } from 'node:crypto';
import process from 'node:process';

import { parseCliArgs, renderCliUsage } from './cli.js';
import { config } from './config.js';
import { getErrorMessage } from './errors.js';
import { destroyAgents } from './fetch.js';
import { logError, runWithRunContext } from './observability.js';
import { processHtmlFile } from './pipeline.js';

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
  process.exitCode = 1;
});

async function run(inputPath: string): Promise<number> {
  try {
    const manifest = await runWithRunContext(
      { runId: randomUUID(), inputPath },
      () => processHtmlFile({ inputPath })
    );
    process.stdout.write(
      [
        `✓ ${inputPath} refined`,
        `  HTML:   ${manifest.htmlFile}`,
        `  CSS:    ${manifest.cssFile}`,
        `  Images: ${manifest.imagesDir}`,
        '',
      ].join('\n')
    );
    return 0;
  } catch (error: unknown) {
    process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    return 1;
  } finally {
    await destroyAgents();
  }
}

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    process.stderr.write(`${parsed.message}\n\n${renderCliUsage()}`);
    return 1;
  }

  const { values } = parsed;
  if (values.help) {
    process.stdout.write(renderCliUsage());
    return 0;
  }
  if (values.version) {
    process.stdout.write(`${config.app.version}\n`);
    return 0;
  }

  return run(values.inputPath);
}

process.exitCode = await main();
