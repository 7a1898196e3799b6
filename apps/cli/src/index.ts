#!/usr/bin/env node
import { createLogger, loadConfig } from '@rowfold/core';
import { runCli } from './app';

export const main = async (args: string[] = process.argv.slice(2)): Promise<number> => {
  const config = loadConfig();
  const logger = createLogger(config);

  return runCli(args, {
    config,
    logger,
    io: {
      stdin: process.stdin,
      stdout: process.stdout,
      stderr: process.stderr
    }
  });
};

if (require.main === module) {
  void main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`rowfold error: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    }
  );
}
