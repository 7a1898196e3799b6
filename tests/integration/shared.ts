import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable, Writable } from 'node:stream';
import pino from 'pino';
import { AppConfig } from '@rowfold/core';
import { runCli } from '../../apps/cli/src/app';

export type CliResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export const integrationConfig: AppConfig = {
  nodeEnv: 'test',
  logLevel: 'silent',
  defaultDelimiter: ',',
  streamHighWaterMark: 16,
  skipEmptyLines: true
};

const sink = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback): void {
      chunks.push(chunk.toString());
      callback();
    }
  });

  return { stream, text: () => chunks.join('') };
};

export const runRowfold = async (args: string[], stdin = ''): Promise<CliResult> => {
  const stdout = sink();
  const stderr = sink();

  const code = await runCli(args, {
    config: integrationConfig,
    logger: pino({ level: 'silent' }),
    io: {
      stdin: Readable.from(stdin ? [stdin] : []),
      stdout: stdout.stream,
      stderr: stderr.stream
    }
  });

  return { code, stdout: stdout.text(), stderr: stderr.text() };
};

export type Workspace = {
  dir: string;
  file: (name: string, content: string) => Promise<string>;
  cleanup: () => Promise<void>;
};

export const createWorkspace = async (): Promise<Workspace> => {
  const dir = await mkdtemp(join(tmpdir(), 'rowfold-it-'));

  return {
    dir,
    async file(name: string, content: string): Promise<string> {
      const path = join(dir, name);
      await writeFile(path, content, 'utf8');
      return path;
    },
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
};
