#!/usr/bin/env node
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { createInterface } from 'readline/promises';
import { runCli, type CliIO } from './cli/run';

const io: CliIO = {
  readFile: path => readFileSync(resolve(process.cwd(), path), 'utf-8'),
  prompt: async question => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  },
  log: line => console.log(line),
  error: line => console.error(line),
  now: () => Date.now(),
};

runCli(process.argv.slice(2), io).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
);
