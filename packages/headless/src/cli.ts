#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { CacheConfigError, hex32, parseCacheConfig, type CacheConfig } from '@nbcache/core';
import { DEMO_ADDRESS, TraceParseError, buildRunOptions, parseArgs, parseTrace, runDemo, runTrace } from './lib.js';

function printUsage() {
  console.log(`Usage:
  nbcache run <trace.txt> [--config cfg.json] [--sets N] [--ways N] [--line-size N] [--mshrs N]
     [--blocking] [--prefer-invalid] [--accept-delay CYC] [--read-latency CYC]
     [--mem-size BYTES] [--fill zero|pattern] [--max-cycles N] [--responses]
  nbcache demo [--read-latency CYC] [--ways N]

 Trace lines:
   R <addr>                     read a word
   W <addr> <data> [<byteEn>]   write a word (byteEn defaults to 0xf)
   F [clean|invalidate]         flush dirty lines to memory

 Examples:
   nbcache run tmp/loop.trace --ways 2 --mshrs 4
   nbcache run tmp/loop.trace --config tmp/cache.json --read-latency 20 --responses
   nbcache demo
 `);
}

function loadConfigFile(path: string | undefined): Partial<CacheConfig> {
  if (!path) return {};
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseCacheConfig(raw);
}

function runRun(args: string[]) {
  const { positional, opts } = parseArgs(args);
  const tracePath = positional[0];
  if (!tracePath) {
    printUsage();
    process.exitCode = 1;
    return;
  }
  const options = buildRunOptions(opts, loadConfigFile(opts['config']));
  const ops = parseTrace(readFileSync(tracePath, 'utf8'));
  const summary = runTrace(ops, options);
  console.log(JSON.stringify({ command: 'run', trace: tracePath, ...summary }, null, 2));
  if (!summary.drained) process.exitCode = 2;
}

function runDemoCommand(args: string[]) {
  const { opts } = parseArgs(args);
  const result = runDemo(buildRunOptions(opts));
  console.log(JSON.stringify({ command: 'demo', address: hex32(DEMO_ADDRESS), ...result }, null, 2));
}

async function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  if (cmd === 'run') {
    runRun(argv.slice(1));
    return;
  }
  if (cmd === 'demo') {
    runDemoCommand(argv.slice(1));
    return;
  }
  printUsage();
  process.exitCode = 1;
}

main().catch((err: unknown) => {
  if (err instanceof TraceParseError || err instanceof CacheConfigError) {
    console.error(`error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
