#!/usr/bin/env node
import { statSync } from 'node:fs';
import path from 'node:path';
import { config, type ExecutionMode } from './config.js';
import { loadCsv, loadDataFolder } from './data/csv-loader.js';
import { EventBus } from './engine/event-bus.js';
import { runSimulations } from './engine/simulation-driver.js';
import { SimulationError } from './errors.js';
import { createChildLogger } from './logger.js';
import { formatSummary, formatTrades } from './report/formatter.js';
import { summarizeBatch } from './report/metrics.js';
import { getStrategy, STRATEGIES } from './strategy/registry.js';
import type { Strategy } from './strategy/strategy.js';
import type { PriceSeries } from './types/index.js';

const log = createChildLogger('cli');

function printUsage(): void {
  console.log(`
Usage:
  tsx src/index.ts simulate [csv-file|data-dir] [options]

Commands:
  simulate      Run strategy simulation over one CSV file or every *.csv in a folder

Options:
  --strategy <id>           sma-trend | dp-single | dp-multi | all (default: all)
  --capital <number>        Initial capital (default: ${config.capital.initial})
  --sma <number>            SMA window for sma-trend (default: ${config.strategy.smaWindow})
  --mode <mode>             sequential | parallel (default: ${config.driver.mode})
  --concurrency <number>    Parallel simulations (default: ${config.driver.concurrency})
  --trades                  Show individual trades

CSV format: header row with Date and Close columns. Instrument id = file name.
Data path defaults to DATA_DIR (${config.data.dir}).
`);
}

function parseArgs(args: string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        map.set(arg, next);
        i++;
      } else {
        map.set(arg, 'true');
      }
    } else if (!map.has('_command')) {
      map.set('_command', arg);
    } else if (!map.has('_path')) {
      map.set('_path', arg);
    }
  }
  return map;
}

function getNum(args: Map<string, string>, key: string, def: number): number {
  const v = args.get(key);
  return v ? Number(v) : def;
}

function parseMode(value: string | undefined): ExecutionMode {
  if (value === undefined) return config.driver.mode;
  if (value === 'sequential' || value === 'parallel') return value;
  throw new Error(`Unknown mode: ${value}`);
}

function loadInstruments(target: string): Map<string, PriceSeries> {
  if (statSync(target).isDirectory()) {
    return loadDataFolder(target);
  }
  const instrument = path.basename(target, path.extname(target));
  return new Map([[instrument, loadCsv(target)]]);
}

async function simulate(args: Map<string, string>): Promise<void> {
  const target = args.get('_path') ?? config.data.dir;
  const instruments = loadInstruments(target);
  if (instruments.size === 0) {
    console.log(`No price data found in ${target}`);
    return;
  }
  console.log(`Loaded ${instruments.size} instrument(s) from ${target}`);

  const strategyArg = args.get('--strategy') ?? 'all';
  const strategies: Strategy[] = strategyArg === 'all'
    ? Object.values(STRATEGIES)
    : [getStrategy(strategyArg)];

  const params = {
    initialCapital: getNum(args, '--capital', config.capital.initial),
    smaWindow: getNum(args, '--sma', config.strategy.smaWindow),
  };
  const mode = parseMode(args.get('--mode'));
  const concurrency = getNum(args, '--concurrency', config.driver.concurrency);

  for (const strategy of strategies) {
    const bus = new EventBus();
    bus.on('*', (e) => log.debug(e, 'Trade'));

    const batch = await runSimulations(instruments, strategy, params, { mode, concurrency, bus });
    console.log(formatSummary(`${strategy.name.toUpperCase()} SUMMARY`, summarizeBatch(batch)));

    for (const [instrument, err] of batch.failures) {
      console.log(`  ${instrument}: FAILED (${err.message})`);
    }
    if (args.has('--trades')) {
      console.log(formatTrades(bus.getLog()));
    }
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.get('_command');

  switch (command) {
    case 'simulate':
      await simulate(args);
      break;

    default:
      if (command) console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  if (err instanceof SimulationError) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    log.fatal({ err }, 'Unhandled error');
  }
  process.exit(1);
});
