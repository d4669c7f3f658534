#!/usr/bin/env node
import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { ConfigSchema, type ZooConfig } from '../core/schema.js';
import { createRandomSource, createZoo } from '../core/engine.js';
import { createLogger } from '../core/logger.js';
import { advanceDay } from '../sim/day.js';
import { renderDayReport, renderStatus } from './render.js';
import { runMenu, type Terminal } from './menu.js';

const loadConfig = async (configPath?: string): Promise<ZooConfig> => {
  if (!configPath) {
    return ConfigSchema.parse({});
  }
  const raw = await readFile(configPath, 'utf-8');
  return ConfigSchema.parse(JSON.parse(raw));
};

const program = new Command();

program
  .name('zoo-keeper')
  .description('Run a zoo one day at a time')
  .option('--log-level <level>', 'diagnostic log level (stderr)', process.env.LOG_LEVEL ?? 'warn');

program
  .command('play')
  .option('--config <path>', 'zoo config JSON')
  .option('--name <name>', 'zoo name, overrides the config')
  .action(async (opts: { config?: string; name?: string }) => {
    const logger = createLogger(program.opts<{ logLevel: string }>().logLevel);
    const config = await loadConfig(opts.config);
    if (opts.name) config.zoo.name = opts.name;
    const rng = createRandomSource(config);
    const state = createZoo(config, rng);
    logger.info({ name: state.name, money: state.money }, 'zoo opened');

    const rl = createInterface({ input: stdin, output: stdout });
    const term: Terminal = {
      ask: (question) => rl.question(question),
      print: (line) => console.log(line)
    };
    try {
      const result = await runMenu(state, rng, term, logger);
      if (result === 'quit') {
        console.log('Goodbye!');
      }
    } finally {
      rl.close();
    }
  });

program
  .command('simulate')
  .option('--config <path>', 'zoo config JSON')
  .option('--days <days>', 'days to advance without player actions')
  .action(async (opts: { config?: string; days?: string }) => {
    const logger = createLogger(program.opts<{ logLevel: string }>().logLevel);
    const config = await loadConfig(opts.config);
    const rng = createRandomSource(config);
    const state = createZoo(config, rng);
    const days = opts.days ? Number(opts.days) : config.rules.dayLimit;
    if (!Number.isInteger(days) || days < 1) {
      throw new Error(`Invalid --days value: ${opts.days}`);
    }
    for (let i = 0; i < days && state.status === 'running'; i += 1) {
      const report = advanceDay(state, rng);
      if (!report.ok) break;
      logger.debug({ report: report.value }, 'day settled');
      console.log(renderDayReport(report.value).join('\n'));
    }
    console.log(renderStatus(state).join('\n'));
    logger.info({ status: state.status, day: state.day }, 'simulation finished');
  });

program
  .command('serve')
  .option('--port <port>', 'port for the API', '3000')
  .option('--host <host>', 'host for the API', '127.0.0.1')
  .action(async (opts: { port: string; host: string }) => {
    const logger = createLogger(program.opts<{ logLevel: string }>().logLevel);
    const { buildServer } = await import('../api/server.js');
    const app = buildServer({ logger });
    await app.listen({ port: Number(opts.port), host: opts.host });
    console.log(`Zoo API listening on http://${opts.host}:${opts.port}`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
