#!/usr/bin/env node
/**
 * Operator CLI
 * Run: line-scanner scan --preset morning --markets player_points,h2h
 */

import 'dotenv/config';
import { Command } from 'commander';
import { z } from 'zod';
import { createScanEngine } from './lib/bootstrap';
import { loadBookWeights, setBookWeight } from './lib/book-weights';
import { config } from './lib/config';
import { ConfigError, errorMessage } from './lib/errors';
import { flushAllLogs } from './lib/logger';
import { cardParlay } from './lib/picks';
import { PROP_MARKETS } from './lib/quotes';
import type { ScanRequest } from './lib/engine';

const csv = (value: string): string[] =>
  value.split(',').map(s => s.trim()).filter(s => s.length > 0);

const scanOptionsSchema = z.object({
  preset: z.string(),
  markets: z.array(z.string()),
  minBooks: z.coerce.number().optional(),
  minEv: z.coerce.number().optional(),
  bankroll: z.coerce.number().optional(),
  top: z.coerce.number().optional(),
  maxPerGame: z.coerce.number().optional(),
  maxPerPlayer: z.coerce.number().optional(),
  teams: z.array(z.string()).optional(),
  logBets: z.boolean().default(false),
  parlays: z.boolean().default(false),
  timeout: z.coerce.number().positive().optional(),
});

type ScanOptions = z.infer<typeof scanOptionsSchema>;

function toRequest(options: ScanOptions): ScanRequest {
  return {
    preset: options.preset,
    markets: options.markets,
    minBooks: options.minBooks,
    minEvPct: options.minEv,
    bankroll: options.bankroll,
    topN: options.top,
    maxPerGame: options.maxPerGame,
    maxPerPlayer: options.maxPerPlayer,
    teams: options.teams,
    logBets: options.logBets,
    signal: options.timeout ? AbortSignal.timeout(options.timeout * 1000) : undefined,
  };
}

function print(value: unknown) {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

async function run(task: () => Promise<void>) {
  try {
    await task();
  } catch (error) {
    flushAllLogs();
    console.error(`❌ ${error instanceof ConfigError ? 'Configuration error' : 'Error'}: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    flushAllLogs();
  }
}

function withScanOptions(command: Command): Command {
  return command
    .option('--preset <name>', 'Window preset: morning, pretip or plus_odds', 'morning')
    .option('--markets <list>', 'Comma-separated market keys', csv, [...PROP_MARKETS])
    .option('--min-books <n>', 'Minimum contributing books before the preset delta')
    .option('--min-ev <pct>', 'Minimum EV percent')
    .option('--bankroll <amount>', 'Bankroll used for stakes')
    .option('--max-per-game <n>', 'Maximum picks per game')
    .option('--max-per-player <n>', 'Maximum picks per player')
    .option('--teams <list>', 'Only scan games involving these teams', csv)
    .option('--timeout <seconds>', 'Stop starting new games after this long');
}

async function main() {
  const program = new Command();

  program.name('line-scanner').description('Scan sportsbook lines for positive expected value');

  withScanOptions(program.command('scan').description('Rank candidates across upcoming games'))
    .option('--top <n>', 'Number of candidates to return')
    .option('--log-bets', 'Append the ranked candidates to the bet log')
    .option('--parlays', 'Also suggest 2-leg and 3-leg parlays from the results')
    .action(async (raw: unknown) => {
      await run(async () => {
        const options = scanOptionsSchema.parse(raw);
        const engine = await createScanEngine();
        const result = await engine.scan(toRequest(options));
        if (!options.parlays) {
          print(result);
          return;
        }
        const parlays = engine.buildParlays(result.candidates);
        print({
          ...result,
          parlays: { pairs: parlays.pairs.map(cardParlay), triples: parlays.triples.map(cardParlay) },
        });
      });
    });

  withScanOptions(program.command('picks').description('Daily card: locks, long shots and parlays'))
    .action(async (raw: unknown) => {
      await run(async () => {
        const request = toRequest(scanOptionsSchema.parse(raw));
        const engine = await createScanEngine();
        print(await engine.dailyCard(request));
      });
    });

  const weights = program.command('weights').description('Book reliability weights');
  const books = [config.referenceBook, ...config.competitorBooks];

  weights
    .command('show')
    .action(async () => {
      await run(async () => {
        print((await loadBookWeights(config.bookWeightsPath, books)).toJSON());
      });
    });

  weights
    .command('set <book> <weight>')
    .action(async (book: string, weight: string) => {
      await run(async () => {
        const value = z.coerce.number().finite().nonnegative().parse(weight);
        print(await setBookWeight(config.bookWeightsPath, books, book, value));
      });
    });

  await program.parseAsync(process.argv);
}

main().catch(error => {
  console.error('❌ Fatal:', errorMessage(error));
  process.exit(1);
});
