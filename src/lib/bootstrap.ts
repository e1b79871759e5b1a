/**
 * Engine wiring from environment configuration
 */

import { loadBookWeights } from './book-weights';
import { config } from './config';
import { ScanEngine } from './engine';
import { InjuryApiClient } from './injury-api';
import { oddsApiClient } from './odds-api';
import { StatsApiClient } from './stats-api';
import { createMarketStore } from './supabase';

export async function createScanEngine(): Promise<ScanEngine> {
  const weights = await loadBookWeights(config.bookWeightsPath, [
    config.referenceBook,
    ...config.competitorBooks,
  ]);

  return new ScanEngine({
    odds: oddsApiClient,
    stats: config.statsApiKey ? new StatsApiClient(config.statsApiKey) : null,
    injuries: config.injuryApiKey ? new InjuryApiClient(config.injuryApiKey) : null,
    store: createMarketStore(),
    weights,
  });
}
