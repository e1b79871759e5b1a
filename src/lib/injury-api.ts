/**
 * Daily injury report feed
 */

import { z } from 'zod';
import { config } from './config';
import { fetchJson, type HttpOptions } from './http';

export interface InjuryRecord {
  player: string;
  team: string;
  status: string;
  reason: string;
}

export interface InjuryFeed {
  getInjuries(date: Date): Promise<InjuryRecord[]>;
}

const rowSchema = z.object({
  player: z.string().trim().min(1),
  team: z.string().trim().default(''),
  status: z.string().trim().min(1),
  reason: z.string().trim().nullable().optional(),
});

const wrappedSchema = z.object({
  response: z.array(z.unknown()).optional(),
  results: z.array(z.unknown()).optional(),
});

function payloadRows(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  const wrapped = wrappedSchema.safeParse(body);
  if (!wrapped.success) return [];
  return wrapped.data.response ?? wrapped.data.results ?? [];
}

/** Keep well-formed rows only */
export function parseInjuryRows(body: unknown): InjuryRecord[] {
  const records: InjuryRecord[] = [];
  for (const row of payloadRows(body)) {
    const parsed = rowSchema.safeParse(row);
    if (!parsed.success) continue;
    records.push({
      player: parsed.data.player,
      team: parsed.data.team,
      status: parsed.data.status,
      reason: parsed.data.reason ?? '',
    });
  }
  return records;
}

export class InjuryApiClient implements InjuryFeed {
  constructor(
    private apiKey: string,
    private baseUrl: string = config.injuryApiUrl,
    private host: string = config.injuryApiHost,
    private http: HttpOptions = {}
  ) {}

  /** Report for the UTC calendar day containing `date` */
  async getInjuries(date: Date): Promise<InjuryRecord[]> {
    const url = `${this.baseUrl}/${date.toISOString().slice(0, 10)}`;
    const body = await fetchJson(url, {
      ...this.http,
      headers: {
        'x-rapidapi-key': this.apiKey,
        'x-rapidapi-host': this.host,
        ...this.http.headers,
      },
    });
    return parseInjuryRows(body);
  }
}
