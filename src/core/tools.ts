import axios from 'axios';
import inquirer from 'inquirer';
import { z } from 'zod';
import type { Env } from './config.js';
import { createConsoleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { describeError } from '../utils/text.js';

/**
 * Neutral tool definition (JSON schema-like) handed to the agent framework.
 */
export interface NeutralToolDef {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required?: string[];
  };
}

export type ToolName = 'serper_search' | 'cbr_currency' | 'user_input' | 'geocoder';

export interface ToolKeys {
  serperApiKey?: string;
  geoapifyApiKey?: string;
}

export function resolveToolKeys(env: Env = process.env): ToolKeys {
  return {
    serperApiKey: env.SERPER_API_KEY?.trim() || undefined,
    geoapifyApiKey: env.GEOAPIFY_API_KEY?.trim() || undefined,
  };
}

export const SERPER_SEARCH_URL = 'https://google.serper.dev/search';
export const CBR_DAILY_URL = 'https://www.cbr-xml-daily.ru/daily_json.js';
export const GEOAPIFY_GEOCODE_URL = 'https://api.geoapify.com/v1/geocode/search';

const SEARCH_RESULT_LIMIT = 5;
const GEOCODE_TIMEOUT_MS = 30_000;

// -- Tool Definitions (Schema) --

export const toolsDef: NeutralToolDef[] = [
  {
    name: 'serper_search',
    description: 'Searches the web through the Serper.dev Google Search API. Useful for finding banks near a location.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query to execute' },
      },
      required: ['query'],
    },
  },
  {
    name: 'cbr_currency',
    description: 'Gets the official USD/RUB rate published by the Central Bank of Russia (CBR).',
    parameters: { type: 'object', properties: {} },
  },
  {
    name: 'user_input',
    description: 'Gets input from the user interactively.',
    parameters: {
      type: 'object',
      properties: {
        prompt: { type: 'string', description: 'Prompt to show to the user' },
      },
      required: ['prompt'],
    },
  },
  {
    name: 'geocoder',
    description: 'Looks up coordinates (lat, lon) for a street address.',
    parameters: {
      type: 'object',
      properties: {
        address: { type: 'string', description: 'Address to geocode' },
      },
      required: ['address'],
    },
  },
];

const toolArgSchemas = {
  serper_search: z.object({ query: z.string().min(1) }),
  cbr_currency: z.object({}),
  user_input: z.object({ prompt: z.string() }),
  geocoder: z.object({ address: z.string().min(1) }),
} satisfies Record<ToolName, z.ZodTypeAny>;

const serperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string().optional(),
        snippet: z.string().optional(),
        link: z.string().optional(),
      })
    )
    .optional(),
});

const cbrResponseSchema = z.object({
  Date: z.string(),
  Valute: z.object({
    USD: z.object({ Value: z.number() }),
  }),
});

const geocodeResponseSchema = z.object({
  features: z
    .array(
      z.object({
        properties: z.object({ lat: z.number(), lon: z.number() }),
      })
    )
    .min(1),
});

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolArgSchemas, name);
}

export interface ToolExecutorOptions {
  keys?: ToolKeys;
  logger?: Logger;
}

// -- Tool Implementations --

/**
 * Runs the agent's lookup tools. Every call resolves to a string; failures come back as
 * `Error ...` text for the agent to read.
 */
export class ToolExecutor {
  private keys: ToolKeys;
  private logger: Logger;

  constructor(options: ToolExecutorOptions = {}) {
    this.keys = options.keys ?? {};
    this.logger = options.logger ?? createConsoleLogger();
  }

  async execute(name: string, args: unknown): Promise<string> {
    if (!isToolName(name)) return `Error: Unknown tool: ${name}`;

    switch (name) {
      case 'serper_search': {
        const parsed = toolArgSchemas.serper_search.safeParse(args ?? {});
        if (!parsed.success) return invalidArgs(name, parsed.error);
        return this.search(parsed.data.query);
      }
      case 'cbr_currency':
        return this.currency();
      case 'user_input': {
        const parsed = toolArgSchemas.user_input.safeParse(args ?? {});
        if (!parsed.success) return invalidArgs(name, parsed.error);
        return this.userInput(parsed.data.prompt);
      }
      case 'geocoder': {
        const parsed = toolArgSchemas.geocoder.safeParse(args ?? {});
        if (!parsed.success) return invalidArgs(name, parsed.error);
        return this.geocode(parsed.data.address);
      }
    }
  }

  async search(query: string): Promise<string> {
    const apiKey = this.keys.serperApiKey;
    if (!apiKey) return 'Error: SERPER_API_KEY is not configured';

    let body: unknown;
    try {
      const response = await axios.post<unknown>(
        SERPER_SEARCH_URL,
        { q: query, num: 10 },
        { headers: { 'X-API-KEY': apiKey, 'Content-Type': 'application/json' } }
      );
      body = response.data;
    } catch (error: unknown) {
      return `Error making request to Serper API: ${describeError(error)}`;
    }

    const parsed = serperResponseSchema.safeParse(body);
    if (!parsed.success) return `Error processing Serper API response: ${parsed.error.issues[0].message}`;

    const results = (parsed.data.organic ?? []).slice(0, SEARCH_RESULT_LIMIT).map((result) =>
      [
        `Title: ${result.title ?? 'N/A'}`,
        `Snippet: ${result.snippet ?? 'N/A'}`,
        `Link: ${result.link ?? 'N/A'}`,
      ].join('\n')
    );
    return results.length > 0 ? results.join('\n\n') : 'No results found';
  }

  async currency(): Promise<string> {
    let body: unknown;
    try {
      const response = await axios.get<unknown>(CBR_DAILY_URL);
      body = response.data;
    } catch (error: unknown) {
      return `Error fetching CBR data: ${describeError(error)}`;
    }

    const parsed = cbrResponseSchema.safeParse(body);
    if (!parsed.success) return `Error processing CBR data: ${parsed.error.issues[0].message}`;

    const { Date: date, Valute } = parsed.data;
    return `Official CBR rate on ${date.slice(0, 10)}:\nUSD/RUB: ${Valute.USD.Value.toFixed(4)}`;
  }

  async userInput(prompt: string): Promise<string> {
    try {
      const { answer } = await inquirer.prompt<{ answer: string }>([
        { type: 'input', name: 'answer', message: `${prompt}:` },
      ]);
      return answer.trim();
    } catch (error: unknown) {
      return `Error getting user input: ${describeError(error)}`;
    }
  }

  /**
   * Returns `(lat, lon)`; `(0, 0)` when the address can't be resolved.
   */
  async geocode(address: string): Promise<string> {
    const apiKey = this.keys.geoapifyApiKey;
    if (!apiKey) return 'Error: GEOAPIFY_API_KEY is not configured';

    try {
      const response = await axios.get<unknown>(GEOAPIFY_GEOCODE_URL, {
        params: { text: address, lang: 'ru', limit: 1, apiKey },
        timeout: GEOCODE_TIMEOUT_MS,
      });
      const { features } = geocodeResponseSchema.parse(response.data);
      const { lat, lon } = features[0].properties;
      return `(${lat}, ${lon})`;
    } catch (error: unknown) {
      this.logger.warn(`No coordinates for "${address}": ${describeError(error)}`);
      return '(0, 0)';
    }
  }
}

function invalidArgs(name: ToolName, error: z.ZodError): string {
  const issue = error.issues[0];
  const field = issue.path.join('.') || 'args';
  return `Error: invalid arguments for ${name}: ${field}: ${issue.message}`;
}
