/**
 * Command line parsing
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { config } from './config/index.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import type { PipelineOptions } from './pipeline.js';

export const USAGE = `Usage: sight-review-harvester [options]

  --url <url>           Sight page URL; the POI id is read from the page
  --poi-id <id>         POI id, skips the sight page lookup
  --max-pages <n>       Stop after n pages (default: all)
  --output <file>       CSV output path (default: comments_<poiId>_<timestamp>.csv)
  --min-delay <sec>     Minimum pause between pages (default: ${config.retrieval.minDelayMs / 1000})
  --max-delay <sec>     Maximum pause between pages (default: ${config.retrieval.maxDelayMs / 1000})
  --service             Run once, then again on CRON_SCHEDULE
  --help                Show this message`;

const cliSchema = z
  .object({
    url: z.string().url().optional(),
    poiId: z.string().regex(/^\d+$/, 'must be a string of digits').optional(),
    maxPages: z.coerce.number().int().positive().optional(),
    output: z.string().min(1).optional(),
    minDelay: z.coerce.number().nonnegative().default(config.retrieval.minDelayMs / 1000),
    maxDelay: z.coerce.number().nonnegative().default(config.retrieval.maxDelayMs / 1000),
    service: z.boolean().default(false),
    help: z.boolean().default(false),
  })
  .refine((options) => options.minDelay <= options.maxDelay, {
    message: '--min-delay must not exceed --max-delay',
    path: ['minDelay'],
  });

export interface CliOptions {
  mode: 'run-once' | 'service';
  help: boolean;
  pipeline: PipelineOptions;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        url: { type: 'string' },
        'poi-id': { type: 'string' },
        'max-pages': { type: 'string' },
        output: { type: 'string' },
        'min-delay': { type: 'string' },
        'max-delay': { type: 'string' },
        service: { type: 'boolean' },
        help: { type: 'boolean' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigurationError(errorMessage(error), { cause: error });
  }
}

/**
 * Parse and validate process arguments (without the node and script entries)
 *
 * @throws ConfigurationError on unknown flags or invalid values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const result = cliSchema.safeParse({
    url: values.url,
    poiId: values['poi-id'],
    maxPages: values['max-pages'],
    output: values.output,
    minDelay: values['min-delay'],
    maxDelay: values['max-delay'],
    service: values.service,
    help: values.help,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid arguments:\n  ${issues.join('\n  ')}`);
  }

  const options = result.data;

  return {
    mode: options.service ? 'service' : 'run-once',
    help: options.help,
    pipeline: {
      url: options.url,
      poiId: options.poiId,
      maxPages: options.maxPages,
      output: options.output,
      minDelayMs: Math.round(options.minDelay * 1000),
      maxDelayMs: Math.round(options.maxDelay * 1000),
    },
  };
}
