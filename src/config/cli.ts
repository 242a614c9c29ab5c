import { parseArgs } from 'util';
import { z } from 'zod';
import {
  DEFAULT_LANGUAGE,
  DEFAULT_TIMEOUT_SECONDS,
  ENV_API_KEY,
  MAX_TIMEOUT_SECONDS,
  MIN_TIMEOUT_SECONDS,
  UNITS,
} from '../constants/weather';
import { UsageError } from '../errors';

export const USAGE = `Usage: weather [city] [options]

Prints the current weather for a city using OpenWeatherMap.
When no city is given you will be asked for one.

Options:
  --api-key <key>     OpenWeatherMap API key (default: $${ENV_API_KEY})
  --units <system>    metric, imperial or standard (default: metric)
  --lang <code>       language of the weather description (default: ${DEFAULT_LANGUAGE})
  --timeout <sec>     request timeout in seconds (default: ${DEFAULT_TIMEOUT_SECONDS})
  --forecast          also print a 5-day forecast
  --hourly            also print the forecast for the next 24 hours
  --chart             also draw a temperature chart for the next 24 hours
  --no-color          disable coloured output
  -h, --help          show this help
  -v, --version       show the version`;

export const CliOptionsSchema = z.object({
  city: z.string().optional(),
  apiKey: z.string().optional(),
  units: z.enum(UNITS).default('metric'),
  lang: z.string().trim().min(1).default(DEFAULT_LANGUAGE),
  timeout: z.coerce
    .number()
    .finite()
    .min(MIN_TIMEOUT_SECONDS)
    .max(MAX_TIMEOUT_SECONDS)
    .default(DEFAULT_TIMEOUT_SECONDS),
  forecast: z.boolean().default(false),
  hourly: z.boolean().default(false),
  chart: z.boolean().default(false),
  color: z.boolean().default(true),
  help: z.boolean().default(false),
  version: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

const FLAG_NAMES: Record<string, string> = {
  apiKey: '--api-key',
  units: '--units',
  lang: '--lang',
  timeout: '--timeout',
};

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'api-key': { type: 'string' },
        units: { type: 'string' },
        lang: { type: 'string' },
        timeout: { type: 'string' },
        forecast: { type: 'boolean' },
        hourly: { type: 'boolean' },
        chart: { type: 'boolean' },
        'no-color': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'v' },
      },
    });
  } catch (err) {
    // parseArgs reports unknown flags and missing values as TypeErrors
    const message = err instanceof Error ? err.message : String(err);
    throw new UsageError(message, { cause: err });
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseRaw(argv);

  // Unquoted multi-word names ("New York") arrive as several positionals
  const city = positionals.join(' ').trim();

  const parsed = CliOptionsSchema.safeParse({
    city: city || undefined,
    apiKey: values['api-key'],
    units: values.units,
    lang: values.lang,
    timeout: values.timeout,
    forecast: values.forecast,
    hourly: values.hourly,
    chart: values.chart,
    color: values['no-color'] ? false : undefined,
    help: values.help,
    version: values.version,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = String(issue.path[0] ?? '');
    const flag = FLAG_NAMES[key] ?? key;
    throw new UsageError(`Invalid value for ${flag}: ${issue.message}`);
  }

  return parsed.data;
}
