import { parseCliArgs, USAGE } from '../config/cli';
import { VERSION } from '../constants/weather';
import { UsageError, WeatherCliError } from '../errors';
import { WeatherQuery } from '../interfaces/request';
import { logger } from '../logger';
import {
  formatDailyForecast,
  formatHourlyForecast,
  formatTemperatureChart,
  formatWeather,
} from './format';
import { createHttpClient, HttpClient } from './getWeather';
import { createTerminalPrompt, Prompt, resolveInputs } from './input';
import { WeatherService } from './weather';

export interface CliDeps {
  prompt: Prompt;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  createClient: (timeoutMs: number) => HttpClient;
  isTTY: boolean;
}

export function defaultDeps(): CliDeps {
  return {
    prompt: createTerminalPrompt(),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    env: process.env,
    createClient: (timeoutMs) => createHttpClient(timeoutMs),
    isTTY: Boolean(process.stdout.isTTY),
  };
}

/**
 * Runs one invocation and returns the process exit code.
 * Never rejects: every failure is reported on stderr.
 */
export async function run(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  try {
    const options = parseCliArgs(argv);

    if (options.help) {
      deps.stdout(USAGE);
      return 0;
    }
    if (options.version) {
      deps.stdout(VERSION);
      return 0;
    }

    const { city, apiKey } = await resolveInputs(options, deps.prompt, deps.env);
    const query: WeatherQuery = { city, apiKey, units: options.units, lang: options.lang };
    const format = { color: options.color && deps.isTTY };

    const service = new WeatherService(deps.createClient(Math.round(options.timeout * 1000)));

    const observation = await service.getCurrent(query);
    deps.stdout(formatWeather(observation, format));

    if (options.forecast || options.hourly || options.chart) {
      const forecast = await service.getForecast(query);
      if (options.forecast) deps.stdout(`\n${formatDailyForecast(forecast, format)}`);
      if (options.hourly) deps.stdout(`\n${formatHourlyForecast(forecast, format)}`);
      if (options.chart) deps.stdout(`\n${formatTemperatureChart(forecast, format)}`);
    }

    return 0;
  } catch (err) {
    if (err instanceof WeatherCliError) {
      logger.debug({ err }, 'weather-cli failed');
      deps.stderr(`Error: ${err.message}`);
      if (err instanceof UsageError) deps.stderr('Run with --help for usage.');
      return err.exitCode;
    }

    logger.error({ err }, 'Unexpected failure');
    deps.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
