import fs from 'fs';
import readline from 'readline';
import { ENV_API_KEY, SECRETS_PREFIX } from '../constants/weather';
import { UsageError } from '../errors';
import { logger } from '../logger';

export type Prompt = (question: string) => Promise<string>;

export const CITY_PROMPT = 'Enter city name: ';

export interface ResolvedInputs {
  city: string;
  apiKey: string;
}

export function resolveSecret(value: string): string {
  // Docker secrets path
  if (value.startsWith(SECRETS_PREFIX)) {
    try {
      return fs.readFileSync(value, 'utf8').trim();
    } catch (err) {
      throw new UsageError(`Cannot read API key from ${value}`, { cause: err });
    }
  }
  // Local dev: literal value
  return value;
}

export function resolveApiKey(
  flagValue: string | undefined,
  source: NodeJS.ProcessEnv = process.env
): string {
  const fromFlag = flagValue?.trim();
  if (fromFlag) {
    return fromFlag;
  }

  const fromEnv = source[ENV_API_KEY]?.trim();
  if (fromEnv) {
    const apiKey = resolveSecret(fromEnv);
    if (apiKey) return apiKey;
  }

  throw new UsageError(
    `OpenWeatherMap API key is missing. Pass --api-key or set ${ENV_API_KEY}.`
  );
}

export async function resolveCity(
  argument: string | undefined,
  prompt: Prompt
): Promise<string> {
  const fromArgument = argument?.trim();
  if (fromArgument) {
    return fromArgument;
  }

  logger.debug('No city argument, prompting');
  const answer = (await prompt(CITY_PROMPT)).trim();
  if (!answer) {
    throw new UsageError('No city name given.');
  }
  return answer;
}

/**
 * The key is checked first so a missing credential fails before the user
 * is asked for anything and before any request goes out.
 */
export async function resolveInputs(
  options: { city?: string; apiKey?: string },
  prompt: Prompt,
  source: NodeJS.ProcessEnv = process.env
): Promise<ResolvedInputs> {
  const apiKey = resolveApiKey(options.apiKey, source);
  const city = await resolveCity(options.city, prompt);
  return { city, apiKey };
}

/**
 * Reads one line from the terminal. Resolves with an empty string when
 * input ends before a line arrives (Ctrl+D, closed pipe).
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  // stdout carries only the report
  output: NodeJS.WritableStream = process.stderr
): Prompt {
  return (question) =>
    new Promise<string>((resolve) => {
      const rl = readline.createInterface({ input, output });
      rl.once('close', () => resolve(''));
      rl.question(question, (answer) => {
        resolve(answer);
        rl.close();
      });
    });
}
