import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { env } from '../config/env';
import { CURRENT_WEATHER_PATH, FORECAST_PATH, VERSION } from '../constants/weather';
import { NetworkError, RemoteError } from '../errors';
import { CurrentWeatherResponse, ForecastResponse } from '../interfaces/weather';
import { WeatherQuery } from '../interfaces/request';
import { logger } from '../logger';
import {
  ApiStatusSchema,
  CurrentWeatherSchema,
  ForecastSchema,
} from '../schemas/weather.schema';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export function createHttpClient(
  timeoutMs: number,
  baseURL: string = env.OPENWEATHER_BASE_URL
): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': `weather-cli/${VERSION}` },
  });
}

export async function getCurrentWeatherFromApi(
  client: HttpClient,
  query: WeatherQuery
): Promise<CurrentWeatherResponse> {
  return request(client, CURRENT_WEATHER_PATH, query, CurrentWeatherSchema);
}

export async function getForecastFromApi(
  client: HttpClient,
  query: WeatherQuery
): Promise<ForecastResponse> {
  return request(client, FORECAST_PATH, query, ForecastSchema);
}

async function request<T>(
  client: HttpClient,
  path: string,
  query: WeatherQuery,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let response: AxiosResponse<unknown>;

  try {
    response = await client.get<unknown>(path, {
      params: {
        q: query.city,
        appid: query.apiKey,
        units: query.units,
        lang: query.lang,
      },
    });
  } catch (err) {
    throw toRequestError(err);
  }

  assertApiSuccess(response.data, response.status);

  const parsed = schema.safeParse(response.data);

  if (!parsed.success) {
    logger.warn({ path, issues: parsed.error.issues }, 'Weather API schema mismatch');
    throw new RemoteError('Weather API schema mismatch', response.status, parsed.error.issues);
  }

  return parsed.data;
}

function apiMessage(data: unknown): string | undefined {
  const parsed = ApiStatusSchema.safeParse(data);
  if (!parsed.success || parsed.data.message === undefined) return undefined;
  const message = String(parsed.data.message).trim();
  return message || undefined;
}

/**
 * The provider sometimes answers 200 with an error in the body,
 * so the body's `cod` wins over the HTTP status when present.
 */
export function assertApiSuccess(data: unknown, status: number): void {
  const parsed = ApiStatusSchema.safeParse(data);
  const cod = parsed.success && parsed.data.cod !== undefined ? Number(parsed.data.cod) : status;

  if (cod === 200) return;

  const message = apiMessage(data) ?? 'unknown error';
  throw new RemoteError(
    `OpenWeatherMap returned an error: ${message}`,
    Number.isInteger(cod) ? cod : status
  );
}

export function toRequestError(err: unknown): Error {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      const message = apiMessage(err.response.data) ?? err.message;
      logger.debug({ status: err.response.status, message }, 'Weather API rejected request');
      return new RemoteError(
        `OpenWeatherMap returned an error: ${message}`,
        err.response.status,
        undefined,
        { cause: err }
      );
    }

    logger.debug({ code: err.code, message: err.message }, 'Weather API unreachable');
    const reason =
      err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' ? 'request timed out' : err.message;
    return new NetworkError(`Could not reach OpenWeatherMap: ${reason}`, err.code, {
      cause: err,
    });
  }

  return err instanceof Error ? err : new Error(String(err));
}
