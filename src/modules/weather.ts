import { Units } from '../constants/weather';
import { Condition, CurrentWeatherResponse, ForecastResponse } from '../interfaces/weather';
import { WeatherQuery } from '../interfaces/request';
import { ForecastReport, WeatherObservation } from '../interfaces/weatherData';
import { logger } from '../logger';
import { getCurrentWeatherFromApi, getForecastFromApi, HttpClient } from './getWeather';

export function formatDescription(description: string | undefined): string {
  const text = description?.trim();
  if (!text) return 'No data';
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

function firstCondition(conditions: Condition[]): Condition {
  return conditions[0] ?? {};
}

export class WeatherService {
  constructor(private readonly client: HttpClient) {}

  // Response mapping
  createObservation(
    requestedCity: string,
    data: CurrentWeatherResponse,
    units: Units
  ): WeatherObservation {
    const condition = firstCondition(data.weather);
    const temperature = data.main.temp;

    return {
      city: data.name || requestedCity,
      country: data.sys?.country || undefined,
      condition: condition.main,
      description: formatDescription(condition.description),
      temperature,
      feelsLike: data.main.feels_like,
      tempMin: data.main.temp_min ?? temperature,
      tempMax: data.main.temp_max ?? temperature,
      pressure: data.main.pressure,
      humidity: data.main.humidity,
      windSpeed: data.wind?.speed,
      windDirection: data.wind?.deg,
      cloudiness: data.clouds?.all,
      visibility: data.visibility,
      sunrise: data.sys?.sunrise,
      sunset: data.sys?.sunset,
      timezoneOffset: data.timezone,
      units,
    };
  }

  createForecast(data: ForecastResponse, units: Units): ForecastReport {
    return {
      city: data.city?.name,
      timezoneOffset: data.city?.timezone ?? 0,
      units,
      items: data.list.map((entry) => {
        const condition = firstCondition(entry.weather);
        return {
          timestamp: entry.dt,
          temperature: entry.main.temp,
          condition: condition.main,
          description: formatDescription(condition.description),
          humidity: entry.main.humidity,
          windSpeed: entry.wind?.speed,
          // pop is a 0..1 fraction
          precipitationProbability: entry.pop * 100,
        };
      }),
    };
  }

  // Public API
  async getCurrent(query: WeatherQuery): Promise<WeatherObservation> {
    logger.debug({ city: query.city, units: query.units }, 'Fetching current weather');

    const data = await getCurrentWeatherFromApi(this.client, query);
    const observation = this.createObservation(query.city, data, query.units);

    logger.info({ city: observation.city }, 'Current weather received');
    return observation;
  }

  async getForecast(query: WeatherQuery): Promise<ForecastReport> {
    logger.debug({ city: query.city, units: query.units }, 'Fetching forecast');

    const data = await getForecastFromApi(this.client, query);
    const report = this.createForecast(data, query.units);

    logger.info({ city: query.city, entries: report.items.length }, 'Forecast received');
    return report;
  }
}
