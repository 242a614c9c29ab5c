import { CurrentWeatherSchema, ForecastSchema } from '@/schemas/weather.schema';
import { formatDescription, WeatherService } from '@/modules/weather';
import { RemoteError } from '@/errors';
import { currentPayload, forecastPayload, httpError } from '../fixtures/openWeather';

describe('formatDescription (unit)', () => {
  it('capitalises the first letter only', () => {
    expect(formatDescription('light rain')).toBe('Light rain');
    expect(formatDescription('  HEAVY snow ')).toBe('Heavy snow');
  });

  it('returns a placeholder for missing descriptions', () => {
    expect(formatDescription(undefined)).toBe('No data');
    expect(formatDescription('   ')).toBe('No data');
  });
});

describe('WeatherService (unit)', () => {
  const mockGet = jest.fn();
  let service: WeatherService;

  beforeEach(() => {
    service = new WeatherService({ get: mockGet });
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - API payload is mapped field by field onto the observation
   */
  it('maps a full current weather payload', () => {
    const data = CurrentWeatherSchema.parse(currentPayload);

    expect(service.createObservation('london', data, 'metric')).toEqual({
      city: 'London',
      country: 'GB',
      condition: 'Rain',
      description: 'Light rain',
      temperature: 12.34,
      feelsLike: 11.5,
      tempMin: 10.2,
      tempMax: 14.8,
      pressure: 1012,
      humidity: 81,
      windSpeed: 4.6,
      windDirection: 230,
      cloudiness: 75,
      visibility: 10000,
      sunrise: 1736928000,
      sunset: 1736958000,
      timezoneOffset: 0,
      units: 'metric',
    });
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - only main.temp is required
   * - city falls back to the requested name
   * - min/max fall back to the temperature
   */
  it('fills gaps in a minimal payload', () => {
    const data = CurrentWeatherSchema.parse({ main: { temp: -3.5 } });
    const observation = service.createObservation('Reykjavik', data, 'standard');

    expect(observation).toEqual({
      city: 'Reykjavik',
      description: 'No data',
      temperature: -3.5,
      tempMin: -3.5,
      tempMax: -3.5,
      timezoneOffset: 0,
      units: 'standard',
    });
    expect(observation.humidity).toBeUndefined();
    expect(observation.windSpeed).toBeUndefined();
  });

  it('maps forecast entries and converts pop to a percentage', () => {
    const report = service.createForecast(ForecastSchema.parse(forecastPayload), 'metric');

    expect(report.city).toBe('London');
    expect(report.timezoneOffset).toBe(0);
    expect(report.items).toEqual([
      {
        timestamp: 1736964000,
        temperature: 5,
        condition: 'Clear',
        description: 'Clear sky',
        humidity: 70,
        windSpeed: 2.1,
        precipitationProbability: 0,
      },
      {
        timestamp: 1736974800,
        temperature: 3,
        condition: 'Rain',
        description: 'Light rain',
        humidity: 90,
        windSpeed: 3.4,
        precipitationProbability: 50,
      },
    ]);
  });

  it('fetches and maps current weather', async () => {
    mockGet.mockResolvedValueOnce({ status: 200, data: currentPayload });

    const observation = await service.getCurrent({
      city: 'London',
      apiKey: 'test-key',
      units: 'metric',
      lang: 'en',
    });

    expect(observation.city).toBe('London');
    expect(observation.temperature).toBe(12.34);
  });

  it('lets request errors through', async () => {
    mockGet.mockRejectedValueOnce(httpError(404, { cod: '404', message: 'city not found' }));

    await expect(
      service.getCurrent({ city: 'Atlantis', apiKey: 'test-key', units: 'metric', lang: 'en' })
    ).rejects.toBeInstanceOf(RemoteError);
  });

  it('fetches and maps the forecast', async () => {
    mockGet.mockResolvedValueOnce({ status: 200, data: forecastPayload });

    const report = await service.getForecast({
      city: 'London',
      apiKey: 'test-key',
      units: 'metric',
      lang: 'en',
    });

    expect(mockGet).toHaveBeenCalledWith('/forecast', expect.anything());
    expect(report.items).toHaveLength(2);
  });
});
