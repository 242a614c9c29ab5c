export const VERSION = '1.0.0';

export const DEFAULT_BASE_URL = 'https://api.openweathermap.org/data/2.5';
export const CURRENT_WEATHER_PATH = '/weather';
export const FORECAST_PATH = '/forecast';

export const ENV_API_KEY = 'OPENWEATHER_API_KEY';
export const SECRETS_PREFIX = '/run/secrets/';

export const DEFAULT_LANGUAGE = 'en';
export const DEFAULT_TIMEOUT_SECONDS = 10;
// Whole milliseconds that still fit a 32-bit timer
export const MIN_TIMEOUT_SECONDS = 0.001;
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const UNITS = ['metric', 'imperial', 'standard'] as const;
export type Units = (typeof UNITS)[number];

export const UNIT_LABELS: Record<Units, { temperature: string; wind: string }> = {
  metric: { temperature: '°C', wind: 'm/s' },
  imperial: { temperature: '°F', wind: 'mph' },
  standard: { temperature: 'K', wind: 'm/s' },
};

// Keyed by the provider's language-independent condition group (weather[].main)
export const CONDITION_EMOJI: Record<string, string> = {
  Clear: '☀️',
  Clouds: '☁️',
  Drizzle: '🌦️',
  Rain: '🌧️',
  Thunderstorm: '⛈️',
  Snow: '❄️',
  Mist: '🌫️',
  Fog: '🌫️',
  Haze: '🌫️',
  Smoke: '🌫️',
  Dust: '🌫️',
  Sand: '🌫️',
  Ash: '🌫️',
  Squall: '🌪️',
  Tornado: '🌪️',
};
export const DEFAULT_EMOJI = '🌈';

export const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
] as const;

export const HPA_TO_MMHG = 0.75006;

export const DAILY_FORECAST_DAYS = 5;
export const HOURLY_FORECAST_SLOTS = 8; // 3h slots -> 24h

// Wind blows towards the opposite of where it comes from
export const WIND_ARROWS = ['↓', '↙', '←', '↖', '↑', '↗', '→', '↘'] as const;

export const HUMIDITY_BAR_WIDTH = 20;
export const CHART_HEIGHT = 10;
