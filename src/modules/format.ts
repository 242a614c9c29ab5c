import chalk from 'chalk';
import {
  CHART_HEIGHT,
  COMPASS_POINTS,
  CONDITION_EMOJI,
  DAILY_FORECAST_DAYS,
  DEFAULT_EMOJI,
  HOURLY_FORECAST_SLOTS,
  HPA_TO_MMHG,
  HUMIDITY_BAR_WIDTH,
  UNIT_LABELS,
  Units,
  WIND_ARROWS,
} from '../constants/weather';
import { ForecastItem, ForecastReport, WeatherObservation } from '../interfaces/weatherData';
import { formatDayLabel, formatLocalTime, formatUtcOffset, localDateKey } from '../utils/time';

export interface FormatOptions {
  color: boolean;
}

const RULE_WIDTH = 40;

function painter({ color }: FormatOptions): chalk.Chalk {
  return new chalk.Instance({ level: color ? (chalk.level > 0 ? chalk.level : 1) : 0 });
}

export function conditionEmoji(condition: string | undefined): string {
  return (condition && CONDITION_EMOJI[condition]) || DEFAULT_EMOJI;
}

export function windDirection(degrees: number): string {
  const normalized = ((degrees % 360) + 360) % 360;
  const index = Math.floor(normalized / 22.5 + 0.5) % COMPASS_POINTS.length;
  return COMPASS_POINTS[index];
}

export function windArrow(degrees: number): string {
  const normalized = ((degrees % 360) + 360) % 360;
  return WIND_ARROWS[Math.floor(normalized / 45 + 0.5) % WIND_ARROWS.length];
}

export function humidityBar(percent: number, width = HUMIDITY_BAR_WIDTH): string {
  const filled = Math.min(width, Math.max(0, Math.floor((percent * width) / 100)));
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${percent}%`;
}

export function formatVisibility(metres: number): string {
  return `${metres} m (${(metres / 1000).toFixed(1)} km)`;
}

export function formatPressure(hpa: number): string {
  return `${hpa} hPa (~${(hpa * HPA_TO_MMHG).toFixed(0)} mmHg)`;
}

function toCelsius(value: number, units: Units): number {
  if (units === 'imperial') return ((value - 32) * 5) / 9;
  if (units === 'standard') return value - 273.15;
  return value;
}

function temperatureColor(paint: chalk.Chalk, value: number, units: Units): chalk.Chalk {
  const celsius = toCelsius(value, units);
  if (celsius < 0) return paint.blue;
  if (celsius < 10) return paint.cyan;
  if (celsius < 20) return paint.green;
  if (celsius < 30) return paint.yellow;
  return paint.red;
}

/**
 * Current conditions: one summary line, then a table of whatever
 * optional fields the provider sent.
 */
export function formatWeather(observation: WeatherObservation, options: FormatOptions): string {
  const paint = painter(options);
  const { temperature: tempUnit, wind: windUnit } = UNIT_LABELS[observation.units];
  const temp = (value: number) =>
    temperatureColor(paint, value, observation.units)(`${value.toFixed(1)} ${tempUnit}`);

  const location = observation.country
    ? `${observation.city}, ${observation.country}`
    : observation.city;

  const summary =
    `${conditionEmoji(observation.condition)} ` +
    paint.bold.cyan(`Weather in ${location}:`) +
    ` ${temp(observation.temperature)}, ${observation.description}`;

  const rows: Array<[string, string]> = [];
  const zone = formatUtcOffset(observation.timezoneOffset);

  if (observation.feelsLike !== undefined) rows.push(['Feels like', temp(observation.feelsLike)]);
  if (observation.pressure !== undefined) rows.push(['Pressure', formatPressure(observation.pressure)]);
  if (observation.humidity !== undefined) rows.push(['Humidity', humidityBar(observation.humidity)]);
  if (observation.windSpeed !== undefined) {
    rows.push(['Wind speed', `${observation.windSpeed.toFixed(1)} ${windUnit}`]);
  }
  if (observation.windDirection !== undefined) {
    rows.push([
      'Wind direction',
      `${windArrow(observation.windDirection)} ${observation.windDirection}° ` +
        `(${windDirection(observation.windDirection)})`,
    ]);
  }
  if (observation.cloudiness !== undefined) rows.push(['Cloudiness', `${observation.cloudiness}%`]);
  rows.push(['Min temperature', temp(observation.tempMin)]);
  rows.push(['Max temperature', temp(observation.tempMax)]);
  if (observation.visibility !== undefined) {
    rows.push(['Visibility', formatVisibility(observation.visibility)]);
  }
  if (observation.sunrise !== undefined) {
    rows.push(['Sunrise', `${formatLocalTime(observation.sunrise, observation.timezoneOffset)} (${zone})`]);
  }
  if (observation.sunset !== undefined) {
    rows.push(['Sunset', `${formatLocalTime(observation.sunset, observation.timezoneOffset)} (${zone})`]);
  }

  const width = Math.max(...rows.map(([label]) => label.length));

  return [
    summary,
    paint.gray('='.repeat(RULE_WIDTH)),
    ...rows.map(([label, value]) => `${paint.dim(label.padEnd(width))} : ${value}`),
  ].join('\n');
}

function mostFrequent(items: ForecastItem[]): ForecastItem {
  const counts = new Map<string, number>();
  let best = items[0];
  let bestCount = 0;

  for (const item of items) {
    const count = (counts.get(item.description) ?? 0) + 1;
    counts.set(item.description, count);
    // Strictly greater: ties go to the earliest slot
    if (count > bestCount) {
      best = item;
      bestCount = count;
    }
  }

  return best;
}

export function groupByLocalDay(report: ForecastReport): Map<string, ForecastItem[]> {
  const days = new Map<string, ForecastItem[]>();
  for (const item of report.items) {
    const key = localDateKey(item.timestamp, report.timezoneOffset);
    const bucket = days.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      days.set(key, [item]);
    }
  }
  return days;
}

export function formatDailyForecast(report: ForecastReport, options: FormatOptions): string {
  if (report.items.length === 0) return 'No forecast data';

  const paint = painter(options);
  const unit = UNIT_LABELS[report.units].temperature;
  const lines = [paint.bold.cyan(`📅 ${DAILY_FORECAST_DAYS}-day forecast`), paint.gray('='.repeat(RULE_WIDTH))];

  const days = [...groupByLocalDay(report)].slice(0, DAILY_FORECAST_DAYS);

  for (const [dateKey, items] of days) {
    const temps = items.map((item) => item.temperature);
    const min = Math.min(...temps);
    const max = Math.max(...temps);
    const avg = temps.reduce((sum, t) => sum + t, 0) / temps.length;
    const typical = mostFrequent(items);
    const precipitation = Math.max(...items.map((item) => item.precipitationProbability));

    lines.push('');
    lines.push(paint.yellow(`${conditionEmoji(typical.condition)} ${formatDayLabel(dateKey)}`));
    lines.push(`  ${typical.description}`);
    lines.push(
      `  Temperature: ${min.toFixed(1)}${unit} ... ${max.toFixed(1)}${unit} (avg ${avg.toFixed(1)}${unit})`
    );
    if (precipitation > 10) {
      lines.push(`  Precipitation chance: ${precipitation.toFixed(0)}%`);
    }
  }

  return lines.join('\n');
}

export function formatHourlyForecast(report: ForecastReport, options: FormatOptions): string {
  if (report.items.length === 0) return 'No forecast data';

  const paint = painter(options);
  const unit = UNIT_LABELS[report.units].temperature;
  const lines = [paint.bold.cyan('⏰ Next 24 hours'), paint.gray('='.repeat(RULE_WIDTH))];

  for (const item of report.items.slice(0, HOURLY_FORECAST_SLOTS)) {
    const time = formatLocalTime(item.timestamp, report.timezoneOffset, false);
    let line =
      `${paint.yellow(time)} ${conditionEmoji(item.condition)} ` +
      `${item.temperature.toFixed(1).padStart(5)}${unit}  ${item.description}`;
    if (item.precipitationProbability > 20) {
      line += `  💧 ${item.precipitationProbability.toFixed(0)}%`;
    }
    lines.push(line);
  }

  return lines.join('\n');
}

const CHART_COLUMN = 3;

/**
 * Plots the next 24 hours of the forecast as dots on a text grid,
 * warmest row on top. Every other slot gets a time label.
 */
export function formatTemperatureChart(report: ForecastReport, options: FormatOptions): string {
  if (report.items.length === 0) return 'No forecast data';

  const paint = painter(options);
  const unit = UNIT_LABELS[report.units].temperature;
  const items = report.items.slice(0, HOURLY_FORECAST_SLOTS);
  const temps = items.map((item) => item.temperature);
  const min = Math.min(...temps);
  const max = Math.max(...temps);
  const range = max === min ? 1 : max - min;
  const steps = CHART_HEIGHT - 1;

  const rowOf = temps.map((t) => steps - Math.floor(((t - min) * steps) / range));
  const gutter = ' '.repeat(5 + unit.length + 1);

  const lines = [paint.bold.cyan('📈 Temperature, next 24 hours'), paint.gray('='.repeat(RULE_WIDTH))];

  for (let row = 0; row < CHART_HEIGHT; row++) {
    const label = (max - (row * range) / steps).toFixed(1).padStart(5);
    const cells = temps
      .map((t, i) =>
        rowOf[i] === row ? ` ${temperatureColor(paint, t, report.units)('●')} ` : ' '.repeat(CHART_COLUMN)
      )
      .join('');
    lines.push(`${label}${unit} ${paint.gray('│')}${cells}`.trimEnd());
  }

  lines.push(`${gutter}${paint.gray(`└${'─'.repeat(CHART_COLUMN * items.length)}`)}`);

  const times = items
    .map((item, i) =>
      i % 2 === 0
        ? formatLocalTime(item.timestamp, report.timezoneOffset, false).padEnd(CHART_COLUMN * 2)
        : ''
    )
    .join('');
  lines.push(`${gutter} ${times}`.trimEnd());

  return lines.join('\n');
}
