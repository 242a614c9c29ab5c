import { Units } from '../constants/weather';

export interface WeatherObservation {
  city: string;
  country?: string;
  condition?: string;
  description: string;
  temperature: number;
  feelsLike?: number;
  tempMin: number;
  tempMax: number;
  pressure?: number;
  humidity?: number;
  windSpeed?: number;
  windDirection?: number;
  cloudiness?: number;
  visibility?: number;
  sunrise?: number;
  sunset?: number;
  timezoneOffset: number;
  units: Units;
}

export interface ForecastItem {
  timestamp: number;
  temperature: number;
  condition?: string;
  description: string;
  humidity?: number;
  windSpeed?: number;
  precipitationProbability: number;
}

export interface ForecastReport {
  city?: string;
  timezoneOffset: number;
  units: Units;
  items: ForecastItem[];
}
