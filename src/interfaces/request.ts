import { Units } from '../constants/weather';

export interface WeatherQuery {
  city: string;
  apiKey: string;
  units: Units;
  lang: string;
}
