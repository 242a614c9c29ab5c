import { z } from 'zod';
import { ConditionSchema, CurrentWeatherSchema, ForecastSchema } from '../schemas/weather.schema';

/* ------------------ Root Types ------------------ */

export type CurrentWeatherResponse = z.infer<typeof CurrentWeatherSchema>;
export type ForecastResponse = z.infer<typeof ForecastSchema>;

/* ------------------ Reusable Types ------------------ */

export type Condition = z.infer<typeof ConditionSchema>;
