import { z } from 'zod';

/* ------------------ Shared blocks ------------------ */

export const ConditionSchema = z.object({
  id: z.number().optional(),
  main: z.string().optional(),
  description: z.string().optional(),
  icon: z.string().optional(),
});

export const MainSchema = z.object({
  temp: z.number(),
  feels_like: z.number().optional(),
  temp_min: z.number().optional(),
  temp_max: z.number().optional(),
  pressure: z.number().optional(),
  humidity: z.number().optional(),
});

export const WindSchema = z.object({
  speed: z.number().optional(),
  deg: z.number().optional(),
  gust: z.number().optional(),
});

export const CloudsSchema = z.object({
  all: z.number().optional(),
});

// Both endpoints report errors as { cod, message }; cod is a number or a numeric string
export const ApiStatusSchema = z.object({
  cod: z.union([z.number(), z.string()]).optional(),
  message: z.union([z.string(), z.number()]).optional(),
});

/* ------------------ /weather ------------------ */

export const CurrentWeatherSchema = z.object({
  coord: z
    .object({
      lat: z.number(),
      lon: z.number(),
    })
    .optional(),
  weather: z.array(ConditionSchema).default([]),
  main: MainSchema,
  visibility: z.number().optional(),
  wind: WindSchema.optional(),
  clouds: CloudsSchema.optional(),
  dt: z.number().optional(),
  sys: z
    .object({
      country: z.string().optional(),
      sunrise: z.number().optional(),
      sunset: z.number().optional(),
    })
    .optional(),
  timezone: z.number().default(0),
  name: z.string().optional(),
});

/* ------------------ /forecast ------------------ */

export const ForecastEntrySchema = z.object({
  dt: z.number(),
  main: MainSchema,
  weather: z.array(ConditionSchema).default([]),
  wind: WindSchema.optional(),
  clouds: CloudsSchema.optional(),
  pop: z.number().default(0),
});

export const ForecastSchema = z.object({
  list: z.array(ForecastEntrySchema),
  city: z
    .object({
      name: z.string().optional(),
      country: z.string().optional(),
      timezone: z.number().default(0),
    })
    .optional(),
});
