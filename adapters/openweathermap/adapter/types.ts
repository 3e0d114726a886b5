import { z } from "zod";

// ── Adapter Config ──────────────────────────────────────────────────────────

export const DEFAULT_PUBLISHER_ID = "openweathermap";

export const weatherConfigSchema = z.object({
  cities: z.array(z.string().min(1)).default([]),
  api_key: z.string().min(1, "api_key is required"),
  publisher: z.string().min(1).default(DEFAULT_PUBLISHER_ID),
  units: z.enum(["metric", "imperial", "standard"]).default("metric"),
  poll_interval_ms: z.number().int().positive().default(15 * 60 * 1000),
  forecast: z.boolean().default(false),
  forecast_interval_ms: z.number().int().positive().default(6 * 60 * 60 * 1000),
  forecast_days: z.number().int().min(1).max(16).default(7),
});

export type WeatherConfig = z.infer<typeof weatherConfigSchema>;

export function parseWeatherConfig(raw: Record<string, unknown>): WeatherConfig {
  const result = weatherConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "config"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid openweathermap config: ${issues}`);
  }
  return result.data;
}

// ── API Response Types ──────────────────────────────────────────────────────

const conditionSchema = z.object({
  id: z.number().optional(),
  main: z.string().optional(),
  description: z.string(),
  icon: z.string().optional(),
});

const precipitationSchema = z.object({ "1h": z.number().default(0) }).default({});

export const currentWeatherSchema = z.object({
  name: z.string().optional(),
  dt: z.number(),
  weather: z.array(conditionSchema).default([]),
  main: z.object({
    temp: z.number(),
    humidity: z.number(),
    pressure: z.number(),
  }),
  wind: z
    .object({
      speed: z.number().default(0),
      deg: z.number().default(0),
    })
    .default({}),
  rain: precipitationSchema,
  snow: precipitationSchema,
});

export const dailyForecastSchema = z.object({
  city: z.object({ name: z.string() }).optional(),
  cnt: z.number().optional(),
  list: z
    .array(
      z.object({
        dt: z.number(),
        temp: z.object({ min: z.number(), max: z.number() }),
        weather: z.array(conditionSchema).default([]),
      }),
    )
    .default([]),
});

export type CurrentWeather = z.infer<typeof currentWeatherSchema>;
export type DailyForecast = z.infer<typeof dailyForecastSchema>;
export type DailyForecastItem = DailyForecast["list"][number];

// ── Client Contract ─────────────────────────────────────────────────────────

export interface WeatherClient {
  fetchCurrent(city: string, language: string): Promise<CurrentWeather>;
  fetchDailyForecast(city: string, language: string): Promise<DailyForecast>;
}
