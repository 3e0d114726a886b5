import type { ZodType, ZodTypeDef } from "zod";
import { currentWeatherSchema, dailyForecastSchema } from "./types.js";
import type { CurrentWeather, DailyForecast, WeatherClient } from "./types.js";

const BASE_URL = "https://api.openweathermap.org/data/2.5";
const REQUEST_TIMEOUT_MS = 10_000;

export class OpenWeatherMapClient implements WeatherClient {
  private apiKey: string;
  private units: string;
  private forecastDays: number;

  constructor(apiKey: string, units = "metric", forecastDays = 7) {
    this.apiKey = apiKey;
    this.units = units;
    this.forecastDays = forecastDays;
  }

  async fetchCurrent(city: string, language: string): Promise<CurrentWeather> {
    return this.get("weather", { q: city, lang: language }, currentWeatherSchema);
  }

  /** Daily forecast. Needs a paid OpenWeatherMap plan. */
  async fetchDailyForecast(city: string, language: string): Promise<DailyForecast> {
    return this.get(
      "forecast/daily",
      { q: city, lang: language, cnt: String(this.forecastDays) },
      dailyForecastSchema,
    );
  }

  buildUrl(path: string, params: Record<string, string>): string {
    const query = new URLSearchParams({ ...params, appid: this.apiKey, units: this.units });
    return `${BASE_URL}/${path}?${query.toString()}`;
  }

  private async get<T>(
    path: string,
    params: Record<string, string>,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const res = await globalThis.fetch(this.buildUrl(path, params), {
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new Error(`OpenWeatherMap API error: ${res.status} ${res.statusText}`);
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Unexpected OpenWeatherMap response for ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
