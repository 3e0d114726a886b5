import { IOType, type HistoryList } from "@skyrelay/publisher-sdk";
import type { CurrentWeather, DailyForecast } from "./types.js";

// ── Instances ───────────────────────────────────────────────────────────────

export const CURRENT_INST = "current";
export const LAST_HOUR_INST = "hour";
export const FORECAST_INST = "forecast";
export const MAX_INST = "max";
export const MIN_INST = "min";

/** Every output a city node carries, in provisioning order. */
export const CITY_OUTPUTS: ReadonlyArray<readonly [IOType, string]> = [
  [IOType.Weather, CURRENT_INST],
  [IOType.Temperature, CURRENT_INST],
  [IOType.Humidity, CURRENT_INST],
  [IOType.AtmosphericPressure, CURRENT_INST],
  [IOType.WindHeading, CURRENT_INST],
  [IOType.WindSpeed, CURRENT_INST],
  [IOType.Rain, LAST_HOUR_INST],
  [IOType.Snow, LAST_HOUR_INST],
  [IOType.Weather, FORECAST_INST],
  [IOType.Temperature, MAX_INST],
  [IOType.Temperature, MIN_INST],
];

export interface OutputValue {
  type: IOType;
  instance: string;
  value: string;
}

function describe(weather: Array<{ description: string }>): string {
  return weather[0]?.description ?? "";
}

// ── Current Weather ─────────────────────────────────────────────────────────

export function translateCurrentWeather(current: CurrentWeather): OutputValue[] {
  return [
    { type: IOType.Weather, instance: CURRENT_INST, value: describe(current.weather) },
    { type: IOType.Temperature, instance: CURRENT_INST, value: current.main.temp.toFixed(1) },
    { type: IOType.Humidity, instance: CURRENT_INST, value: String(Math.round(current.main.humidity)) },
    { type: IOType.AtmosphericPressure, instance: CURRENT_INST, value: current.main.pressure.toFixed(0) },
    { type: IOType.WindSpeed, instance: CURRENT_INST, value: current.wind.speed.toFixed(1) },
    { type: IOType.WindHeading, instance: CURRENT_INST, value: current.wind.deg.toFixed(0) },
    // API reports mm; outputs carry mm × 1000
    { type: IOType.Rain, instance: LAST_HOUR_INST, value: (current.rain["1h"] * 1000).toFixed(1) },
    { type: IOType.Snow, instance: LAST_HOUR_INST, value: (current.snow["1h"] * 1000).toFixed(1) },
  ];
}

// ── Daily Forecast ──────────────────────────────────────────────────────────

export interface ForecastLists {
  weather: HistoryList;
  maxTemperature: HistoryList;
  minTemperature: HistoryList;
}

export function translateDailyForecast(forecast: DailyForecast): ForecastLists {
  const lists: ForecastLists = { weather: [], maxTemperature: [], minTemperature: [] };

  for (const day of forecast.list) {
    const timestamp = new Date(day.dt * 1000).toISOString();
    lists.weather.push({ timestamp, value: describe(day.weather) });
    lists.maxTemperature.push({ timestamp, value: day.temp.max.toFixed(1) });
    lists.minTemperature.push({ timestamp, value: day.temp.min.toFixed(1) });
  }
  return lists;
}
