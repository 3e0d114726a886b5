import { runPublisher, type PublisherFactory } from "@skyrelay/publisher-sdk";
import { OpenWeatherMapClient } from "./api-client.js";
import { parseWeatherConfig } from "./types.js";
import { WeatherApp } from "./weather-app.js";

const createWeatherApp: PublisherFactory = (raw) => {
  const config = parseWeatherConfig(raw);
  const client = new OpenWeatherMapClient(config.api_key, config.units, config.forecast_days);
  return new WeatherApp(config, client);
};
export default createWeatherApp;

// Standalone entry point: when run as a process, start the SDK harness
runPublisher(createWeatherApp);
