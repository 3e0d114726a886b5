import {
  IOType,
  PUBLISHER_NODE_ID,
  newConfig,
  type AttrMap,
  type Node,
  type Publisher,
  type PublisherState,
} from "@skyrelay/publisher-sdk";
import type { CurrentWeather, DailyForecast, WeatherClient, WeatherConfig } from "./types.js";
import {
  CITY_OUTPUTS,
  FORECAST_INST,
  MAX_INST,
  MIN_INST,
  translateCurrentWeather,
  translateDailyForecast,
} from "./translators.js";

export const DEFAULT_LANGUAGE = "en";
const LANGUAGE_CONFIG = "language";

export const CURRENT_UNAVAILABLE = "Current weather not available";
export const FORECAST_FAILED = "Error getting the daily forecast";
export const FORECAST_EMPTY = "Daily forecast not provided";

function causeOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Publishes current weather (and optionally a daily forecast) for each
 * configured city as a node with a fixed set of outputs.
 */
export class WeatherApp implements Publisher {
  readonly publisherId: string;
  readonly updateInterval: number;
  readonly forecastInterval?: number;

  private cities: string[];
  private client: WeatherClient;

  constructor(config: WeatherConfig, client: WeatherClient) {
    this.cities = [...config.cities];
    this.publisherId = config.publisher;
    this.updateInterval = config.poll_interval_ms;
    if (config.forecast) this.forecastInterval = config.forecast_interval_ms;
    this.client = client;
  }

  /** Create a node per city with its language setting and outputs. */
  publishNodes(pub: PublisherState): void {
    for (const city of this.cities) {
      const cityNode = pub.nodes.updateNode(pub.newNode(city));

      pub.nodes.updateNodeConfig(
        cityNode,
        newConfig(
          LANGUAGE_CONFIG,
          "enum",
          "Reporting language. See https://openweathermap.org/current for more options",
          DEFAULT_LANGUAGE,
        ),
      );

      for (const [type, instance] of CITY_OUTPUTS) {
        pub.outputs.newOutput(cityNode, type, instance);
      }
    }
  }

  /**
   * Fetch the current weather for every city node and write it to the outputs.
   * The first failing city stops the whole run and the returned promise
   * rejects; the next tick tries again.
   */
  async update(pub: PublisherState): Promise<void> {
    console.log("[OpenWeatherMap] Updating current weather");

    for (const node of pub.nodes.getAllNodes()) {
      if (node.id === PUBLISHER_NODE_ID) continue;

      let current: CurrentWeather;
      try {
        current = await this.client.fetchCurrent(node.id, languageOf(node));
      } catch (err) {
        pub.setErrorStatus(node, CURRENT_UNAVAILABLE);
        throw new Error(`Current weather for ${node.id} failed: ${causeOf(err)}`);
      }

      for (const { type, instance, value } of translateCurrentWeather(current)) {
        pub.outputHistory.updateOutputValue(node, type, instance, value);
      }
      pub.clearErrorStatus(node, CURRENT_UNAVAILABLE);
    }
  }

  /** Publish the daily forecast per city. Same stop-on-first-failure policy as update(). */
  async updateForecast(pub: PublisherState): Promise<void> {
    console.log("[OpenWeatherMap] Updating daily forecast");

    for (const node of pub.nodes.getAllNodes()) {
      if (node.id === PUBLISHER_NODE_ID) continue;

      let forecast: DailyForecast;
      try {
        forecast = await this.client.fetchDailyForecast(node.id, languageOf(node));
      } catch (err) {
        pub.setErrorStatus(node, FORECAST_FAILED);
        throw new Error(`Daily forecast for ${node.id} failed: ${causeOf(err)}`);
      }
      if (forecast.list.length === 0) {
        pub.setErrorStatus(node, FORECAST_EMPTY);
        throw new Error(`Daily forecast for ${node.id} is empty`);
      }

      const lists = translateDailyForecast(forecast);
      pub.updateForecast(node, IOType.Weather, FORECAST_INST, lists.weather);
      pub.updateForecast(node, IOType.Temperature, MAX_INST, lists.maxTemperature);
      pub.updateForecast(node, IOType.Temperature, MIN_INST, lists.minTemperature);
      pub.clearErrorStatus(node, FORECAST_FAILED);
      pub.clearErrorStatus(node, FORECAST_EMPTY);
    }
  }

  /** Node configuration changes are acknowledged but not applied. */
  onNodeConfig(_node: Node, _values: AttrMap): AttrMap | null {
    return null;
  }
}

function languageOf(node: Node): string {
  return node.config[LANGUAGE_CONFIG]?.value || DEFAULT_LANGUAGE;
}
