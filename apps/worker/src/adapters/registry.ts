import type { SourceKind } from "@energy-pipeline/shared";
import type { LoggerLike } from "../core/logger";
import type { PipelineConfig } from "../core/types";
import { SourceAdapter } from "./adapter.interface";
import { GridAdapter } from "./grid.adapter";
import { HouseholdAdapter } from "./household.adapter";
import { HttpTransport } from "./http-transport";
import { WeatherAdapter } from "./weather.adapter";

export type AdapterMap = { [K in SourceKind]: SourceAdapter<K> };

export class AdapterRegistry {
  constructor(private readonly adapters: AdapterMap) {}

  static fromConfig(config: PipelineConfig, transport: HttpTransport, logger?: LoggerLike): AdapterRegistry {
    return new AdapterRegistry({
      household: new HouseholdAdapter(transport, config.householdId),
      weather: new WeatherAdapter(transport, config.weatherLocations, logger),
      grid: new GridAdapter(transport, config.gridCountries)
    });
  }

  resolve<K extends SourceKind>(source: K): SourceAdapter<K> {
    return this.adapters[source];
  }
}
