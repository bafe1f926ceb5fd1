// Runtime settings, read from the environment through effect Config.

import { Config, Duration, Option } from "effect";

export interface PriceSettings {
  readonly cacheTtl: Duration.Duration;
  readonly cacheMaxEntries: number;
  readonly providerTimeout: Duration.Duration;
  readonly providerRetries: number;
  readonly minIntervals: {
    readonly yahoo: Duration.Duration;
    readonly alphavantage: Duration.Duration;
    readonly coingecko: Duration.Duration;
  };
}

const duration = (name: string, fallback: Duration.DurationInput) =>
  Config.duration(name).pipe(Config.withDefault(Duration.decode(fallback)));

export const PriceSettingsConfig: Config.Config<PriceSettings> = Config.all({
  cacheTtl: duration("PRICE_CACHE_TTL", "5 minutes"),
  cacheMaxEntries: Config.integer("PRICE_CACHE_MAX_ENTRIES").pipe(
    Config.withDefault(1000),
  ),
  providerTimeout: duration("PROVIDER_TIMEOUT", "5 seconds"),
  providerRetries: Config.integer("PROVIDER_RETRIES").pipe(
    Config.withDefault(1),
  ),
  minIntervals: Config.all({
    yahoo: duration("YAHOO_MIN_INTERVAL", "0 millis"),
    alphavantage: duration("ALPHA_VANTAGE_MIN_INTERVAL", "12 seconds"),
    coingecko: duration("COINGECKO_MIN_INTERVAL", "1100 millis"),
  }),
});

/** Alpha Vantage needs a key; without one the adapter is left out. */
export const AlphaVantageKeyConfig: Config.Config<Option.Option<string>> =
  Config.option(Config.string("ALPHA_VANTAGE_API_KEY"));
