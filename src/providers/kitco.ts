// Kitco — implementation of MetalsSource over the public chart pages.

import { Clock, Config, Console, Duration, Effect, Layer } from "effect";
import type { Metal, MetalQuote, PriceSnapshot } from "../domain.ts";
import {
  ExtractionFailed,
  MetalsSource,
  type MetalsSourceError,
  sourceTimeout,
} from "../metals-api.ts";
import { PageFetcher } from "../page-fetcher.ts";
import {
  type ExtractionStrategy,
  STRATEGY_NAMES,
  strategyFor,
} from "../strategies/index.ts";

// --- Capture stamp ---

const MONTH_ABBREVIATIONS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];

const pad2 = (n: number) => String(n).padStart(2, "0");

/** Local wall-clock stamp, e.g. { date: "Oct 10, 2025", time: "02:30 PM" }.
 *  The source's own timestamps are not reliable enough to show. */
export function captureStamp(at: Date): { date: string; time: string } {
  const hours = at.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return {
    date: `${MONTH_ABBREVIATIONS[at.getMonth()]} ${pad2(at.getDate())}, ${at.getFullYear()}`,
    time: `${pad2(hour12)}:${pad2(at.getMinutes())} ${hours < 12 ? "AM" : "PM"}`,
  };
}

const LABELS: Record<Metal, MetalQuote["metal"]> = {
  gold: "Gold",
  silver: "Silver",
};

// --- Source ---

export interface KitcoOptions {
  readonly baseUrl: string;
  readonly strategy: ExtractionStrategy;
  /** Per page; exceeding it fails with SourceTimeout. */
  readonly timeout: Duration.DurationInput;
}

export const DEFAULT_BASE_URL = "https://www.kitco.com/charts";
export const DEFAULT_TIMEOUT = "15 seconds";

export function makeKitcoSource(options: KitcoOptions) {
  return Effect.gen(function* () {
    const fetcher = yield* PageFetcher;
    const { baseUrl, strategy, timeout } = options;

    const fetchMetal = (
      metal: Metal,
    ): Effect.Effect<MetalQuote, MetalsSourceError> =>
      Effect.gen(function* () {
        const html = yield* fetcher.fetchPage(`${baseUrl}/${metal}`).pipe(
          Effect.timeoutFail({
            duration: timeout,
            onTimeout: () => sourceTimeout(metal),
          }),
          Effect.catchTag("FetchError", (e) =>
            Effect.fail(
              new ExtractionFailed({
                metal,
                message: `Network error: ${e.message}`,
              }),
            )),
        );
        const { bid, ask } = yield* strategy.extract(html, metal);
        const now = yield* Clock.currentTimeMillis;
        return { metal: LABELS[metal], bid, ask, ...captureStamp(new Date(now)) };
      }).pipe(
        Effect.tapError((e) =>
          Console.debug(`[kitco] ${metal} failed: ${e._tag}: ${e.message}`)
        ),
      );

    return MetalsSource.of({
      fetchPrices: Effect.all(
        { gold: fetchMetal("gold"), silver: fetchMetal("silver") },
        { concurrency: "unbounded" },
      ).pipe(
        Effect.map(({ gold, silver }): PriceSnapshot => ({
          gold,
          silver,
          date: gold.date,
          time: gold.time,
        })),
      ),
    });
  });
}

// --- Kitco layer ---

export const KitcoLive = Layer.effect(
  MetalsSource,
  Effect.gen(function* () {
    const baseUrl = yield* Config.string("METALS_BASE_URL").pipe(
      Config.withDefault(DEFAULT_BASE_URL),
    );
    const strategyName = yield* Config.literal(...STRATEGY_NAMES)(
      "METALS_STRATEGY",
    ).pipe(Config.withDefault("auto" as const));
    const timeout = yield* Config.duration("METALS_TIMEOUT").pipe(
      Config.withDefault(Duration.decode(DEFAULT_TIMEOUT)),
    );

    yield* Console.debug(
      `[kitco] strategy=${strategyName} timeout=${Duration.toMillis(timeout)}ms`,
    );

    return yield* makeKitcoSource({
      baseUrl,
      strategy: strategyFor(strategyName),
      timeout,
    });
  }),
);
