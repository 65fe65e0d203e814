// MetalsSourceTest — fixed prices for development without hitting the site.

import { Effect, Layer } from "effect";
import type { PriceSnapshot } from "../domain.ts";
import { MetalsSource } from "../metals-api.ts";

// --- Sample data ---

const stamp = { date: "Jun 15, 2025", time: "04:00 PM" };

export const sampleSnapshot: PriceSnapshot = {
  gold: { metal: "Gold", bid: "3,432.10", ask: "3,434.10", ...stamp },
  silver: { metal: "Silver", bid: "36.28", ask: "36.48", ...stamp },
  ...stamp,
};

// --- Mock layer ---

export const MetalsSourceTestLive = Layer.succeed(
  MetalsSource,
  MetalsSource.of({ fetchPrices: Effect.succeed(sampleSnapshot) }),
);
