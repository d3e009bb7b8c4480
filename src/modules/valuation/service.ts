import { INTACT, type Relic, type RelicMap } from "../relics/types";
import { hasPrice, round2 } from "./pricing";
import { NO_PRICE, type PriceIndex, type RankingEntry, type Rankings } from "./types";

/**
 * Name of the Intact variant of a relic: its first two words plus "Intact".
 * Intact prices are keyed by display name, the same key the fetcher stores relics under.
 */
export const intactPriceKey = (relicName: string): string =>
  `${relicName.split(" ").slice(0, 2).join(" ")} ${INTACT}`;

/** Price used as a divisor; an unknown price is NO_PRICE. */
export const divisorPrice = (prices: PriceIndex, name: string): number =>
  Object.hasOwn(prices, name) ? prices[name] : NO_PRICE;

/** Expected platinum value of a relic. Rewards without a price add nothing. */
export const relicValue = (relic: Pick<Relic, "rewards">, prices: PriceIndex): number => {
  let value = 0;
  for (const reward of relic.rewards) {
    const price = Object.hasOwn(prices, reward.itemName) ? prices[reward.itemName] : undefined;
    if (hasPrice(price)) value += (price * reward.chance) / 100;
  }
  return value;
};

/** value / price rounded to 2 decimals; a missing (infinite) price gives 0, and so does a free relic. */
export const profitRatio = (value: number, price: number): number =>
  price > 0 ? round2(value / price) : 0;

export const computeRelicValues = (relics: RelicMap, prices: PriceIndex): RelicMap => {
  const valued: RelicMap = {};
  for (const [name, relic] of Object.entries(relics)) {
    const ownPrice = relic.state === INTACT ? divisorPrice(prices, name) : NO_PRICE;
    valued[name] = {
      ...relic,
      value: relicValue(relic, prices),
      price: hasPrice(ownPrice) ? ownPrice : null,
    };
  }
  return valued;
};

const byMetricDesc = (a: RankingEntry, b: RankingEntry) =>
  b.metric - a.metric || (a.relicName < b.relicName ? -1 : a.relicName > b.relicName ? 1 : 0);

/** Both rankings over every relic, highest first. Relics must already carry their value. */
export const rankRelics = (relics: RelicMap, prices: PriceIndex): Rankings => {
  const value = Object.values(relics)
    .map((relic) => ({ relicName: relic.relicName, metric: relic.value }))
    .sort(byMetricDesc);

  const profit = value
    .map(({ relicName, metric }) => ({
      relicName,
      metric: profitRatio(metric, divisorPrice(prices, intactPriceKey(relicName))),
    }))
    .sort(byMetricDesc);

  return { value, profit };
};
