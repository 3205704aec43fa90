import { fetchJson } from "../../core/http.js";
import { MalformedResponseError } from "../../core/errors.js";
import { isRecord, toFiniteNumber } from "../../core/validation.js";

export type RateProvider = {
  readonly name: string;
  /** Fiat units per 1 BTC. */
  fetchRate(): Promise<number>;
};

type ProviderOptions = {
  currency: string; // ISO code, e.g. "RUB"
  timeoutMs: number;
  baseUrl?: string;
};

function field(obj: unknown, key: string): unknown {
  return isRecord(obj) ? obj[key] : undefined;
}

function requireNumber(v: unknown, provider: string): number {
  const n = toFiniteNumber(v);
  if (n === undefined) throw new MalformedResponseError(`${provider}: rate missing in response`);
  return n;
}

/** GET /api/v3/simple/price?ids=bitcoin&vs_currencies=rub -> { bitcoin: { rub: 5000000 } } */
export function coinGeckoProvider(opts: ProviderOptions): RateProvider {
  const baseUrl = opts.baseUrl ?? "https://api.coingecko.com";
  const vs = opts.currency.toLowerCase();
  return {
    name: "coingecko",
    async fetchRate() {
      const u = new URL(`${baseUrl}/api/v3/simple/price`);
      u.searchParams.set("ids", "bitcoin");
      u.searchParams.set("vs_currencies", vs);
      const json = await fetchJson(u.toString(), { service: "coingecko", timeoutMs: opts.timeoutMs });
      return requireNumber(field(field(json, "bitcoin"), vs), "coingecko");
    }
  };
}

/** GET /ticker -> { RUB: { last: 5000000, ... }, USD: { ... } } */
export function blockchainTickerProvider(opts: ProviderOptions): RateProvider {
  const baseUrl = opts.baseUrl ?? "https://blockchain.info";
  const code = opts.currency.toUpperCase();
  return {
    name: "blockchain",
    async fetchRate() {
      const json = await fetchJson(`${baseUrl}/ticker`, { service: "blockchain.info ticker", timeoutMs: opts.timeoutMs });
      return requireNumber(field(field(json, code), "last"), "blockchain");
    }
  };
}

/** GET /v1/bpi/currentprice/RUB.json -> { bpi: { RUB: { rate_float: 5000000 } } } */
export function coinDeskProvider(opts: ProviderOptions): RateProvider {
  const baseUrl = opts.baseUrl ?? "https://api.coindesk.com";
  const code = opts.currency.toUpperCase();
  return {
    name: "coindesk",
    async fetchRate() {
      const json = await fetchJson(`${baseUrl}/v1/bpi/currentprice/${code}.json`, {
        service: "coindesk",
        timeoutMs: opts.timeoutMs
      });
      return requireNumber(field(field(field(json, "bpi"), code), "rate_float"), "coindesk");
    }
  };
}

const FACTORIES: Record<string, (opts: ProviderOptions) => RateProvider> = {
  coingecko: coinGeckoProvider,
  blockchain: blockchainTickerProvider,
  coindesk: coinDeskProvider
};

/** Builds providers in the given priority order. Unknown names are an error. */
export function createRateProviders(names: readonly string[], opts: ProviderOptions): RateProvider[] {
  return names.map((name) => {
    const factory = FACTORIES[name];
    if (!factory) throw new Error(`Unknown rate provider "${name}" (known: ${Object.keys(FACTORIES).join(", ")})`);
    return factory(opts);
  });
}
