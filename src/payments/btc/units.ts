export const BTC_DECIMALS = 8;
export const SATS_PER_BTC = 100_000_000n;
export const FIAT_DECIMALS = 2;

/**
 * Converts a non-negative decimal string like "0.00100137" to integer units with the given number of
 * decimals. Extra precision is truncated.
 */
export function decimalToUnits(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) throw new Error(`Invalid decimal amount: ${amount}`);

  const [intPart = "0", fracRaw = ""] = trimmed.split(".");
  const frac = (fracRaw + "0".repeat(decimals)).slice(0, decimals);
  return BigInt(intPart) * 10n ** BigInt(decimals) + BigInt(frac || "0");
}

export function unitsToDecimal(units: bigint, decimals: number): string {
  const sign = units < 0n ? "-" : "";
  const v = units < 0n ? -units : units;
  const scale = 10n ** BigInt(decimals);
  const intPart = v / scale;
  const fracPart = v % scale;
  return `${sign}${intPart.toString()}.${fracPart.toString().padStart(decimals, "0")}`;
}

export function btcToSats(amount: string): bigint {
  return decimalToUnits(amount, BTC_DECIMALS);
}

/** 100137n -> "0.00100137" */
export function satsToBtc(sats: bigint): string {
  return unitsToDecimal(sats, BTC_DECIMALS);
}

/**
 * Base (jitter-free) price in satoshis for a fiat price at `rate` fiat units per BTC.
 * Integer math on cents; the remainder is dropped.
 */
export function fiatToSats(priceFiat: string, rate: number): bigint {
  if (!Number.isFinite(rate) || rate <= 0) throw new Error(`Invalid exchange rate: ${rate}`);
  const rateCents = BigInt(Math.round(rate * 10 ** FIAT_DECIMALS));
  if (rateCents <= 0n) throw new Error(`Exchange rate too small: ${rate}`);
  const priceCents = decimalToUnits(priceFiat, FIAT_DECIMALS);
  return (priceCents * SATS_PER_BTC) / rateCents;
}
