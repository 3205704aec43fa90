// Legacy (1...), P2SH (3...) and bech32/bech32m (bc1... / tb1... on testnet).
const BASE58_ADDRESS = /^[13mn2][a-km-zA-HJ-NP-Z1-9]{25,34}$/;
const BECH32_ADDRESS = /^(bc1|tb1|bcrt1)[02-9ac-hj-np-z]{8,87}$/;

export function isBtcAddress(addr: string): boolean {
  const a = addr.trim();
  return BASE58_ADDRESS.test(a) || BECH32_ADDRESS.test(a.toLowerCase());
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function toFiniteNumber(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v.replace(/,/g, ""));
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}
