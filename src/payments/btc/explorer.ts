import { fetchJson } from "../../core/http.js";
import { MalformedResponseError } from "../../core/errors.js";
import { logger } from "../../core/logger.js";
import { isRecord } from "../../core/validation.js";

export type ExplorerOutput = {
  address: string;
  valueSats: bigint;
};

export type ExplorerTx = {
  hash: string;
  time: Date; // first-seen time for unconfirmed transactions
  outputs: ExplorerOutput[];
};

export type TransactionExplorer = {
  /** Newest-first page of the address's transactions, mempool included. */
  fetchAddressTransactions(address: string, limit: number): Promise<ExplorerTx[]>;
};

function parseOutputs(raw: unknown, txHash: string): ExplorerOutput[] {
  if (!Array.isArray(raw)) {
    logger.warn(`explorer: tx ${txHash.slice(0, 16)}... has no outputs list`);
    return [];
  }
  const outputs: ExplorerOutput[] = [];
  for (const o of raw) {
    if (!isRecord(o)) continue;
    const addr = o.addr;
    const value = o.value;
    // Non-standard outputs (OP_RETURN etc.) have no address.
    if (typeof addr !== "string" || !addr) continue;
    if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
      logger.warn(`explorer: tx ${txHash.slice(0, 16)}... has an output with bad value`, value);
      continue;
    }
    outputs.push({ address: addr, valueSats: BigInt(value) });
  }
  return outputs;
}

export function parseRawAddrResponse(json: unknown): ExplorerTx[] {
  if (!isRecord(json) || !Array.isArray(json.txs)) {
    throw new MalformedResponseError("blockchain.info: response has no txs list");
  }

  // blockchain.info /rawaddr: { txs: [{ hash, time, out: [{ addr, value }] }] }
  const rawTxs: unknown[] = json.txs;
  const txs: ExplorerTx[] = [];
  for (const [i, raw] of rawTxs.entries()) {
    if (!isRecord(raw)) continue;
    const hash = raw.hash;
    if (typeof hash !== "string" || !hash) {
      logger.warn(`explorer: tx #${i + 1} has no hash`);
      continue;
    }
    const time = typeof raw.time === "number" && Number.isFinite(raw.time) ? raw.time : 0;
    txs.push({ hash, time: new Date(time * 1000), outputs: parseOutputs(raw.out, hash) });
  }
  return txs;
}

export class BlockchainInfoExplorer implements TransactionExplorer {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(args: { baseUrl?: string; apiKey?: string; timeoutMs: number }) {
    this.baseUrl = (args.baseUrl ?? "https://blockchain.info").replace(/\/+$/, "");
    this.apiKey = args.apiKey;
    this.timeoutMs = args.timeoutMs;
  }

  async fetchAddressTransactions(address: string, limit: number): Promise<ExplorerTx[]> {
    const u = new URL(`${this.baseUrl}/rawaddr/${encodeURIComponent(address.trim())}`);
    u.searchParams.set("limit", String(limit));
    if (this.apiKey) u.searchParams.set("api_code", this.apiKey);

    const json = await fetchJson(u.toString(), { service: "blockchain.info", timeoutMs: this.timeoutMs });
    return parseRawAddrResponse(json);
  }
}
