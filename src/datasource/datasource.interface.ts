// DI token for the active data source implementation.
export const DATA_SOURCE = Symbol('DATA_SOURCE');

/**
 * Supplier of raw trading history for a wallet.
 * Paginated lists come back fully materialized and time-ascending.
 * Records are untyped JSON; the timeline normalizer validates them.
 */
export interface DataSource {
  getFills(wallet: string, since?: number): Promise<unknown[]>;
  getFunding(wallet: string, since?: number): Promise<unknown[]>;
  getUserState(wallet: string): Promise<unknown>;
  getAllMids(): Promise<unknown>;
}
