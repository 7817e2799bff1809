/**
 * Store Types
 *
 * Types shared by the purchase client, the StoreKit plugin and the store services.
 */

/**
 * Product information from the store catalog
 */
export type Product = {
  id: string; // Product identifier (SKU), e.g., "pro_upgrade"
  displayName: string;
  description: string;
  price: number;
  displayPrice: string; // Localized price string, e.g., "$4.99"
  currencyCode: string;
};

/**
 * Lifecycle state of a transaction, owned by the store
 *
 * purchasing - being added to the store's queue
 * purchased  - in the queue, the user has been charged
 * failed     - cancelled, or failed before reaching the queue
 * restored   - restored from the user's purchase history
 * deferred   - in the queue, waiting on external action (e.g., Ask to Buy)
 */
export type TransactionState = "purchasing" | "purchased" | "failed" | "restored" | "deferred";

/**
 * Transaction record delivered by the store
 */
export type Transaction = {
  id: string;
  productId: string;
  state: TransactionState;
  quantity: number;
  userToken?: string;
  originalId?: string | null; // Original transaction ID (for restores and renewals)
  purchaseDate?: string | null; // ISO timestamp
  error?: string; // Store's failure message when state is "failed"
};

/**
 * A payment to enqueue with the store
 */
export type PaymentRequest = {
  product: Product;
  quantity: number;
  userToken: string; // Opaque to the client; the store uses it for fraud correlation
};

/**
 * Store availability status
 */
export type StoreStatus = "ready" | "unavailable" | "loading";

const FINISHABLE_STATES: ReadonlySet<TransactionState> = new Set<TransactionState>([
  "purchased",
  "failed",
  "restored",
]);

/**
 * Whether the client should finish a transaction in this state.
 * Purchasing and deferred transactions stay open until a later update.
 */
export function isFinishableState(state: TransactionState): boolean {
  return FINISHABLE_STATES.has(state);
}
