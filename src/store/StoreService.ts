/**
 * Store Service
 *
 * The capability a PurchaseClient is given to reach the platform store:
 * capability check, product catalog, payment queue and review prompt.
 * The production implementation is CapacitorStoreService; tests use FakeStoreService.
 */

import type { PaymentRequest, Product, Transaction } from "./types";

/**
 * Receives the outcome of a products query
 */
export interface ProductsRequestHandler {
  onProductsResponse(products: Product[]): void;
  onProductsRequestFailed(error: Error): void;
}

/**
 * A catalog lookup scoped to a fixed set of product identifiers.
 * Built idle; nothing is sent until start() is called.
 */
export interface ProductsRequest {
  handler: ProductsRequestHandler | null;
  start(): void;
}

/**
 * Receives payment queue notifications
 */
export interface TransactionObserver {
  onTransactionsUpdated(transactions: readonly Transaction[]): void;
  onRestoreCompleted(transactions: readonly Transaction[]): void;

  /**
   * The store could not finish a transaction; it stays in the queue
   */
  onFinishFailed(transaction: Transaction, error: Error): void;
}

export interface StoreService {
  /**
   * Whether the current context may make payments (parental controls, region, platform)
   */
  canMakePayments(): boolean;

  createProductsRequest(productIds: ReadonlySet<string>): ProductsRequest;

  /**
   * Register an observer. A new observer is sent the transactions still in the queue;
   * adding one that is already registered is a no-op.
   */
  addTransactionObserver(observer: TransactionObserver): void;

  /**
   * Deregister an observer. Removing one that is not registered is a no-op.
   */
  removeTransactionObserver(observer: TransactionObserver): void;

  addPayment(payment: PaymentRequest): void;

  /**
   * Acknowledge a transaction so the store drops it from the queue
   */
  finishTransaction(transaction: Transaction): void;

  restoreCompletedTransactions(): void;

  /** Transactions currently in the queue */
  readonly transactions: readonly Transaction[];

  /**
   * Ask the platform to show its rating prompt. The platform may throttle it.
   */
  requestReview(): void;
}
