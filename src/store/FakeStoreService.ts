/**
 * Fake Store Service (test double)
 *
 * In-memory implementation of StoreService.
 * Useful for unit tests and UI development without a device store.
 */

import type {
  ProductsRequest,
  ProductsRequestHandler,
  StoreService,
  TransactionObserver,
} from "./StoreService";
import type { PaymentRequest, Product, Transaction } from "./types";

class FakeProductsRequest implements ProductsRequest {
  handler: ProductsRequestHandler | null = null;

  constructor(
    private readonly store: FakeStoreService,
    readonly productIds: ReadonlySet<string>
  ) {}

  /**
   * Answers synchronously with the store's whole catalog, like a store that
   * ignores the requested identifiers
   */
  start(): void {
    this.store.startedRequests += 1;
    const failure = this.store.productsFailure;
    if (failure) {
      this.handler?.onProductsRequestFailed(failure);
      return;
    }
    this.handler?.onProductsResponse([...this.store.catalog]);
  }
}

export class FakeStoreService implements StoreService {
  catalog: Product[] = [];
  productsFailure: Error | null = null;
  finishFailure: Error | null = null;
  paymentsAllowed = true;

  readonly payments: PaymentRequest[] = [];
  readonly finished: Transaction[] = [];
  startedRequests = 0;
  reviewRequests = 0;
  restoreRequests = 0;

  private readonly observers = new Set<TransactionObserver>();
  private queue: Transaction[] = [];

  /**
   * Configure the products every request answers with.
   */
  setCatalog(products: Product[]): void {
    this.catalog = products;
  }

  /**
   * Configure whether products requests should fail.
   */
  setProductsFailure(error: Error | null): void {
    this.productsFailure = error;
  }

  /**
   * Configure whether finishing a transaction should fail.
   */
  setFinishFailure(error: Error | null): void {
    this.finishFailure = error;
  }

  /**
   * Configure the capability check.
   */
  setPaymentsAllowed(allowed: boolean): void {
    this.paymentsAllowed = allowed;
  }

  get observerCount(): number {
    return this.observers.size;
  }

  get transactions(): readonly Transaction[] {
    return this.queue;
  }

  canMakePayments(): boolean {
    return this.paymentsAllowed;
  }

  createProductsRequest(productIds: ReadonlySet<string>): ProductsRequest {
    return new FakeProductsRequest(this, productIds);
  }

  addTransactionObserver(observer: TransactionObserver): void {
    if (this.observers.has(observer)) return;
    this.observers.add(observer);
    if (this.queue.length > 0) {
      observer.onTransactionsUpdated([...this.queue]);
    }
  }

  removeTransactionObserver(observer: TransactionObserver): void {
    this.observers.delete(observer);
  }

  addPayment(payment: PaymentRequest): void {
    this.payments.push(payment);
  }

  finishTransaction(transaction: Transaction): void {
    const failure = this.finishFailure;
    if (failure) {
      for (const observer of [...this.observers]) {
        observer.onFinishFailed(transaction, failure);
      }
      return;
    }
    this.finished.push(transaction);
    this.queue = this.queue.filter((t) => t.id !== transaction.id);
  }

  restoreCompletedTransactions(): void {
    this.restoreRequests += 1;
  }

  requestReview(): void {
    this.reviewRequests += 1;
  }

  /**
   * Simulate the queue delivering a batch of updates.
   */
  deliverTransactions(transactions: Transaction[]): void {
    const byId = new Map(this.queue.map((t) => [t.id, t]));
    for (const transaction of transactions) {
      byId.set(transaction.id, transaction);
    }
    this.queue = [...byId.values()];

    for (const observer of [...this.observers]) {
      observer.onTransactionsUpdated(transactions);
    }
  }

  /**
   * Simulate the end of a restore: observers receive the current queue.
   */
  completeRestore(): void {
    for (const observer of [...this.observers]) {
      observer.onRestoreCompleted(this.queue);
    }
  }
}
