/**
 * Purchase Client
 *
 * Facade over a StoreService: fetches products for a fixed set of identifiers,
 * submits payments, and relays payment queue updates to a listener.
 * Pricing, receipts and entitlements stay with the store.
 */

import { createLogger } from "../platform";
import type { Logger } from "../platform";
import { PurchaseClientError } from "./errors";
import type {
  ProductsRequest,
  ProductsRequestHandler,
  StoreService,
  TransactionObserver,
} from "./StoreService";
import { isFinishableState } from "./types";
import type { Product, Transaction } from "./types";

/**
 * Caller-supplied receiver of the client's results
 */
export interface PurchaseClientListener {
  /**
   * Products from the catalog that match the client's identifiers, in store order
   */
  onProductsFetched(products: Product[]): void;

  /**
   * A full batch of transactions from the queue, finished or not
   */
  onTransactionsUpdated(transactions: readonly Transaction[]): void;

  /**
   * The products query failed. Without this callback the failure is only logged.
   */
  onProductsRequestFailed?(error: PurchaseClientError): void;
}

export type PurchaseClientOptions = {
  store: StoreService;
  logger?: Logger;
};

export class PurchaseClient implements TransactionObserver, ProductsRequestHandler {
  private readonly listener: PurchaseClientListener;
  private readonly identifiers: ReadonlySet<string>;
  private readonly store: StoreService;
  private readonly productsRequest: ProductsRequest;
  private readonly finishedIds = new Set<string>();
  private readonly log: Logger;

  constructor(
    listener: PurchaseClientListener,
    productIdentifiers: Iterable<string>,
    options: PurchaseClientOptions
  ) {
    this.listener = listener;
    this.identifiers = new Set(productIdentifiers);
    this.store = options.store;
    this.log = options.logger ?? createLogger("PurchaseClient");
    this.productsRequest = this.store.createProductsRequest(this.identifiers);
  }

  /**
   * Whether payments are allowed in the current context
   */
  static isPaymentsAvailable(store: StoreService): boolean {
    return store.canMakePayments();
  }

  /**
   * Ask the platform for its rating prompt. No callback, no guarantee it is shown.
   */
  static requestReview(store: StoreService): void {
    store.requestReview();
  }

  get productIdentifiers(): ReadonlySet<string> {
    return this.identifiers;
  }

  /**
   * Starts the products request
   */
  fetchProducts(): void {
    this.productsRequest.handler = this;
    this.productsRequest.start();
  }

  /**
   * Enqueue a payment. Results arrive through the listener's onTransactionsUpdated.
   *
   * @param quantity - A positive integer
   * @param userToken - Opaque buyer identifier, ideally a hash of the account id
   * @throws PurchaseClientError before reaching the store when an argument is invalid
   */
  submitPayment(product: Product, quantity: number, userToken: string): void {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new PurchaseClientError(
        "INVALID_QUANTITY",
        `Quantity must be a positive integer, got ${quantity}`
      );
    }
    if (userToken.trim() === "") {
      throw new PurchaseClientError("INVALID_USER_TOKEN", "User token must not be empty");
    }

    this.store.addTransactionObserver(this);
    this.store.addPayment({ product, quantity, userToken });
  }

  /**
   * Replay completed transactions from the user's purchase history
   */
  restoreCompletedTransactions(): void {
    this.store.addTransactionObserver(this);
    this.store.restoreCompletedTransactions();
  }

  /**
   * Call this once you are done with the transaction updates of a payment or restore
   */
  stopObserving(): void {
    this.store.removeTransactionObserver(this);
    this.finishedIds.clear();
  }

  onProductsResponse(products: Product[]): void {
    const validProducts = products.filter((product) => this.identifiers.has(product.id));
    this.listener.onProductsFetched(validProducts);
  }

  onProductsRequestFailed(error: Error): void {
    const failure = new PurchaseClientError("PRODUCTS_REQUEST_FAILED", error.message, {
      cause: error,
    });
    if (this.listener.onProductsRequestFailed) {
      this.listener.onProductsRequestFailed(failure);
    } else {
      this.log.error("Products request failed:", error.message);
    }
  }

  onTransactionsUpdated(transactions: readonly Transaction[]): void {
    for (const transaction of transactions) {
      if (!isFinishableState(transaction.state)) continue;
      if (this.finishedIds.has(transaction.id)) continue;

      this.finishedIds.add(transaction.id);
      this.store.finishTransaction(transaction);
    }
    this.listener.onTransactionsUpdated(transactions);
  }

  onRestoreCompleted(transactions: readonly Transaction[]): void {
    this.listener.onTransactionsUpdated(transactions);
  }

  onFinishFailed(transaction: Transaction, error: Error): void {
    this.log.warn("Store could not finish", transaction.id, error.message);
    // Finished again on its next delivery
    this.finishedIds.delete(transaction.id);
  }
}
