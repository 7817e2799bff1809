/**
 * Capacitor Store Service
 *
 * StoreService backed by the StoreKit Capacitor plugin.
 * The bridge is promise- and event-based; this class keeps a local mirror of the
 * payment queue and the capability check so the StoreService contract stays synchronous.
 */

import type { PluginListenerHandle } from "@capacitor/core";
import { createLogger, getPlatform } from "../platform";
import type { Logger } from "../platform";
import { toError } from "./errors";
import { StoreKit } from "./StoreKitPlugin";
import type { StoreKitPlugin, TransactionsEvent } from "./StoreKitPlugin";
import type {
  ProductsRequest,
  ProductsRequestHandler,
  StoreService,
  TransactionObserver,
} from "./StoreService";
import type { PaymentRequest, Transaction } from "./types";

const REJECTED_PREFIX = "rejected:";

export type CapacitorStoreServiceOptions = {
  logger?: Logger;
};

class PluginProductsRequest implements ProductsRequest {
  handler: ProductsRequestHandler | null = null;

  constructor(
    private readonly plugin: StoreKitPlugin,
    private readonly productIds: ReadonlySet<string>,
    private readonly log: Logger
  ) {}

  start(): void {
    const productIds = [...this.productIds];
    this.log.debug("Requesting products:", productIds);

    void this.plugin.getProducts({ productIds }).then(
      ({ products }) => {
        this.log.debug("Received", products.length, "products");
        this.handler?.onProductsResponse(products);
      },
      (err: unknown) => {
        this.log.warn("Products request failed:", err);
        this.handler?.onProductsRequestFailed(toError(err));
      }
    );
  }
}

/**
 * Queue order is kept; entries of `updates` replace those with the same id
 */
function mergeById(queue: Transaction[], updates: Transaction[]): Transaction[] {
  const byId = new Map(queue.map((t) => [t.id, t]));
  for (const transaction of updates) {
    byId.set(transaction.id, transaction);
  }
  return [...byId.values()];
}

export class CapacitorStoreService implements StoreService {
  private readonly observers = new Set<TransactionObserver>();
  private listenerHandles: PluginListenerHandle[] = [];
  private queue: Transaction[] = [];
  private paymentsAllowed = false;
  private rejectedCount = 0;

  private constructor(
    private readonly plugin: StoreKitPlugin,
    private readonly log: Logger
  ) {}

  /**
   * Subscribe to queue events, then snapshot the capability check and the pending queue
   */
  static async connect(
    plugin: StoreKitPlugin = StoreKit,
    options: CapacitorStoreServiceOptions = {}
  ): Promise<CapacitorStoreService> {
    const log = options.logger ?? createLogger("StoreKit");
    const service = new CapacitorStoreService(plugin, log);
    const handles: PluginListenerHandle[] = [];

    try {
      // Listeners go first so events sent while the snapshot is in flight are kept
      handles.push(
        await plugin.addListener("transactionsUpdated", (event: TransactionsEvent) =>
          service.handleTransactionsUpdated(event.transactions)
        )
      );
      handles.push(
        await plugin.addListener("restoreCompleted", (event: TransactionsEvent) =>
          service.handleRestoreCompleted(event.transactions)
        )
      );

      const [{ allowed }, { transactions }] = await Promise.all([
        plugin.canMakePayments(),
        plugin.getTransactions(),
      ]);
      service.paymentsAllowed = allowed;
      service.queue = mergeById(transactions, service.queue);
    } catch (err) {
      await Promise.allSettled(handles.map((handle) => handle.remove()));
      throw err;
    }
    service.listenerHandles = handles;

    log.info(
      "Connected on",
      getPlatform(),
      `(payments ${service.paymentsAllowed ? "allowed" : "not allowed"}, ${service.queue.length} pending)`
    );
    return service;
  }

  get transactions(): readonly Transaction[] {
    return this.queue;
  }

  canMakePayments(): boolean {
    return this.paymentsAllowed;
  }

  createProductsRequest(productIds: ReadonlySet<string>): ProductsRequest {
    return new PluginProductsRequest(this.plugin, productIds, this.log);
  }

  addTransactionObserver(observer: TransactionObserver): void {
    if (this.observers.has(observer)) return;
    this.observers.add(observer);

    // A new observer receives whatever is still pending, like the native queue does
    if (this.queue.length > 0) {
      observer.onTransactionsUpdated([...this.queue]);
    }
  }

  removeTransactionObserver(observer: TransactionObserver): void {
    this.observers.delete(observer);
  }

  addPayment(payment: PaymentRequest): void {
    const { product, quantity, userToken } = payment;
    this.log.info("Adding payment for", product.id, "x", quantity);

    this.plugin.addPayment({ productId: product.id, quantity, userToken }).catch((err: unknown) => {
      this.log.error("Payment was rejected by the bridge:", err);
      this.rejectedCount += 1;
      const failed: Transaction = {
        id: `${REJECTED_PREFIX}${product.id}:${this.rejectedCount}`,
        productId: product.id,
        state: "failed",
        quantity,
        userToken,
        error: toError(err).message,
      };
      this.handleTransactionsUpdated([failed]);
    });
  }

  finishTransaction(transaction: Transaction): void {
    this.queue = this.queue.filter((t) => t.id !== transaction.id);

    // Synthesized locally, the native queue never saw it
    if (transaction.id.startsWith(REJECTED_PREFIX)) return;

    this.plugin.finishTransaction({ transactionId: transaction.id }).catch((err: unknown) => {
      this.log.error("Failed to finish transaction", transaction.id, err);
      if (!this.queue.some((t) => t.id === transaction.id)) {
        this.queue = [...this.queue, transaction];
      }
      const error = toError(err);
      for (const observer of [...this.observers]) {
        observer.onFinishFailed(transaction, error);
      }
    });
  }

  restoreCompletedTransactions(): void {
    this.log.info("Restoring completed transactions...");
    this.plugin.restoreCompletedTransactions().catch((err: unknown) => {
      this.log.error("Restore request failed:", err);
    });
  }

  requestReview(): void {
    this.plugin.requestReview().catch((err: unknown) => {
      this.log.warn("Review prompt request failed:", err);
    });
  }

  /**
   * Remove the plugin listeners and forget every observer
   */
  async disconnect(): Promise<void> {
    const handles = this.listenerHandles;
    this.listenerHandles = [];
    this.observers.clear();
    await Promise.all(handles.map((handle) => handle.remove()));
    this.log.info("Disconnected");
  }

  private handleTransactionsUpdated(transactions: Transaction[]): void {
    this.queue = mergeById(this.queue, transactions);

    for (const observer of [...this.observers]) {
      observer.onTransactionsUpdated(transactions);
    }
  }

  private handleRestoreCompleted(transactions: Transaction[]): void {
    this.queue = transactions;
    for (const observer of [...this.observers]) {
      observer.onRestoreCompleted(this.queue);
    }
  }
}

/**
 * Connect to the registered StoreKit plugin
 */
export function connectStoreService(
  options: CapacitorStoreServiceOptions = {}
): Promise<CapacitorStoreService> {
  return CapacitorStoreService.connect(StoreKit, options);
}
