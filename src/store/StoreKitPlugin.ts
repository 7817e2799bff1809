/**
 * StoreKit Capacitor Plugin
 *
 * TypeScript interface for the native StoreKit Capacitor plugin.
 * The native side owns the payment queue; this interface mirrors it over the bridge.
 */

import { registerPlugin } from "@capacitor/core";
import type { PluginListenerHandle } from "@capacitor/core";
import type { Product, Transaction } from "./types";

export const STOREKIT_PLUGIN_NAME = "StoreKit";

/**
 * Payload of the queue events
 */
export type TransactionsEvent = {
  transactions: Transaction[];
};

/**
 * StoreKit plugin interface
 */
export interface StoreKitPlugin {
  /**
   * Check whether this device and account may make payments
   */
  canMakePayments(): Promise<{ allowed: boolean }>;

  /**
   * Fetch products from the store catalog
   * @param productIds - Array of product IDs to fetch
   */
  getProducts(options: { productIds: string[] }): Promise<{ products: Product[] }>;

  /**
   * Enqueue a payment. Resolves once the queue has accepted it;
   * the outcome arrives later as a "transactionsUpdated" event.
   */
  addPayment(options: { productId: string; quantity: number; userToken: string }): Promise<void>;

  /**
   * Finish a transaction so the store removes it from the queue
   */
  finishTransaction(options: { transactionId: string }): Promise<void>;

  /**
   * Ask the store to replay completed transactions.
   * Emits "transactionsUpdated" for each restored batch, then "restoreCompleted".
   */
  restoreCompletedTransactions(): Promise<void>;

  /**
   * Get the transactions currently in the queue
   */
  getTransactions(): Promise<{ transactions: Transaction[] }>;

  /**
   * Show the native rating prompt (may be throttled by the OS)
   */
  requestReview(): Promise<void>;

  addListener(
    eventName: "transactionsUpdated",
    listenerFunc: (event: TransactionsEvent) => void
  ): Promise<PluginListenerHandle>;

  addListener(
    eventName: "restoreCompleted",
    listenerFunc: (event: TransactionsEvent) => void
  ): Promise<PluginListenerHandle>;

  removeAllListeners(): Promise<void>;
}

/**
 * StoreKit plugin instance
 *
 * On native: bridges to the platform store implementation
 * On web: returns a stub that always indicates unavailable
 */
export const StoreKit = registerPlugin<StoreKitPlugin>(STOREKIT_PLUGIN_NAME, {
  web: () => import("./StoreKitWeb").then((m) => new m.StoreKitWeb()),
});
