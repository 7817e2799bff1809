/**
 * StoreKit Web Fallback
 *
 * Provides a graceful fallback for non-native platforms.
 * The payment queue only exists on device, so this stub reports it as unavailable.
 */

import { WebPlugin } from "@capacitor/core";
import type { StoreKitPlugin, TransactionsEvent } from "./StoreKitPlugin";
import type { Product, Transaction } from "./types";

export class StoreKitWeb extends WebPlugin implements StoreKitPlugin {
  async canMakePayments(): Promise<{ allowed: boolean }> {
    return { allowed: false };
  }

  async getProducts(_options: { productIds: string[] }): Promise<{ products: Product[] }> {
    console.log("[StoreKit] getProducts called on web - not available");
    return { products: [] };
  }

  async addPayment(_options: {
    productId: string;
    quantity: number;
    userToken: string;
  }): Promise<void> {
    throw this.unavailable("In-app purchases are only available in the native app");
  }

  async finishTransaction(_options: { transactionId: string }): Promise<void> {
    // No-op on web
  }

  async restoreCompletedTransactions(): Promise<void> {
    // Nothing to restore, but observers still expect the completion event
    const event: TransactionsEvent = { transactions: [] };
    this.notifyListeners("restoreCompleted", event);
  }

  async getTransactions(): Promise<{ transactions: Transaction[] }> {
    return { transactions: [] };
  }

  async requestReview(): Promise<void> {
    console.log("[StoreKit] requestReview called on web - no-op");
  }
}
