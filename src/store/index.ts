/**
 * Store Module
 *
 * In-app purchase client and the store services it runs on.
 */

export { PurchaseClient } from "./PurchaseClient";
export type { PurchaseClientListener, PurchaseClientOptions } from "./PurchaseClient";
export { usePurchaseClient } from "./usePurchaseClient";
export type { UsePurchaseClientOptions } from "./usePurchaseClient";
export { CapacitorStoreService, connectStoreService } from "./CapacitorStoreService";
export type { CapacitorStoreServiceOptions } from "./CapacitorStoreService";
export { FakeStoreService } from "./FakeStoreService";
export { StoreKit, STOREKIT_PLUGIN_NAME } from "./StoreKitPlugin";
export type { StoreKitPlugin, TransactionsEvent } from "./StoreKitPlugin";
export { PurchaseClientError, isPurchaseClientError, toError } from "./errors";
export type { PurchaseClientErrorCode } from "./errors";
export type {
  ProductsRequest,
  ProductsRequestHandler,
  StoreService,
  TransactionObserver,
} from "./StoreService";
export { isFinishableState } from "./types";
export type {
  Product,
  Transaction,
  TransactionState,
  PaymentRequest,
  StoreStatus,
} from "./types";
