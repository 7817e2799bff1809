/**
 * usePurchaseClient Hook
 *
 * Owns a PurchaseClient for the lifetime of a component and exposes
 * its products and transaction updates as React state.
 */

import { useState, useCallback, useEffect, useRef } from "react";
import { createLogger, isNative, isPluginAvailable } from "../platform";
import { connectStoreService } from "./CapacitorStoreService";
import type { CapacitorStoreService } from "./CapacitorStoreService";
import { isPurchaseClientError } from "./errors";
import { PurchaseClient } from "./PurchaseClient";
import { STOREKIT_PLUGIN_NAME } from "./StoreKitPlugin";
import type { StoreService } from "./StoreService";
import type { Product, StoreStatus, Transaction } from "./types";

const log = createLogger("Store");

export type UsePurchaseClientOptions = {
  /** Store to use instead of connecting the native StoreKit plugin */
  store?: StoreService;
};

type UsePurchaseClientReturn = {
  /** Current status of the store */
  status: StoreStatus;
  /** Whether the store allows payments in this context */
  isAvailable: boolean;
  /** Products loaded from the store, limited to the requested identifiers */
  products: Product[];
  /** Latest batch of transactions delivered by the store */
  transactions: readonly Transaction[];
  /** Error message if any */
  error: string | null;

  /** Re-run the products request */
  fetchProducts: () => void;

  /**
   * Enqueue a payment for a loaded product
   * @returns false when the product is unknown or the arguments are rejected
   */
  submitPayment: (productId: string, userToken: string, quantity?: number) => boolean;

  /**
   * Replay completed transactions; results arrive in `transactions`
   * @returns false when the store is not ready
   */
  restorePurchases: () => boolean;

  /** Stop receiving transaction updates until the next payment or restore */
  stopObserving: () => void;

  /** Show the platform rating prompt */
  requestReview: () => void;
};

function disconnectQuietly(service: CapacitorStoreService): void {
  service.disconnect().catch((err: unknown) => {
    log.warn("Failed to disconnect:", err);
  });
}

function parseProductKey(key: string): string[] {
  const parsed: unknown = JSON.parse(key);
  return Array.isArray(parsed) ? parsed.filter((id): id is string => typeof id === "string") : [];
}

export function usePurchaseClient(
  productIds: readonly string[],
  options: UsePurchaseClientOptions = {}
): UsePurchaseClientReturn {
  const injectedStore = options.store ?? null;
  const [connectedStore, setConnectedStore] = useState<StoreService | null>(null);
  const store = injectedStore ?? connectedStore;

  const [status, setStatus] = useState<StoreStatus>("loading");
  const [products, setProducts] = useState<Product[]>([]);
  const [transactions, setTransactions] = useState<readonly Transaction[]>([]);
  const [error, setError] = useState<string | null>(null);
  const clientRef = useRef<PurchaseClient | null>(null);

  // A fresh array each render must not rebuild the client
  const productKey = JSON.stringify([...new Set(productIds)].sort());

  // Connect the native store when none is injected
  useEffect(() => {
    if (injectedStore) return;

    if (!isNative() || !isPluginAvailable(STOREKIT_PLUGIN_NAME)) {
      setStatus("unavailable");
      return;
    }

    let cancelled = false;
    let service: CapacitorStoreService | null = null;

    connectStoreService().then(
      (connected) => {
        if (cancelled) {
          disconnectQuietly(connected);
          return;
        }
        service = connected;
        setConnectedStore(connected);
      },
      (err: unknown) => {
        log.error("Failed to connect:", err);
        if (cancelled) return;
        setStatus("unavailable");
        setError(err instanceof Error ? err.message : "Failed to connect to the store");
      }
    );

    return () => {
      cancelled = true;
      if (service) disconnectQuietly(service);
    };
  }, [injectedStore]);

  useEffect(() => {
    if (!store) return;

    if (!PurchaseClient.isPaymentsAvailable(store)) {
      setStatus("unavailable");
      return;
    }

    const client = new PurchaseClient(
      {
        onProductsFetched: (fetched) => {
          log.info("Loaded", fetched.length, "products");
          setProducts(fetched);
          setStatus("ready");
        },
        onTransactionsUpdated: (updated) => {
          setTransactions(updated);
        },
        onProductsRequestFailed: (err) => {
          log.error("Failed to load products:", err.message);
          setStatus("unavailable");
          setError(err.message);
        },
      },
      parseProductKey(productKey),
      { store }
    );
    clientRef.current = client;

    setStatus("loading");
    setError(null);
    client.fetchProducts();

    return () => {
      client.stopObserving();
      if (clientRef.current === client) clientRef.current = null;
    };
  }, [store, productKey]);

  const fetchProducts = useCallback(() => {
    clientRef.current?.fetchProducts();
  }, []);

  const submitPayment = useCallback(
    (productId: string, userToken: string, quantity = 1): boolean => {
      const client = clientRef.current;
      if (!client) {
        setError("The store is not ready");
        return false;
      }

      const product = products.find((p) => p.id === productId);
      if (!product) {
        setError(`Unknown product: ${productId}`);
        return false;
      }

      setError(null);
      try {
        log.info("Starting purchase for:", productId);
        client.submitPayment(product, quantity, userToken);
        return true;
      } catch (err) {
        if (isPurchaseClientError(err)) {
          setError(err.message);
          return false;
        }
        throw err;
      }
    },
    [products]
  );

  const restorePurchases = useCallback((): boolean => {
    const client = clientRef.current;
    if (!client) {
      setError("The store is not ready");
      return false;
    }
    setError(null);
    client.restoreCompletedTransactions();
    return true;
  }, []);

  const stopObserving = useCallback(() => {
    clientRef.current?.stopObserving();
  }, []);

  const requestReview = useCallback(() => {
    if (store) PurchaseClient.requestReview(store);
  }, [store]);

  return {
    status,
    isAvailable: store !== null && PurchaseClient.isPaymentsAvailable(store),
    products,
    transactions,
    error,
    fetchProducts,
    submitPayment,
    restorePurchases,
    stopObserving,
    requestReview,
  };
}
