import { beforeEach, describe, expect, it, vi } from "vitest";
import { isPurchaseClientError } from "../errors";
import { FakeStoreService } from "../FakeStoreService";
import { PurchaseClient } from "../PurchaseClient";
import type { PurchaseClientListener } from "../PurchaseClient";
import { product, silentLogger, txn } from "./fixtures";

function createListener() {
  return {
    onProductsFetched: vi.fn(),
    onTransactionsUpdated: vi.fn(),
  } satisfies PurchaseClientListener;
}

function thrownBy(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("PurchaseClient", () => {
  let store: FakeStoreService;
  let listener: ReturnType<typeof createListener>;

  beforeEach(() => {
    store = new FakeStoreService();
    listener = createListener();
  });

  describe("fetchProducts", () => {
    it("delivers only the products that were asked for", () => {
      store.setCatalog([product("pro_upgrade"), product("coins_100")]);
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      client.fetchProducts();

      expect(listener.onProductsFetched).toHaveBeenCalledTimes(1);
      expect(listener.onProductsFetched).toHaveBeenCalledWith([product("pro_upgrade")]);
    });

    it("keeps the store's ordering", () => {
      store.setCatalog([product("c"), product("b"), product("a")]);
      const client = new PurchaseClient(listener, ["a", "c"], { store });

      client.fetchProducts();

      expect(listener.onProductsFetched).toHaveBeenCalledWith([product("c"), product("a")]);
    });

    it("delivers an empty list when nothing matches", () => {
      store.setCatalog([product("coins_100")]);
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      client.fetchProducts();

      expect(listener.onProductsFetched).toHaveBeenCalledWith([]);
    });

    it("does not start the request until asked", () => {
      new PurchaseClient(listener, ["pro_upgrade"], { store });

      expect(store.startedRequests).toBe(0);
    });

    it("collapses duplicate identifiers", () => {
      const client = new PurchaseClient(listener, ["a", "a", "b"], { store });

      expect([...client.productIdentifiers]).toEqual(["a", "b"]);
    });

    it("reports a failed request to the listener", () => {
      const cause = new Error("offline");
      store.setProductsFailure(cause);
      const onProductsRequestFailed = vi.fn();
      const client = new PurchaseClient({ ...listener, onProductsRequestFailed }, ["a"], { store });

      client.fetchProducts();

      expect(onProductsRequestFailed).toHaveBeenCalledTimes(1);
      const error: unknown = onProductsRequestFailed.mock.calls[0][0];
      if (!isPurchaseClientError(error)) throw new Error("expected a PurchaseClientError");
      expect(error.code).toBe("PRODUCTS_REQUEST_FAILED");
      expect(error.message).toBe("offline");
      expect(error.cause).toBe(cause);
      expect(listener.onProductsFetched).not.toHaveBeenCalled();
    });

    it("logs a failed request when the listener has no failure callback", () => {
      store.setProductsFailure(new Error("offline"));
      const logger = silentLogger();
      const client = new PurchaseClient(listener, ["a"], { store, logger });

      client.fetchProducts();

      expect(logger.error).toHaveBeenCalledWith("Products request failed:", "offline");
      expect(listener.onProductsFetched).not.toHaveBeenCalled();
    });
  });

  describe("submitPayment", () => {
    it("registers as observer and enqueues the payment", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      client.submitPayment(product("pro_upgrade"), 2, "hashed-user");

      expect(store.observerCount).toBe(1);
      expect(store.payments).toEqual([
        { product: product("pro_upgrade"), quantity: 2, userToken: "hashed-user" },
      ]);
    });

    it("registers only once across payments", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      client.submitPayment(product("pro_upgrade"), 1, "u1");
      client.submitPayment(product("pro_upgrade"), 1, "u1");

      expect(store.observerCount).toBe(1);
      expect(store.payments).toHaveLength(2);
    });

    it("rejects a zero quantity before reaching the store", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      expect(thrownBy(() => client.submitPayment(product("pro_upgrade"), 0, "u1"))).toMatchObject({
        code: "INVALID_QUANTITY",
      });
      expect(store.payments).toEqual([]);
      expect(store.observerCount).toBe(0);
    });

    it("rejects a fractional quantity", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      expect(() => client.submitPayment(product("pro_upgrade"), 1.5, "u1")).toThrow(
        "Quantity must be a positive integer, got 1.5"
      );
      expect(store.payments).toEqual([]);
    });

    it("rejects a blank user token", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      expect(thrownBy(() => client.submitPayment(product("pro_upgrade"), 1, "  "))).toMatchObject({
        code: "INVALID_USER_TOKEN",
      });
      expect(store.payments).toEqual([]);
    });
  });

  describe("transaction updates", () => {
    it("finishes only resolved transactions and forwards the whole batch", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });
      client.submitPayment(product("pro_upgrade"), 1, "u1");
      const batch = [txn("A", "purchasing"), txn("B", "purchased")];

      store.deliverTransactions(batch);

      expect(store.finished).toEqual([txn("B", "purchased")]);
      expect(listener.onTransactionsUpdated).toHaveBeenCalledWith(batch);
    });

    it("finishes purchased, failed and restored but leaves purchasing and deferred open", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });
      client.submitPayment(product("pro_upgrade"), 1, "u1");

      store.deliverTransactions([
        txn("1", "purchasing"),
        txn("2", "purchased"),
        txn("3", "failed"),
        txn("4", "restored"),
        txn("5", "deferred"),
      ]);

      expect(store.finished.map((t) => t.id)).toEqual(["2", "3", "4"]);
      expect(store.transactions.map((t) => t.id)).toEqual(["1", "5"]);
    });

    it("finishes a deferred transaction once it resolves", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });
      client.submitPayment(product("pro_upgrade"), 1, "u1");

      store.deliverTransactions([txn("A", "deferred")]);
      expect(store.finished).toEqual([]);

      store.deliverTransactions([txn("A", "purchased")]);
      expect(store.finished).toEqual([txn("A", "purchased")]);
    });

    it("does not finish a redelivered transaction twice", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });
      client.submitPayment(product("pro_upgrade"), 1, "u1");

      store.deliverTransactions([txn("B", "purchased")]);
      store.deliverTransactions([txn("B", "purchased")]);

      expect(store.finished).toHaveLength(1);
      expect(listener.onTransactionsUpdated).toHaveBeenCalledTimes(2);
    });

    it("picks up transactions already waiting in the queue when it registers", () => {
      store.deliverTransactions([txn("OLD", "purchased"), txn("P", "purchasing")]);
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      client.submitPayment(product("pro_upgrade"), 1, "u1");

      expect(store.finished).toEqual([txn("OLD", "purchased")]);
      expect(listener.onTransactionsUpdated).toHaveBeenCalledWith([
        txn("OLD", "purchased"),
        txn("P", "purchasing"),
      ]);
    });

    it("finishes a transaction again after the store failed to finish it", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });
      client.submitPayment(product("pro_upgrade"), 1, "u1");
      store.setFinishFailure(new Error("queue busy"));

      store.deliverTransactions([txn("B", "purchased")]);
      expect(store.finished).toEqual([]);

      store.setFinishFailure(null);
      store.deliverTransactions([txn("B", "purchased")]);

      expect(store.finished).toEqual([txn("B", "purchased")]);
    });

    it("forwards the store's queue when a restore completes", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });
      client.restoreCompletedTransactions();
      store.deliverTransactions([txn("A", "purchasing")]);

      store.completeRestore();

      expect(store.restoreRequests).toBe(1);
      expect(listener.onTransactionsUpdated).toHaveBeenLastCalledWith([txn("A", "purchasing")]);
      expect(store.finished).toEqual([]);
    });
  });

  describe("stopObserving", () => {
    it("deregisters after a payment", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });
      client.submitPayment(product("pro_upgrade"), 1, "u1");

      client.stopObserving();
      store.deliverTransactions([txn("B", "purchased")]);

      expect(store.observerCount).toBe(0);
      expect(listener.onTransactionsUpdated).not.toHaveBeenCalled();
    });

    it("is a no-op without a prior registration", () => {
      const client = new PurchaseClient(listener, ["pro_upgrade"], { store });

      expect(() => {
        client.stopObserving();
        client.stopObserving();
      }).not.toThrow();
      expect(store.observerCount).toBe(0);
    });
  });

  describe("static helpers", () => {
    it("reports payment availability from the store", () => {
      expect(PurchaseClient.isPaymentsAvailable(store)).toBe(true);

      store.setPaymentsAllowed(false);

      expect(PurchaseClient.isPaymentsAvailable(store)).toBe(false);
    });

    it("asks the store for a review prompt", () => {
      expect(() => PurchaseClient.requestReview(store)).not.toThrow();
      expect(store.reviewRequests).toBe(1);
    });
  });
});
