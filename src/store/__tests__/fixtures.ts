import { vi } from "vitest";
import type { Logger } from "../../platform";
import type { Product, Transaction, TransactionState } from "../types";

export function product(id: string, price = 0.99): Product {
  return {
    id,
    displayName: id,
    description: `Test product ${id}`,
    price,
    displayPrice: `$${price.toFixed(2)}`,
    currencyCode: "USD",
  };
}

export function txn(id: string, state: TransactionState, productId = "pro_upgrade"): Transaction {
  return { id, productId, state, quantity: 1 };
}

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
