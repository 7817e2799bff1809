import { cleanup } from "@testing-library/react";
import { afterEach } from "vitest";

// Unmount hooks rendered by the previous test
afterEach(() => {
  cleanup();
});
