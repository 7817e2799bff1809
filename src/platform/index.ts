/**
 * Platform Detection
 *
 * Utilities to detect if running in Capacitor (native iOS/Android) or a web runtime.
 */

import { Capacitor } from "@capacitor/core";

export { createLogger } from "./logger";
export type { Logger, LoggerOptions } from "./logger";

export type PlatformName = "ios" | "android" | "web";

/**
 * Check if running inside a Capacitor native app
 */
export function isNative(): boolean {
  return Capacitor.isNativePlatform();
}

/**
 * Get current platform name
 */
export function getPlatform(): PlatformName {
  const platform = Capacitor.getPlatform();
  if (platform === "ios" || platform === "android") return platform;
  return "web";
}

/**
 * Check if a specific plugin is available
 */
export function isPluginAvailable(pluginName: string): boolean {
  return Capacitor.isPluginAvailable(pluginName);
}
