export * from "./store";
export { isNative, getPlatform, isPluginAvailable, createLogger } from "./platform";
export type { PlatformName, Logger, LoggerOptions } from "./platform";
