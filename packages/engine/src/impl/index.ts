/**
 * Implementation exports
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { createConsoleLogger, childLogger, type ConsoleLoggerOptions } from "./ConsoleLogger.js";
