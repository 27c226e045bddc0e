export { EventLogger } from "./logger.js";
export type {
  ContextEvent,
  ContextEventType,
  EventCallback,
  EventLoggerOptions,
} from "./logger.js";
