/**
 * @starkexit/node: HTTP service for proof-gated disbursement.
 *
 * @packageDocumentation
 */

export { DisbursementService } from "./services/disbursement-service.js";
export type {
  DisbursementServiceOptions,
  RequestContext,
  EventPage,
} from "./services/disbursement-service.js";
export {
  loadConfig,
  parseApiKeys,
  parseAllowedCallers,
  parseCustody,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedApiKey, CustodyEntry } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
