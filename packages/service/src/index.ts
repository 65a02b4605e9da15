/**
 * @deedshare/service — Operation surface for the deedshare stack.
 *
 * Composes the access and ledger packages behind one service with
 * input validation, result envelopes, structured logging, and an
 * audit log.
 */

export {
  EstateService,
  createServiceFromConfig,
  SYSTEM_ACTOR,
} from "./estate-service.js";
export type {
  EstateServiceConfig,
  RegistrationPolicy,
} from "./estate-service.js";

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger, silentLogger } from "./logger.js";

export { AuditLog, AUDIT_ACTIONS } from "./audit-log.js";
export type {
  AuditAction,
  AuditResourceType,
  AuditLogEntry,
  AuditLogQuery,
  AuditRecord,
} from "./audit-log.js";

export { succeed, fail } from "./result.js";
export type {
  ServiceErrorCode,
  ErrorDetail,
  OperationResult,
  OperationSuccess,
  OperationFailure,
} from "./result.js";

export type { ValidationIssue } from "./dto.js";
