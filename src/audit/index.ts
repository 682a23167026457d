export { AlertBus, AlertKind, type AlertSeverity, type CoreAlert, type CoreEvents } from "./alerts.js";
export { AUDIT_OPERATIONS, AuditLog, auditRecordSchema, type AuditInput, type AuditOperation, type AuditRecord } from "./audit-log.js";
