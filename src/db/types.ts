// Typed aliases for frequently-used identifiers to make intent explicit.
export type PlayerId = string;
export type ItemInstanceId = string;
export type ItemKind = string;
export type RecipeName = string;
export type AuditEntryId = string;
