import { randomUUID } from "node:crypto";

/**
 * Generate a cryptographically random identifier (UUIDv4).
 * Used for correlation ids and connection ids.
 */
export const generateId = (): string => randomUUID();
