/**
 * Identifiers for parse passes, using Node.js crypto.
 */

import { randomUUID } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}
