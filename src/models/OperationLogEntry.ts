import { z } from 'zod';

export interface OperationLogEntry {
  /** What was done (move, copy, encrypt, ...) */
  operation: string;

  /** Paths and values involved */
  details: Record<string, string>;

  /** ISO-8601 time the entry was written */
  timestamp?: string;
}

export const operationLogEntrySchema = z.object({
  operation: z.string(),
  details: z.record(z.string()),
  timestamp: z.string().optional(),
});

export function createOperationLogEntry(
  operation: string,
  details: Record<string, string>
): OperationLogEntry {
  return {
    operation,
    details,
    timestamp: new Date().toISOString(),
  };
}
