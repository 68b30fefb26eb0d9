/**
 * Shared test helpers
 */

import { createLogger, type LogEntry } from '../src/utils/logger.js';
import type { ChildLogger } from '../src/utils/logger.js';
import type { MemoryCodebase, MemoryDeclaration } from '../src/sources/memory-codebase.js';

/**
 * Look up a member, failing the test when it does not exist
 */
export function member(codebase: MemoryCodebase, typeName: string, memberName: string): MemoryDeclaration {
  const found = codebase.getType(typeName)?.getMember(memberName);
  if (!found) {
    throw new Error(`No member ${typeName}.${memberName} in fixture`);
  }
  return found;
}

/**
 * Logger that records entries instead of printing them
 */
export function captureLogger(level: 'debug' | 'info' | 'warn' | 'error' = 'debug'): {
  logger: ChildLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}
