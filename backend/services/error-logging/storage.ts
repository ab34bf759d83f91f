import type { ErrorLogEntry, ErrorType } from "./error-logger";

export interface ErrorLogQuery {
  errorType?: ErrorType;
  component?: string;
  /** Newest entries to return */
  limit?: number;
}

export interface IErrorLoggingStorage {
  createErrorLog(entry: ErrorLogEntry): void;
  getErrorLogs(options?: ErrorLogQuery): ErrorLogEntry[];
  getErrorLogStats(): { totalErrors: number; errorsByType: Partial<Record<ErrorType, number>> };
}

/**
 * Keeps the most recent error entries in memory, newest last.
 */
export class InMemoryErrorLoggingStorage implements IErrorLoggingStorage {
  private entries: ErrorLogEntry[] = [];

  constructor(private readonly capacity = 100) {}

  createErrorLog(entry: ErrorLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  getErrorLogs(options: ErrorLogQuery = {}): ErrorLogEntry[] {
    const filtered = this.entries.filter(
      (entry) =>
        (options.errorType === undefined || entry.errorType === options.errorType) &&
        (options.component === undefined || entry.component === options.component),
    );
    return options.limit === undefined ? filtered : filtered.slice(-options.limit);
  }

  getErrorLogStats() {
    const errorsByType: Partial<Record<ErrorType, number>> = {};
    for (const entry of this.entries) {
      errorsByType[entry.errorType] = (errorsByType[entry.errorType] ?? 0) + 1;
    }
    return { totalErrors: this.entries.length, errorsByType };
  }
}
