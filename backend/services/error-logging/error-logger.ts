import { log } from "backend/utils/log";
import { InMemoryErrorLoggingStorage, type ErrorLogQuery, type IErrorLoggingStorage } from "./storage";

export const ERROR_TYPES = [
  "network",
  "timeout",
  "parsing",
  "ai",
  "puppeteer",
  "configuration",
  "storage",
  "unknown",
] as const;

export type ErrorType = (typeof ERROR_TYPES)[number];

export interface ErrorContext {
  /** Component that hit the failure, e.g. an adapter name or "link-registry" */
  component: string;
  operation: string;
  url?: string;
  additionalDetails?: Record<string, unknown>;
}

export interface ErrorLogEntry extends ErrorContext {
  errorType: ErrorType;
  errorMessage: string;
  errorName?: string;
  timestamp: string;
}

export class ErrorLogger {
  constructor(private readonly storage: IErrorLoggingStorage = new InMemoryErrorLoggingStorage()) {}

  /**
   * Log an error to the console and keep it for diagnostics
   */
  logError(errorType: ErrorType, errorMessage: string, context: ErrorContext, error?: Error): ErrorLogEntry {
    const entry: ErrorLogEntry = {
      ...context,
      errorType,
      errorMessage,
      errorName: error?.name,
      timestamp: new Date().toISOString(),
    };
    this.storage.createErrorLog(entry);

    const contextStr = `[${context.component}] [${context.operation}]`;
    log(
      `${contextStr} ${errorType.toUpperCase()}: ${errorMessage}${context.url ? ` (URL: ${context.url})` : ''}`,
      "scraper-error",
      "error",
    );
    return entry;
  }

  logNetworkError(errorMessage: string, context: ErrorContext, error?: Error) {
    return this.logError("network", errorMessage, context, error);
  }

  logParsingError(errorMessage: string, context: ErrorContext, error?: Error) {
    return this.logError("parsing", errorMessage, context, error);
  }

  logAIError(errorMessage: string, context: ErrorContext, error?: Error) {
    return this.logError("ai", errorMessage, context, error);
  }

  logPuppeteerError(errorMessage: string, context: ErrorContext, error?: Error) {
    return this.logError("puppeteer", errorMessage, context, error);
  }

  logStorageError(errorMessage: string, context: ErrorContext, error?: Error) {
    return this.logError("storage", errorMessage, context, error);
  }

  /**
   * Log an unknown value, classifying it by its message
   */
  logCaught(caught: unknown, context: ErrorContext) {
    const error = caught instanceof Error ? caught : new Error(String(caught));
    return this.logError(inferErrorType(error), error.message, context, error);
  }

  /**
   * Newest matching entries, oldest first
   */
  recent(query: ErrorLogQuery = {}): ErrorLogEntry[] {
    return this.storage.getErrorLogs({ limit: 20, ...query });
  }

  stats() {
    return this.storage.getErrorLogStats();
  }
}

/**
 * Infer error type from error instance and message
 */
export function inferErrorType(error: Error): ErrorType {
  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();

  if (name === "configurationerror") {
    return "configuration";
  }

  if (message.includes("timeout") || message.includes("timed out") || name.includes("timeout") || name === "deadlineexceedederror") {
    return "timeout";
  }

  if (
    message.includes("fetch failed") ||
    message.includes("network") ||
    message.includes("econnrefused") ||
    message.includes("enotfound") ||
    message.includes("http ")
  ) {
    return "network";
  }

  if (message.includes("puppeteer") || message.includes("browser") || message.includes("navigation") || name.includes("protocolerror")) {
    return "puppeteer";
  }

  if (message.includes("openai") || message.includes("rate limit") || message.includes("api key")) {
    return "ai";
  }

  if (message.includes("json") || message.includes("parse") || name.includes("syntax") || name === "zoderror") {
    return "parsing";
  }

  return "unknown";
}

export const errorLogger = new ErrorLogger();
