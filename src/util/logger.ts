import pino, { type Logger, type LoggerOptions, type TransportSingleOptions } from "pino";
import { getStage, getString, isLocal, isProduction, isTest } from "./env";

/**
 * Structured logging for the ledger.
 * - CLI and local runs: pretty-printed through pino-pretty
 * - Lambda: JSON lines with stage and request bindings
 * - Jest: silent unless LOG_LEVEL asks otherwise
 */

const SERVICE = "india-forecast-ledger";

/** LOG_LEVEL if it names a pino level, else a stage default. */
export function resolveLogLevel(): string {
  const requested = getString("LOG_LEVEL")?.toLowerCase();
  if (requested && (requested === "silent" || requested in pino.levels.values)) {
    return requested;
  }
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

function prettyTransport(): TransportSingleOptions | undefined {
  if (!isLocal() || isProduction() || isTest()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname,service",
      messageKey: "message",
    },
  };
}

const options: LoggerOptions = {
  level: resolveLogLevel(),
  base: { service: SERVICE, stage: getStage() },
  redact: {
    paths: ["*.apiKey", "*.token", "*.secret", "headers.authorization", "headers.Authorization"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: prettyTransport(),
};

const rootLogger: Logger = pino(options);

/** Child logger bound to a module path such as "sources/world_bank". */
export function getLogger(moduleName?: string): Logger {
  return moduleName ? rootLogger.child({ module: moduleName }) : rootLogger;
}

export interface RequestContext {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
}

/**
 * Handler logger carrying the Lambda request id and function identity.
 */
export function withRequestContext(moduleName: string, context: RequestContext): Logger {
  return getLogger(moduleName).child({
    requestId: context.awsRequestId,
    functionName: context.functionName,
    functionVersion: context.functionVersion,
  });
}

export type { Logger };
