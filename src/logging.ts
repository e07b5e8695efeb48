import { Cause, Layer, LogLevel, Logger as EffectLogger } from "effect";
import type { Logger } from "./types";

export type LogLevelName = "debug" | "info" | "warning" | "error" | "none";

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ["debug", "info", "warning", "error", "none"];

export function toLogLevel(name: LogLevelName): LogLevel.LogLevel {
  switch (name) {
    case "debug":
      return LogLevel.Debug;
    case "info":
      return LogLevel.Info;
    case "warning":
      return LogLevel.Warning;
    case "error":
      return LogLevel.Error;
    case "none":
      return LogLevel.None;
  }
}

function formatMessage(message: unknown): string {
  if (Array.isArray(message)) {
    return message.map(formatMessage).join(" ");
  }
  return typeof message === "string" ? message : String(message);
}

/**
 * Routes Effect log records to an application logger. Annotations such as
 * `pool` or `conversationId` arrive as `meta`.
 */
export function fromLogger(logger: Logger): EffectLogger.Logger<unknown, void> {
  return EffectLogger.make(({ logLevel, message, annotations, cause }) => {
    const meta: Record<string, unknown> = Object.fromEntries(annotations);
    if (!Cause.isEmpty(cause)) {
      meta.cause = Cause.pretty(cause);
    }
    const text = formatMessage(message);

    if (logLevel.ordinal >= LogLevel.Error.ordinal) {
      logger.error(text, meta);
    } else if (logLevel.ordinal >= LogLevel.Warning.ordinal) {
      logger.warn(text, meta);
    } else if (logLevel.ordinal >= LogLevel.Info.ordinal) {
      logger.info(text, meta);
    } else {
      logger.debug?.(text, meta);
    }
  });
}

export function loggerLayer(logger?: Logger, level: LogLevelName = "info"): Layer.Layer<never> {
  const minimum = EffectLogger.minimumLogLevel(toLogLevel(level));
  if (!logger) {
    return minimum;
  }
  return Layer.merge(EffectLogger.replace(EffectLogger.defaultLogger, fromLogger(logger)), minimum);
}
