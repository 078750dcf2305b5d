import type { JsonObject } from '#types';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** formats log messages */
export type Log = (level: LogLevel, message: string, meta?: JsonObject) => void;

/** log sink used when the operator supplies none */
export const silentLog: Log = () => undefined;

/**
 * reduces any caught value to loggable metadata
 * @param error any value that was thrown/caught
 * @returns json-safe description of the error
 */
export function describeError(error: unknown): JsonObject {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.cause instanceof Error && {
        cause: { name: error.cause.name, message: error.cause.message },
      }),
    };
  }

  return { name: typeof error, message: String(error) };
}
