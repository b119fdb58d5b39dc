/**
 * @module logging/logger
 * @description Namespaced loggers built on `debug`.
 *
 * Every scope logs under `<root>:<scope>`, with warnings and errors on the
 * `:warn` and `:error` sub-namespaces so they can be enabled on their own:
 *
 * ```sh
 * DEBUG=radio-link:* node app.js              # everything
 * DEBUG=radio-link:*:warn,radio-link:*:error  # problems only
 * ```
 */

import createDebug from "debug";

export const DEFAULT_LOG_NAMESPACE = "radio-link";

export interface Logger {
  readonly namespace: string;
  debug(formatter: string, ...args: unknown[]): void;
  warn(formatter: string, ...args: unknown[]): void;
  error(formatter: string, ...args: unknown[]): void;
  /** A logger for a nested scope, e.g. `radio-link:link:discoverer`. */
  child(scope: string): Logger;
}

export function createLogger(
  scope: string,
  root: string = DEFAULT_LOG_NAMESPACE
): Logger {
  const namespace = `${root}:${scope}`;
  const base = createDebug(namespace);
  const warn = base.extend("warn");
  const error = base.extend("error");

  return {
    namespace,
    debug: (formatter, ...args) => base(formatter, ...args),
    warn: (formatter, ...args) => warn(formatter, ...args),
    error: (formatter, ...args) => error(formatter, ...args),
    child: (child) => createLogger(`${scope}:${child}`, root),
  };
}
