/**
 * Constants for @loglane/settings.
 */

export const PACKAGE_NAME = "@loglane/settings";
export const INTERFACE_TYPES = ["cli", "restapi"] as const;
export const DEFAULT_INTERFACE_TYPE = "cli";
export const DEFAULT_REST_HOST = "127.0.0.1";
export const DEFAULT_REST_PORT = 8000;
/** Relative to the working directory */
export const DEFAULT_LOG_FILE_PATH = "loglane.log";
