/**
 * Constants for @loglane/app.
 */

export const PACKAGE_NAME = "@loglane/app";
export const APP_NAME = "loglane";

export const WELCOME_MESSAGE = "Welcome to Loglane!";
export const WELCOME_HINT = `Type '${APP_NAME} help' for more information`;

/** Signals that stop a running interface */
export const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
