/**
 * @loglane/app
 *
 * CLI and REST front ends running on the process-wide Loglane pipeline.
 */

export { Application, type ApplicationOptions } from "./application.js";
export { APP_NAME, PACKAGE_NAME, WELCOME_HINT, WELCOME_MESSAGE } from "./constants.js";
export { type ParsedArgs, parseArgv } from "./interfaces/args.js";
export { CliInterface } from "./interfaces/cli.js";
export { InterfaceFactory } from "./interfaces/factory.js";
export {
  type ErrorBody,
  type HealthBody,
  RestApiInterface,
  type RestApiInterfaceOptions,
} from "./interfaces/rest.js";
export type { AppInterface, InterfaceDeps, Output, WelcomeBody } from "./interfaces/types.js";
export { main, type MainOptions, type SplitArgs, splitDotenvFlag } from "./main.js";
