/**
 * @loglane/settings
 *
 * Environment-driven settings for Loglane applications.
 */

export {
  DEFAULT_INTERFACE_TYPE,
  DEFAULT_LOG_FILE_PATH,
  DEFAULT_REST_HOST,
  DEFAULT_REST_PORT,
  INTERFACE_TYPES,
  PACKAGE_NAME,
} from "./constants.js";
export { EnvironmentSchema } from "./schema.js";
export { loadDotenv, loadSettings, toExportConfig } from "./settings.js";
export type { Environment, InterfaceType, Settings } from "./types.js";
