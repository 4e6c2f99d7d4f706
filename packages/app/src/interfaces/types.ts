import type { Settings } from "@loglane/settings";
import type { ExportConfig, LoggerHandle } from "@loglane/telemetry";

/**
 * Line-oriented output. `console` satisfies it.
 */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

/**
 * A front end the application runs until it finishes or is stopped.
 */
export interface AppInterface {
  readonly type: Settings["interfaceType"];
  /** Resolves with the process exit code */
  run(argv: readonly string[]): Promise<number>;
  stop(): Promise<void>;
}

export interface InterfaceDeps {
  readonly settings: Settings;
  /** Defaults to a process-wide handle from `getLogger` */
  readonly logger?: LoggerHandle | undefined;
  readonly output?: Output | undefined;
  /** The configuration the running pipeline was built with */
  readonly exportConfig?: ExportConfig | undefined;
}

export interface WelcomeBody {
  readonly message: string;
  readonly hint: string;
  readonly interface: Settings["interfaceType"];
}
