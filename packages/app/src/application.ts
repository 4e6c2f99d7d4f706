/**
 * Application lifecycle: settings → pipeline → interface → shutdown.
 */

import { describeError, isConfigurationError } from "@loglane/errors";
import { type Environment, loadSettings, toExportConfig } from "@loglane/settings";
import {
  getLogger,
  initObservability,
  type LoggerHandle,
  type PipelineOptions,
  shutdownObservability,
} from "@loglane/telemetry";
import { STOP_SIGNALS } from "./constants.js";
import { InterfaceFactory } from "./interfaces/factory.js";
import type { AppInterface, Output } from "./interfaces/types.js";

export interface ApplicationOptions {
  /** Defaults to `process.env` */
  readonly env?: Environment | undefined;
  readonly pipeline?: PipelineOptions | undefined;
  readonly output?: Output | undefined;
  readonly factory?: InterfaceFactory | undefined;
  /** Signals that stop the running interface. Defaults to SIGINT and SIGTERM. */
  readonly signals?: readonly NodeJS.Signals[] | undefined;
}

export class Application {
  private readonly options: ApplicationOptions;
  private readonly output: Output;
  private readonly factory: InterfaceFactory;

  constructor(options: ApplicationOptions = {}) {
    this.options = options;
    this.output = options.output ?? console;
    this.factory = options.factory ?? new InterfaceFactory();
  }

  /**
   * Runs the configured interface to completion and resolves with its exit
   * code. The process-wide pipeline is always shut down before returning.
   *
   * Invalid settings are printed to the output's error stream (exit code 1).
   */
  async run(argv: readonly string[] = []): Promise<number> {
    try {
      const settings = loadSettings(this.options.env ?? process.env);
      const pipeline = initObservability(toExportConfig(settings), this.options.pipeline);
      const logger = getLogger("app");

      const ui = this.factory.createFromSettings(settings, {
        output: this.output,
        exportConfig: pipeline.config,
      });
      logger.info("application_started", {
        interface: ui.type,
        mode: pipeline.config.mode,
        sinks: pipeline.sinkNames,
      });

      const release = this.trapSignals(ui, logger);
      try {
        const code = await ui.run(argv);
        logger.info("application_stopped", { interface: ui.type, exit_code: code });
        return code;
      } catch (error) {
        logger.error("application_failed", { interface: ui.type, error: describeError(error) });
        throw error;
      } finally {
        release();
      }
    } catch (error) {
      if (!isConfigurationError(error)) throw error;
      this.output.error(error.message);
      return 1;
    } finally {
      await shutdownObservability();
    }
  }

  private trapSignals(ui: AppInterface, logger: LoggerHandle): () => void {
    const signals = this.options.signals ?? STOP_SIGNALS;
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info("signal_received", { signal });
      ui.stop().catch((error: unknown) => {
        logger.error("stop_failed", { signal, error: describeError(error) });
      });
    };

    for (const signal of signals) {
      process.once(signal, onSignal);
    }
    return () => {
      for (const signal of signals) {
        process.off(signal, onSignal);
      }
    };
  }
}
