/**
 * Command line front end: `welcome` (default), `help [command]`, `status`.
 */

import { describeError, isConfigurationError } from "@loglane/errors";
import { toExportConfig } from "@loglane/settings";
import { type ExportConfig, getLogger, type LoggerHandle, profile } from "@loglane/telemetry";
import { APP_NAME, WELCOME_HINT, WELCOME_MESSAGE } from "../constants.js";
import { parseArgv } from "./args.js";
import type { AppInterface, InterfaceDeps, Output } from "./types.js";

interface CommandInfo {
  readonly usage: string;
  readonly description: string;
}

const COMMANDS = {
  welcome: {
    usage: `${APP_NAME} welcome`,
    description: "Show the welcome message",
  },
  help: {
    usage: `${APP_NAME} help [command]`,
    description: "List the available commands, or describe one",
  },
  status: {
    usage: `${APP_NAME} status`,
    description: "Print the effective export configuration as JSON",
  },
} as const satisfies Record<string, CommandInfo>;

type CommandName = keyof typeof COMMANDS;

function findCommand(name: string): CommandName | undefined {
  const names: readonly CommandName[] = ["welcome", "help", "status"];
  return names.find((candidate) => candidate === name);
}

export class CliInterface implements AppInterface {
  readonly type = "cli" as const;

  private readonly deps: InterfaceDeps;
  private readonly logger: LoggerHandle;
  private readonly output: Output;

  constructor(deps: InterfaceDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? getLogger("cli");
    this.output = deps.output ?? console;
  }

  async run(argv: readonly string[]): Promise<number> {
    const { positionals, flags } = parseArgv(argv);
    const [name = "welcome", ...rest] = positionals;

    if (flags.help === true) {
      return this.help(name === "help" ? rest[0] : positionals[0]);
    }

    const command = findCommand(name);
    if (command === undefined) {
      this.logger.warning("unknown_command", { command: name });
      this.output.error(`Error: Unknown command '${name}'`);
      this.output.error(`Run '${APP_NAME} help' to see all available commands.`);
      return 1;
    }

    this.logger.debug("command_started", { command });
    const execute = profile(() => this.execute(command, rest), this.logger, {
      name: `cli.${command}`,
      settings: this.deps.settings.profiler,
    });
    return execute();
  }

  /** Nothing runs in the background, so there is nothing to stop */
  async stop(): Promise<void> {}

  private execute(command: CommandName, rest: readonly string[]): number {
    switch (command) {
      case "welcome":
        return this.welcome();
      case "help":
        return this.help(rest[0]);
      case "status":
        return this.status();
    }
  }

  private welcome(): number {
    this.output.log(WELCOME_MESSAGE);
    this.output.log(WELCOME_HINT);
    return 0;
  }

  private help(target: string | undefined): number {
    if (target === undefined) {
      this.output.log("Available commands:");
      for (const [name, info] of Object.entries(COMMANDS)) {
        this.output.log(`  ${name.padEnd(8)} ${info.description}`);
      }
      this.output.log("");
      this.output.log(`Use '${APP_NAME} help <command>' for help on a specific command.`);
      return 0;
    }

    const command = findCommand(target);
    if (command === undefined) {
      this.output.error(`Error: Unknown command '${target}'`);
      this.output.error(`Run '${APP_NAME} help' to see all available commands.`);
      return 1;
    }

    const info = COMMANDS[command];
    this.output.log(`Command: ${command}`);
    this.output.log(`Usage: ${info.usage}`);
    this.output.log(`Description: ${info.description}`);
    return 0;
  }

  private status(): number {
    let config: ExportConfig;
    try {
      config = this.deps.exportConfig ?? toExportConfig(this.deps.settings);
    } catch (error) {
      if (!isConfigurationError(error)) throw error;
      this.logger.error("status_failed", { error: describeError(error) });
      this.output.error(error.message);
      return 1;
    }

    this.output.log(JSON.stringify(config, null, 2));
    return 0;
  }
}
