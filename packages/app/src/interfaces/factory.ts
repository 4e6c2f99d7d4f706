import { InterfaceNotFoundError } from "@loglane/errors";
import { INTERFACE_TYPES, type InterfaceType, type Settings } from "@loglane/settings";
import { CliInterface } from "./cli.js";
import { RestApiInterface } from "./rest.js";
import type { AppInterface, InterfaceDeps } from "./types.js";

type InterfaceBuilder = (deps: InterfaceDeps) => AppInterface;

const BUILDERS: Readonly<Record<InterfaceType, InterfaceBuilder>> = {
  cli: (deps) => new CliInterface(deps),
  restapi: (deps) => new RestApiInterface(deps),
};

function findInterfaceType(type: string): InterfaceType | undefined {
  return INTERFACE_TYPES.find((candidate) => candidate === type);
}

/**
 * Builds the front end named by a type string or by settings.
 */
export class InterfaceFactory {
  get available(): readonly InterfaceType[] {
    return INTERFACE_TYPES;
  }

  /**
   * @throws {InterfaceNotFoundError} when `type` is not a known interface
   */
  create(type: string, deps: InterfaceDeps): AppInterface {
    const known = findInterfaceType(type.trim().toLowerCase());
    if (known === undefined) {
      throw new InterfaceNotFoundError(type, INTERFACE_TYPES);
    }
    return BUILDERS[known](deps);
  }

  createFromSettings(settings: Settings, deps: Omit<InterfaceDeps, "settings"> = {}): AppInterface {
    return this.create(settings.interfaceType, { ...deps, settings });
  }
}
