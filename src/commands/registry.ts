// Command registry: maps the first word of a command line to a BotCommand

import type { ShellLogger } from "../Shell.js";
import type { InterpolationLimits } from "../limits.js";
import type { BotCommand, CommandLookup, ReplyFn } from "../types.js";
import { echoCommand } from "./echo/echo.js";
import { helpCommand } from "./help/help.js";
import { pingCommand } from "./ping/ping.js";
import { createShellCommand } from "./shell/shell.js";
import { upperCommand } from "./upper/upper.js";

/** All built-in command names */
export type CommandName = "echo" | "help" | "ping" | "shell" | "upper";

const COMMAND_LINE = /^(\S+)\s*([\s\S]*)$/;

export class CommandRegistry implements CommandLookup {
  private readonly commands = new Map<string, BotCommand>();

  /** Registers a command, replacing any command with the same name */
  register(command: BotCommand): void {
    this.commands.set(command.name, command);
  }

  get(name: string): BotCommand | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  names(): string[] {
    return [...this.commands.keys()].sort();
  }

  /**
   * Run a command line. Returns false, without replying, when the line is
   * blank or names no registered command. Errors thrown by the command
   * propagate.
   */
  async dispatch(
    commandText: string,
    reply: ReplyFn,
    depth = 0,
  ): Promise<boolean> {
    const match = COMMAND_LINE.exec(commandText.trimStart());
    if (!match) {
      return false;
    }
    const [, name, args] = match;
    const command = this.commands.get(name);
    if (!command) {
      return false;
    }
    await command.execute(args, { reply, depth, commands: this });
    return true;
  }
}

export interface RegistryOptions {
  /** Extra commands, registered after the built-ins (and so able to replace them) */
  commands?: BotCommand[];
  /** Passed to the `shell` command */
  logger?: ShellLogger;
  limits?: InterpolationLimits;
}

/**
 * Gets all built-in command names
 */
export function getCommandNames(): CommandName[] {
  return ["echo", "help", "ping", "shell", "upper"];
}

/**
 * Creates a registry holding the built-in commands plus any extra ones
 */
export function createDefaultRegistry(
  options: RegistryOptions = {},
): CommandRegistry {
  const registry = new CommandRegistry();
  registry.register(echoCommand);
  registry.register(helpCommand);
  registry.register(pingCommand);
  registry.register(upperCommand);
  registry.register(
    createShellCommand(registry, {
      logger: options.logger,
      limits: options.limits,
    }),
  );
  for (const command of options.commands ?? []) {
    registry.register(command);
  }
  return registry;
}
