import { Shell, type ShellLogger } from "../../Shell.js";
import { InvocationDepthError } from "../../interpreter/errors.js";
import { type InterpolationLimits, resolveLimits } from "../../limits.js";
import type { BotCommand, CommandContext } from "../../types.js";
import type { CommandRegistry } from "../registry.js";

const shellHelp = `The "shell" command enables interpolation of commands. For example, "shell echo $(ping)" replies with the response of the ping command, "pong". Only replies count as output. Write \\$( and \\) to keep the markers as plain text.`;

export interface ShellCommandOptions {
  logger?: ShellLogger;
  limits?: InterpolationLimits;
}

/**
 * The `shell` command: expands $(...) in its arguments by dispatching each
 * interpolation through the registry, then runs the expanded command.
 * Interpolated commands run one level deeper than the `shell` that
 * dispatched them.
 */
export function createShellCommand(
  registry: CommandRegistry,
  options: ShellCommandOptions = {},
): BotCommand {
  const limits = resolveLimits(options.limits);

  return {
    name: "shell",
    help: shellHelp,
    async execute(args: string, ctx: CommandContext): Promise<void> {
      if (ctx.depth >= limits.maxInvocationDepth) {
        throw new InvocationDepthError(limits.maxInvocationDepth);
      }

      const shell = new Shell({
        dispatch: async (commandText, reply) => {
          await registry.dispatch(commandText, reply, ctx.depth + 1);
        },
        limits,
        logger: options.logger,
      });

      const result = await shell.exec(args);
      if (result.output) {
        ctx.reply(result.output);
      }
    },
  };
}
