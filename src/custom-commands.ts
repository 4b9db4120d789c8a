/**
 * Custom Commands API
 *
 * Provides utilities for registering user-provided TypeScript commands.
 */

import type { BotCommand, CommandContext } from "./types.js";

/**
 * Define a command with type inference.
 * Convenience wrapper - you can also just use the BotCommand interface directly.
 *
 * @example
 * ```ts
 * const hello = defineCommand("hello", (args, ctx) => {
 *   ctx.reply(`Hello, ${args || "world"}!`);
 * });
 *
 * const registry = createDefaultRegistry({ commands: [hello] });
 * await registry.dispatch("shell echo $(hello Alice)", console.log);
 * // "Hello, Alice!"
 * ```
 */
export function defineCommand(
  name: string,
  execute: (args: string, ctx: CommandContext) => void | Promise<void>,
  help?: string,
): BotCommand {
  return help === undefined ? { name, execute } : { name, help, execute };
}
