import type { BotCommand } from "../../types.js";

export const helpCommand: BotCommand = {
  name: "help",
  help: "help [command]: lists the available commands, or describes one.",

  execute(args, ctx) {
    const name = args.trim();
    if (!name) {
      ctx.reply(`Available commands: ${ctx.commands.names().join(", ")}`);
      return;
    }

    const command = ctx.commands.get(name);
    if (!command) {
      ctx.reply(`Unknown command: ${name}`);
      return;
    }
    ctx.reply(command.help ?? `No help for ${name}`);
  },
};
