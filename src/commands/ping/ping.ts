import type { BotCommand } from "../../types.js";

export const pingCommand: BotCommand = {
  name: "ping",
  help: 'Replies with "pong".',

  execute(_args, ctx) {
    ctx.reply("pong");
  },
};
