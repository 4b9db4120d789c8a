import type { BotCommand } from "../../types.js";

export const upperCommand: BotCommand = {
  name: "upper",
  help: "upper <text>: replies with the text in upper case.",

  execute(args, ctx) {
    ctx.reply(args.toUpperCase());
  },
};
