import type { BotCommand } from "../../types.js";

/**
 * Replies with its arguments unchanged, so `shell echo $(cmd)` shows what
 * an interpolation expanded to.
 */
export const echoCommand: BotCommand = {
  name: "echo",
  help: "echo <text>: replies with the text.",

  execute(args, ctx) {
    ctx.reply(args);
  },
};
