/** Receives one reply produced by a command */
export type ReplyFn = (message: string) => void;

/** Read-only view of the registered commands */
export interface CommandLookup {
  get(name: string): BotCommand | undefined;
  names(): string[];
}

/**
 * Context provided to commands during execution.
 *
 * Commands produce output only through `reply`; a command may reply any
 * number of times, including not at all.
 */
export interface CommandContext {
  /** Collects one reply */
  reply: ReplyFn;
  /**
   * How many `shell` commands enclose this invocation.
   * 0 for a command dispatched directly by the user.
   */
  depth: number;
  /** Registered commands, for `help` */
  commands: CommandLookup;
}

export interface BotCommand {
  name: string;
  /** Shown by `help <name>` */
  help?: string;
  /** `args` is everything after the command name, leading whitespace removed */
  execute(args: string, ctx: CommandContext): void | Promise<void>;
}
