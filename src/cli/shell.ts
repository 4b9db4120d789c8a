#!/usr/bin/env node
/**
 * Interactive command shell CLI
 *
 * Usage:
 *   npx tsx src/cli/shell.ts [--debug] [--max-depth <n>]
 *
 * Each input line is dispatched as a command. Use the `shell` command to
 * interpolate, e.g. `shell echo $(upper $(ping))`.
 */

import * as readline from "node:readline";
import type { ShellLogger } from "../Shell.js";
import {
  type CommandRegistry,
  createDefaultRegistry,
} from "../commands/registry.js";
import { getErrorMessage } from "../interpreter/errors.js";

// ANSI colors
const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
};

interface CliOptions {
  debug: boolean;
  maxNestingDepth?: number;
}

const consoleLogger: ShellLogger = {
  info(message, data) {
    console.error(`${colors.dim}[info] ${message}`, data ?? "", colors.reset);
  },
  debug(message, data) {
    console.error(`${colors.dim}[debug] ${message}`, data ?? "", colors.reset);
  },
};

class CommandShell {
  private registry: CommandRegistry;
  private rl: readline.Interface;
  private running = true;
  private isInteractive: boolean;

  constructor(options: CliOptions) {
    this.registry = createDefaultRegistry({
      logger: options.debug ? consoleLogger : undefined,
      limits: { maxNestingDepth: options.maxNestingDepth },
    });

    // Check if stdin is a TTY (interactive mode)
    this.isInteractive = process.stdin.isTTY === true;

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: this.isInteractive,
    });

    // Handle Ctrl+C
    this.rl.on("SIGINT", () => {
      process.stdout.write("^C\n");
      this.prompt();
    });

    // Handle close (only in interactive mode)
    if (this.isInteractive) {
      this.rl.on("close", () => {
        this.running = false;
        console.log("\nGoodbye!");
        process.exit(0);
      });
    }
  }

  private async executeCommand(line: string): Promise<void> {
    const trimmed = line.trim();

    // Skip empty commands
    if (!trimmed) {
      return;
    }

    if (trimmed === "exit") {
      console.log("exit");
      process.exit(0);
    }

    try {
      const handled = await this.registry.dispatch(trimmed, (message) => {
        console.log(message);
      });
      if (!handled) {
        console.error(
          `${colors.red}Unknown command: ${trimmed.split(/\s+/)[0]}${colors.reset}`,
        );
      }
    } catch (error) {
      console.error(
        `${colors.red}Error: ${getErrorMessage(error)}${colors.reset}`,
      );
    }
  }

  private printWelcome(): void {
    console.log(`
${colors.cyan}${colors.bold}Command shell${colors.reset}

Type ${colors.green}help${colors.reset} for available commands, ${colors.green}exit${colors.reset} to quit.
Try ${colors.green}shell echo $(upper $(ping))${colors.reset}
`);
  }

  private prompt(): void {
    this.rl.question(`${colors.green}${colors.bold}>${colors.reset} `, (answer) => {
      if (!this.running) return;

      this.executeCommand(answer).then(
        () => this.prompt(),
        (error: unknown) => {
          console.error(getErrorMessage(error));
          this.prompt();
        },
      );
    });
  }

  async run(): Promise<void> {
    if (this.isInteractive) {
      this.printWelcome();
      this.prompt();
      return;
    }

    // Non-interactive mode: read and execute line by line sequentially
    const lines: string[] = [];
    this.rl.on("line", (line) => {
      lines.push(line);
    });
    await new Promise<void>((resolve) => {
      this.rl.on("close", resolve);
    });

    for (const line of lines) {
      await this.executeCommand(line);
    }
  }
}

// CLI argument parsing
function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = { debug: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--debug") {
      options.debug = true;
    } else if (args[i] === "--max-depth" && args[i + 1]) {
      const depth = Number.parseInt(args[++i], 10);
      if (!Number.isInteger(depth) || depth < 1) {
        console.error(`Invalid --max-depth: ${args[i]}`);
        process.exit(1);
      }
      options.maxNestingDepth = depth;
    } else if (args[i] === "--help" || args[i] === "-h") {
      console.log(`
Usage: npx tsx src/cli/shell.ts [options]

Options:
  --debug             Log every resolved interpolation to stderr
  --max-depth <n>     Maximum $(...) nesting depth (default: 100)
  --help, -h          Show this help message

Example:
  echo 'shell echo $(ping)' | npx tsx src/cli/shell.ts
`);
      process.exit(0);
    }
  }

  return options;
}

// Main entry point
const shell = new CommandShell(parseArgs());
shell.run().catch((error: unknown) => {
  console.error(getErrorMessage(error));
  process.exit(1);
});
