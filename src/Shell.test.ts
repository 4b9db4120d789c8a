import { describe, expect, it, vi } from "vitest";
import { ParseException } from "./parser/parser.js";
import { type CommandDispatcher, Shell, type ShellLogger } from "./Shell.js";

/**
 * Dispatcher answering from a fixed table of replies, recording every
 * command it is asked to run.
 */
function createTableDispatcher(table: Record<string, string[]>) {
  const calls: string[] = [];
  const dispatch: CommandDispatcher = (commandText, reply) => {
    calls.push(commandText);
    for (const message of table[commandText] ?? []) {
      reply(message);
    }
  };
  return { dispatch, calls };
}

function createMockLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
  } satisfies ShellLogger;
}

describe("Shell", () => {
  describe("exec", () => {
    it("should dispatch interpolations and then the expanded command", async () => {
      const { dispatch, calls } = createTableDispatcher({
        ping: ["pong"],
        "say #chan pong": ["said"],
      });
      const shell = new Shell({ dispatch });

      const result = await shell.exec("say #chan $(ping)");

      expect(result).toEqual({
        output: "said",
        expanded: "say #chan pong",
        malformed: false,
      });
      expect(calls).toEqual(["ping", "say #chan pong"]);
    });

    it("should join multiple replies with a single space", async () => {
      const { dispatch } = createTableDispatcher({
        list: ["a", "b", "c"],
        "echo a b c": ["a b c"],
      });
      const result = await new Shell({ dispatch }).exec("echo $(list)");
      expect(result.expanded).toBe("echo a b c");
      expect(result.output).toBe("a b c");
    });

    it("should join replies with a custom separator", async () => {
      const { dispatch } = createTableDispatcher({ list: ["a", "b"] });
      const shell = new Shell({ dispatch, replySeparator: ", " });
      await expect(shell.expand("[$(list)]")).resolves.toBe("[a, b]");
    });

    it("should splice in nothing for a command without replies", async () => {
      const { dispatch } = createTableDispatcher({});
      const result = await new Shell({ dispatch }).exec("x$(silent)y");
      expect(result).toEqual({ output: "", expanded: "xy", malformed: false });
    });

    it("should resolve nested interpolations innermost first", async () => {
      const calls: string[] = [];
      const shell = new Shell({
        dispatch: async (commandText, reply) => {
          calls.push(commandText);
          await Promise.resolve();
          reply(commandText.toUpperCase());
        },
      });

      const result = await shell.exec("$(f $(g))");

      expect(result.output).toBe("F G");
      expect(calls).toEqual(["g", "f G", "F G"]);
    });

    it("should dispatch plain input once", async () => {
      const { dispatch, calls } = createTableDispatcher({ ping: ["pong"] });
      const result = await new Shell({ dispatch }).exec("ping");
      expect(result.output).toBe("pong");
      expect(calls).toEqual(["ping"]);
    });

    it("should report malformed input without dispatching", async () => {
      const { dispatch, calls } = createTableDispatcher({});
      const result = await new Shell({ dispatch }).exec("echo $(oops");
      expect(result).toEqual({
        output: "Malformed command echo $(oops",
        expanded: null,
        malformed: true,
      });
      expect(calls).toEqual([]);
    });

    it("should report input nested beyond the limit as malformed", async () => {
      const { dispatch, calls } = createTableDispatcher({});
      const shell = new Shell({ dispatch, limits: { maxNestingDepth: 1 } });
      const result = await shell.exec("$($(x))");
      expect(result.malformed).toBe(true);
      expect(calls).toEqual([]);
    });

    it("should propagate dispatcher errors and stop", async () => {
      const calls: string[] = [];
      const shell = new Shell({
        dispatch: (commandText) => {
          calls.push(commandText);
          throw new Error("network down");
        },
      });
      await expect(shell.exec("$(a) $(b)")).rejects.toThrow("network down");
      expect(calls).toEqual(["a"]);
    });
  });

  describe("expand", () => {
    it("should not dispatch the expanded command", async () => {
      const { dispatch, calls } = createTableDispatcher({ b: ["B"] });
      await expect(new Shell({ dispatch }).expand("a $(b)")).resolves.toBe(
        "a B",
      );
      expect(calls).toEqual(["b"]);
    });

    it("should throw on malformed input", async () => {
      const { dispatch } = createTableDispatcher({});
      await expect(new Shell({ dispatch }).expand("$(")).rejects.toThrow(
        ParseException,
      );
    });
  });

  describe("logging", () => {
    it("should log the command line and every resolved interpolation", async () => {
      const logger = createMockLogger();
      const { dispatch } = createTableDispatcher({
        ping: ["pong"],
        "echo pong": ["pong"],
      });
      await new Shell({ dispatch, logger }).exec("echo $(ping)");

      expect(logger.info.mock.calls).toEqual([
        ["exec", { command: "echo $(ping)" }],
      ]);
      expect(logger.debug.mock.calls).toEqual([
        ["interpolation", { command: "ping", output: "pong" }],
      ]);
    });

    it("should not log the outer command as an interpolation", async () => {
      const logger = createMockLogger();
      const shell = new Shell({
        dispatch: (commandText, reply) => reply(commandText.toUpperCase()),
        logger,
      });
      await shell.exec("say $(ping)");

      expect(logger.debug.mock.calls).toEqual([
        ["interpolation", { command: "ping", output: "PING" }],
      ]);
    });

    it("should log nested interpolations innermost first", async () => {
      const logger = createMockLogger();
      const shell = new Shell({
        dispatch: (commandText, reply) => reply(commandText.toUpperCase()),
        logger,
      });
      await shell.expand("$(f $(g))");

      expect(logger.debug.mock.calls).toEqual([
        ["interpolation", { command: "g", output: "G" }],
        ["interpolation", { command: "f G", output: "F G" }],
      ]);
    });

    it("should log malformed input with the parse error", async () => {
      const logger = createMockLogger();
      const { dispatch } = createTableDispatcher({});
      await new Shell({ dispatch, logger }).exec("echo $(oops");

      expect(logger.info).toHaveBeenLastCalledWith("malformed", {
        command: "echo $(oops",
        error:
          "Parse error at 1:6: unexpected EOF while looking for matching `)'",
      });
      expect(logger.debug).not.toHaveBeenCalled();
    });
  });
});
