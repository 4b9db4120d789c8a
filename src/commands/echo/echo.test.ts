import { describe, expect, it } from "vitest";
import { createDefaultRegistry } from "../registry.js";

async function run(commandText: string): Promise<string[]> {
  const replies: string[] = [];
  await createDefaultRegistry().dispatch(commandText, (message) => {
    replies.push(message);
  });
  return replies;
}

describe("echo", () => {
  it("should reply with its arguments", async () => {
    await expect(run("echo hello  world")).resolves.toEqual(["hello  world"]);
  });

  it("should reply with an empty string when given nothing", async () => {
    await expect(run("echo")).resolves.toEqual([""]);
  });
});

describe("ping", () => {
  it("should reply pong", async () => {
    await expect(run("ping ignored")).resolves.toEqual(["pong"]);
  });
});

describe("upper", () => {
  it("should upper-case its arguments", async () => {
    await expect(run("upper mixed Case")).resolves.toEqual(["MIXED CASE"]);
  });
});
