import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import {
  CLIENT,
  OPERATOR,
  PROXY,
  STRANGER,
  createWorld,
  depositRequest,
  withdrawRequest,
} from "./helpers/world.js";
import type { World } from "./helpers/world.js";

interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

describe("operation logging", () => {
  let lines: LogLine[];
  let world: World;

  beforeEach(() => {
    lines = [];
    const logger = pino(
      { level: "info" },
      {
        write(msg: string) {
          lines.push(JSON.parse(msg));
        },
      },
    );
    world = createWorld({ logger });
    world.factory.deposit(OPERATOR, CLIENT, depositRequest(1_000_000n));
  });

  function find(msg: string): LogLine | undefined {
    return lines.find((line) => line.msg === msg);
  }

  it("logs proxy creation from both factory and proxy", () => {
    expect(find("initialize completed")).toMatchObject({ level: 30, proxy: PROXY });
    expect(find("createProxy completed")).toMatchObject({ level: 30, caller: OPERATOR });
  });

  it("logs a completed operation at info with its correlation id", () => {
    world.proxy.withdraw(CLIENT, withdrawRequest(1_000_000n, 1_000_000n));

    const line = find("withdraw completed");
    expect(line).toMatchObject({
      level: 30,
      proxy: PROXY,
      operation: "withdraw",
      caller: CLIENT,
    });
    expect(typeof line?.correlationId).toBe("string");
  });

  it("logs a rejected operation at warn with the error code", () => {
    expect(() =>
      world.proxy.withdraw(STRANGER, withdrawRequest(1_000_000n, 1_000_000n)),
    ).toThrow();

    expect(find("withdraw rejected")).toMatchObject({
      level: 40,
      operation: "withdraw",
      caller: STRANGER,
      code: "UNAUTHORIZED_CALLER",
    });
  });
});
