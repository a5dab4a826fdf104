import { describe, it, expect } from "vitest";
import {
  ErrorCode,
  SimulationError,
  describeError,
  isSimulationError,
} from "../../src/shared/errors/SimulationError";

describe("SimulationError", () => {
  it("debe conservar código y detalles", () => {
    const error = new SimulationError(ErrorCode.DuplicateAgentId, "dup", {
      agentId: 4,
    });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("SimulationError");
    expect(error.code).toBe("DUPLICATE_AGENT_ID");
    expect(error.details).toEqual({ agentId: 4 });
    expect(isSimulationError(error)).toBe(true);
    expect(isSimulationError(new Error("dup"))).toBe(false);
  });

  it("should describe any thrown value", () => {
    expect(describeError(new TypeError("bad"))).toBe("bad");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });
});
