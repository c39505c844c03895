import { describe, it, expect } from "vitest";
import {
  AppError,
  ModelNotReadyError,
  RequestError,
  StoreUnavailableError,
  ValidationError,
  isAppError,
  withTimeout,
} from "./errors";

describe("error taxonomy", () => {
  it("maps each error to a status and code", () => {
    expect(new ValidationError("bad")).toMatchObject({ status: 400, code: "VALIDATION_ERROR" });
    expect(new StoreUnavailableError("down")).toMatchObject({
      status: 503,
      code: "STORE_UNAVAILABLE",
    });
    expect(new ModelNotReadyError()).toMatchObject({ status: 503, code: "MODEL_NOT_READY" });
    expect(new RequestError("request entity too large", 413)).toMatchObject({
      status: 413,
      code: "INVALID_REQUEST",
    });
  });

  it("keeps the subclass name and cause", () => {
    const cause = new Error("socket closed");
    const error = new StoreUnavailableError("down", cause);

    expect(error.name).toBe("StoreUnavailableError");
    expect(error.cause).toBe(cause);
    expect(isAppError(error)).toBe(true);
    expect(error).toBeInstanceOf(AppError);
    expect(isAppError(new Error("plain"))).toBe(false);
  });
});

describe("withTimeout", () => {
  it("resolves with the value when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(3), 1000, () => new Error("late"))).resolves.toBe(3);
  });

  it("rejects with the timeout error past the deadline", async () => {
    const never = new Promise<number>(() => {});
    await expect(
      withTimeout(never, 10, () => new StoreUnavailableError("Interaction store timed out"))
    ).rejects.toThrow("Interaction store timed out");
  });
});
