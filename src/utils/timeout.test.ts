import { afterEach, describe, expect, it, vi } from "vitest";
import { DispatchError } from "../errors";
import { withTimeout } from "./timeout";

afterEach(() => {
  vi.useRealTimers();
});

describe("withTimeout", () => {
  it("resolves with the wrapped value", async () => {
    await expect(withTimeout(Promise.resolve(42), 1_000, "answer")).resolves.toBe(42);
  });

  it("passes the wrapped rejection through", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("boom")), 1_000, "answer"),
    ).rejects.toThrow("boom");
  });

  it("rejects with the built error once the time is up", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(
      new Promise<void>(() => {}),
      500,
      "sendMessage to 9",
      (message) => new DispatchError(message, 9),
    );
    const caught = pending.catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(500);
    const error = await caught;
    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toMatchObject({ message: "sendMessage to 9 timed out after 500ms", chatId: 9 });
  });
});
