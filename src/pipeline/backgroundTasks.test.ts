import { describe, expect, it, vi } from "vitest";
import { BackgroundTasks } from "./backgroundTasks.js";

describe("BackgroundTasks", () => {
  it("drains tasks including ones started while draining", async () => {
    const tasks = new BackgroundTasks();
    const done: string[] = [];
    tasks.run("outer", async () => {
      done.push("outer");
      tasks.run("inner", async () => {
        done.push("inner");
      });
    });
    expect(tasks.size).toBe(1);
    await tasks.drain();
    expect(done).toEqual(["outer", "inner"]);
    expect(tasks.size).toBe(0);
  });

  it("logs a failure instead of rejecting", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const tasks = new BackgroundTasks();
    const err = new Error("boom");
    tasks.run("job", async () => {
      throw err;
    });
    await tasks.drain();
    expect(spy).toHaveBeenCalledWith("[background] job failed:", err);
    spy.mockRestore();
  });
});
