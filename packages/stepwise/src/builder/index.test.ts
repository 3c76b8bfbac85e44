import { describe, it, expect } from "vitest";
import { TaskBuilder, detachedTask, task } from ".";
import { StateMachine } from "../core";
import { Future, createFuture, runInContext } from "../future";
import { ok } from "../result";
import {
  createControlledAwaitable,
  createCountingIterable,
  createEventCollector,
  createRecordingContext,
  createTrackedResource,
  failLater,
  yieldFuture,
} from "../testing";

describe("task()", () => {
  it("completes synchronously when every await has already completed", () => {
    const labelCounts: number[] = [];

    const future = task((b) => {
      const step = b.bind(Future.resolve(5), (x) => b.return(x + 1));
      labelCounts.push(b.machine.labelCount);
      return step;
    });

    expect(future.status).toBe("fulfilled");
    expect(future.result).toEqual(ok(6));
    expect(labelCounts).toEqual([0]);
  });

  it("completes later with one registration for a pending await", () => {
    const pending = createControlledAwaitable<number>();

    const future = task((b) => b.bind(pending.awaitable, (x) => b.return(x)));

    expect(future.status).toBe("pending");
    pending.complete(7);

    expect(future.result).toEqual(ok(7));
    expect(pending.stats.registrations).toBe(1);
  });

  it("sums a sequence with an await per item", async () => {
    const { iterable, stats } = createCountingIterable([1, 2, 3]);
    let sum = 0;

    const total = await task((b) =>
      b.combine(
        b.for(iterable, (x) =>
          b.bind(yieldFuture(), () => {
            sum += x;
            return b.zero();
          })
        ),
        () => b.return(sum)
      )
    );

    expect(total).toBe(6);
    expect(stats.nextCalls).toBe(4);
    expect(stats.yielded).toBe(3);
  });

  it("uses a fresh state machine per task", () => {
    const machines: StateMachine[] = [];
    const body = (b: TaskBuilder) => {
      machines.push(b.machine);
      return b.zero();
    };

    task(body);
    task(body);

    expect(machines).toHaveLength(2);
    expect(machines[0]).not.toBe(machines[1]);
  });

  it("reports events through onEvent", async () => {
    const collector = createEventCollector();

    await task((b) => b.bind(yieldFuture(1), (x) => b.return(x)), {
      onEvent: collector.onEvent,
      taskId: "builder-task",
    });

    expect(collector.types()).toEqual([
      "task_start",
      "task_suspend",
      "task_resume",
      "task_success",
    ]);
    expect(collector.events.every((event) => event.taskId === "builder-task")).toBe(true);
  });
});

describe("TaskBuilder", () => {
  it("loops while a condition holds", async () => {
    let i = 0;
    const seen: number[] = [];

    await task((b) =>
      b.while(
        () => i < 3,
        () =>
          b.bind(yieldFuture(i), (value) => {
            seen.push(value);
            i++;
            return b.zero();
          })
      )
    );

    expect(seen).toEqual([0, 1, 2]);
  });

  it("recovers from a failed await with tryWith", async () => {
    const result = await task((b) =>
      b.tryWith(
        () => b.bind(failLater<string>(new Error("offline")), (s) => b.return(s)),
        (error) => b.return(error instanceof Error ? `fallback: ${error.message}` : "fallback")
      )
    );

    expect(result).toBe("fallback: offline");
  });

  it("runs cleanup with tryFinally and keeps the failure", async () => {
    const log: string[] = [];

    const future = task((b) =>
      b.tryFinally(
        () => b.bind(failLater<number>(new Error("write failed")), (n) => b.return(n)),
        () => log.push("cleanup")
      )
    );

    await expect(future).rejects.toThrow("write failed");
    expect(log).toEqual(["cleanup"]);
  });

  it("disposes a resource after the body", async () => {
    const log: string[] = [];
    const connection = createTrackedResource("connection", log);

    const rows = await task((b) =>
      b.using(connection, (c) =>
        b.bind(yieldFuture(["row"]), (result) => {
          log.push(`query:${c.name}`);
          return b.return(result);
        })
      )
    );

    expect(rows).toEqual(["row"]);
    expect(log).toEqual(["query:connection", "dispose:connection"]);
  });

  describe("returnFrom()", () => {
    it("hands a future off as-is", () => {
      const { future: inner } = createFuture<number>();

      expect(task((b) => b.returnFrom(inner))).toBe(inner);
    });

    it("awaits a custom awaitable", () => {
      const pending = createControlledAwaitable<string>();

      const future = task((b) => b.returnFrom(pending.awaitable));
      pending.complete("custom");

      expect(future.result).toEqual(ok("custom"));
    });

    it("adapts a native promise", async () => {
      await expect(task((b) => b.returnFrom(Promise.resolve("native")))).resolves.toBe("native");
    });
  });

  it("returns the code passed to delay()", () => {
    const b = new TaskBuilder(new StateMachine());
    const code = () => b.return(1);

    expect(b.delay(code)).toBe(code);
  });
});

describe("resume contexts", () => {
  it("task() resumes on the context it was started in", () => {
    const context = createRecordingContext("ui");
    const { future: input, resolve } = createFuture<number>();

    const future = runInContext(context, () => task((b) => b.bind(input, (x) => b.return(x))));
    resolve(4);

    expect(context.posts).toBe(1);
    expect(future.result).toEqual(ok(4));
  });

  it("detachedTask() resumes without posting to the context", () => {
    const context = createRecordingContext("ui");
    const { future: input, resolve } = createFuture<number>();

    const future = runInContext(context, () =>
      detachedTask((b) => b.bind(input, (x) => b.return(x)))
    );
    resolve(4);

    expect(context.posts).toBe(0);
    expect(future.result).toEqual(ok(4));
  });
});
