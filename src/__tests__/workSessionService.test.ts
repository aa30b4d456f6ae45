import { WorkSessionService } from "../services/workSessionService";
import { ConflictError, InvalidInputError, NotFoundError, UnauthorizedError } from "../errors";
import type { Pattern, WorkSession } from "../types";
import {
  entry,
  group,
  makePattern,
  MemoryPatternProvider,
  MemorySessionStore,
  steppingClock,
} from "./helpers";

const USER = "test-user-123";

// Scenario A: one group, one entry of three stitches
const single = makePattern([group("1", [entry("st-sc", 3)])], { id: "single" });
// Scenario B/C: two groups of three stitches
const twoGroups = makePattern(
  [group("1", [entry("st-sc", 3)]), group("2", [entry("st-dc", 3)])],
  { id: "two-groups" },
);
// Scenario D: one group worked twice, two stitches per repeat
const repeated = makePattern([group("1", [entry("st-sc", 2)], 2)], { id: "repeated" });
const nested = makePattern(
  [group("1", [entry("st-ch", 2, 2), entry("st-sc", 1)], 2), group("2", [entry("st-dc", 3)])],
  { id: "nested" },
);
const empty = makePattern([group("1", [])], { id: "empty" });
const foreign = makePattern([group("1", [entry("st-sc", 1)])], { id: "foreign", userId: "someone-else" });

function setup() {
  const store = new MemorySessionStore();
  const patterns = new MemoryPatternProvider([single, twoGroups, repeated, nested, empty, foreign]);
  const service = new WorkSessionService(store, patterns, steppingClock());
  return { store, service };
}

async function advanceTimes(
  service: WorkSessionService,
  session: WorkSession,
  pattern: Pattern,
  times: number,
): Promise<WorkSession> {
  let current = session;
  for (let i = 0; i < times; i++) {
    current = (await service.advance(current, pattern)).session;
  }
  return current;
}

describe("WorkSessionService", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  describe("start", () => {
    it("creates an active session at the first stitch", async () => {
      const { service, store } = setup();
      const session = await service.start(USER, "single");

      expect(session.id).toBe("session-1");
      expect(session.status).toBe("active");
      expect(session.position).toEqual({ groupIndex: 0, groupRepeat: 0, entryIndex: 0, entryRepeat: 0, stitchOrdinal: 0 });
      expect(session.startedAt).toBe("2024-03-01T10:00:00.000Z");
      expect(store.docs.size).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith("[WorkSession] Started session-1 on pattern single");
    });

    it("reports a missing pattern as not found", async () => {
      const { service } = setup();
      await expect(service.start(USER, "nope")).rejects.toThrow(NotFoundError);
    });

    it("reports another user's pattern as not found", async () => {
      const { service, store } = setup();
      await expect(service.start(USER, "foreign")).rejects.toThrow("Pattern foreign not found");
      expect(store.docs.size).toBe(0);
    });

    it("rejects a pattern with zero stitches", async () => {
      const { service, store } = setup();
      await expect(service.start(USER, "empty")).rejects.toThrow(InvalidInputError);
      expect(store.docs.size).toBe(0);
    });
  });

  describe("scenarios", () => {
    it("A: completes a single group after three advances", async () => {
      const { service } = setup();
      const started = await service.start(USER, "single");

      const first = await service.advance(started, single);
      const second = await service.advance(first.session, single);
      const third = await service.advance(second.session, single);

      expect([first.completed, second.completed, third.completed]).toEqual([false, false, true]);
      expect(third.session.status).toBe("completed");
      expect(third.session.completedAt).not.toBeNull();
      const report = service.progress(third.session, single);
      expect(report.completedStitches).toBe(3);
      expect(report.totalStitches).toBe(3);
    });

    it("B: moves into the second group, then completes", async () => {
      const { service } = setup();
      const started = await service.start(USER, "two-groups");

      const halfway = await advanceTimes(service, started, twoGroups, 3);
      expect(halfway.status).toBe("active");
      expect(halfway.position.groupIndex).toBe(1);
      const report = service.progress(halfway, twoGroups);
      expect(report.groupLabel).toBe("Round 2");
      expect(report.completedStitches).toBe(3);
      expect(report.totalStitches).toBe(6);

      const done = await advanceTimes(service, halfway, twoGroups, 3);
      expect(done.status).toBe("completed");
    });

    it("C: retreats one stitch", async () => {
      const { service } = setup();
      const started = await service.start(USER, "two-groups");

      const moved = await advanceTimes(service, started, twoGroups, 2);
      const back = await service.retreat(moved, twoGroups);

      expect(back.status).toBe("active");
      expect(service.progress(back, twoGroups).completedStitches).toBe(1);
    });

    it("D: announces the group repeat", async () => {
      const { service } = setup();
      const started = await service.start(USER, "repeated");

      expect(service.progress(started, repeated).groupRepeatInfo).toBe("repeat 1 of 2");
      const secondRepeat = await advanceTimes(service, started, repeated, 2);
      expect(service.progress(secondRepeat, repeated).groupRepeatInfo).toBe("repeat 2 of 2");

      const done = await advanceTimes(service, secondRepeat, repeated, 2);
      expect(done.status).toBe("completed");
    });
  });

  describe("navigation", () => {
    it("reaches completion after exactly as many advances as stitches", async () => {
      const { service } = setup();
      const started = await service.start(USER, "nested");
      const total = service.progress(started, nested).totalStitches;
      expect(total).toBe(13);

      const beforeLast = await advanceTimes(service, started, nested, total - 1);
      expect(beforeLast.status).toBe("active");

      const last = await service.advance(beforeLast, nested);
      expect(last.completed).toBe(true);
      expect(last.session.position).toEqual(beforeLast.position);
      expect(service.progress(last.session, nested).completedStitches).toBe(13);
      expect(service.progress(last.session, nested).percentage).toBe(100);

      await expect(service.advance(last.session, nested)).rejects.toThrow(InvalidInputError);
      await expect(service.retreat(last.session, nested)).rejects.toThrow(InvalidInputError);
    });

    it("leaves a fresh session where it is on retreat", async () => {
      const { service } = setup();
      const started = await service.start(USER, "nested");

      const once = await service.retreat(started, nested);
      const twice = await service.retreat(once, nested);

      expect(twice.position).toEqual(started.position);
      expect(twice.status).toBe("active");
    });

    it("rejects navigation while paused", async () => {
      const { service } = setup();
      const paused = await service.pause(await service.start(USER, "nested"));

      await expect(service.advance(paused, nested)).rejects.toThrow(
        `Cannot advance session ${paused.id}: session is paused`,
      );
      await expect(service.retreat(paused, nested)).rejects.toThrow(InvalidInputError);
    });
  });

  describe("pause and resume", () => {
    it("preserves position and progress", async () => {
      const { service } = setup();
      const moved = await advanceTimes(service, await service.start(USER, "nested"), nested, 5);
      const before = service.progress(moved, nested);

      const paused = await service.pause(moved);
      expect(paused.status).toBe("paused");
      const resumed = await service.resume(paused);

      expect(resumed.status).toBe("active");
      expect(resumed.position).toEqual(moved.position);
      const after = service.progress(resumed, nested);
      expect(after.completedStitches).toBe(before.completedStitches);
      expect(after.percentage).toBe(before.percentage);
    });

    it("rejects transitions from the wrong state", async () => {
      const { service } = setup();
      const started = await service.start(USER, "single");
      const paused = await service.pause(started);

      await expect(service.resume(started)).rejects.toThrow(InvalidInputError);
      await expect(service.pause(paused)).rejects.toThrow(InvalidInputError);
    });
  });

  describe("concurrent updates", () => {
    it("rejects a write based on a stale version", async () => {
      const { service, store } = setup();
      const started = await service.start(USER, "nested");

      const winner = await service.advance(started, nested);
      expect(winner.session.version).toBe(1);

      await expect(service.advance(started, nested)).rejects.toThrow(ConflictError);
      expect(store.docs.get(started.id)?.position).toEqual(winner.session.position);
      expect(store.docs.get(started.id)?.version).toBe(1);
    });
  });

  describe("abandon", () => {
    it("deletes the session, then reports it missing", async () => {
      const { service, store } = setup();
      const started = await service.start(USER, "single");

      await service.abandon(started.id);
      expect(store.docs.size).toBe(0);
      await expect(service.abandon(started.id)).rejects.toThrow(NotFoundError);
      await expect(service.getById(started.id)).rejects.toThrow(NotFoundError);
    });

    it("deletes completed and paused sessions alike", async () => {
      const { service } = setup();
      const done = await advanceTimes(service, await service.start(USER, "single"), single, 3);
      const paused = await service.pause(await service.start(USER, "single"));

      await service.abandon(done.id);
      await service.abandon(paused.id);
      expect(await service.listActiveByUser(USER)).toEqual([]);
    });
  });

  describe("loadForUser", () => {
    it("returns the session with its pattern", async () => {
      const { service } = setup();
      const started = await service.start(USER, "single");

      const loaded = await service.loadForUser(USER, started.id);
      expect(loaded.session).toEqual(started);
      expect(loaded.pattern.id).toBe("single");
    });

    it("rejects someone else's session", async () => {
      const { service } = setup();
      const started = await service.start(USER, "single");

      await expect(service.loadForUser("intruder", started.id)).rejects.toThrow(UnauthorizedError);
    });
  });

  describe("listing", () => {
    it("separates in-progress and completed sessions", async () => {
      const { service } = setup();
      const active = await service.start(USER, "nested");
      const paused = await service.pause(await service.start(USER, "two-groups"));
      const done = await advanceTimes(service, await service.start(USER, "single"), single, 3);

      const inProgress = await service.listActiveByUser(USER);
      expect(inProgress.map((s) => s.id)).toEqual([paused.id, active.id]);

      expect(await service.countCompletedByUser(USER)).toBe(1);
      expect((await service.listCompletedByUser(USER, 10, 0)).map((s) => s.id)).toEqual([done.id]);
      expect(await service.listCompletedByUser(USER, 10, 1)).toEqual([]);
      expect(await service.listActiveByUser("someone-else")).toEqual([]);
    });
  });
});
