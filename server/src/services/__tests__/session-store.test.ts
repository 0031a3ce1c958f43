import { describe, it, expect } from "vitest";
import { SessionStore } from "../session-store";
import { SessionNotFoundError } from "../errors";
import { addBlankEntry } from "../ledger";

const clock = (start: number) => {
  let now = start;
  return {
    now: () => new Date(now),
    advance: (ms: number) => {
      now += ms;
    },
  };
};

describe("SessionStore", () => {
  it("creates sessions with an empty ledger", () => {
    const store = new SessionStore({ ttlMs: 60_000 });
    const session = store.create();

    expect(session.ledger).toEqual([]);
    expect(store.get(session.id)).toBe(session);
  });

  it("keeps sessions independent", () => {
    const store = new SessionStore({ ttlMs: 60_000 });
    const a = store.create();
    const b = store.create();

    store.update(a.id, addBlankEntry(a.ledger).ledger);

    expect(store.get(a.id).ledger).toHaveLength(1);
    expect(store.get(b.id).ledger).toHaveLength(0);
  });

  it("discards sessions", () => {
    const store = new SessionStore({ ttlMs: 60_000 });
    const session = store.create();
    store.discard(session.id);

    expect(() => store.get(session.id)).toThrow(SessionNotFoundError);
    expect(() => store.discard(session.id)).toThrow(SessionNotFoundError);
  });

  it("expires sessions idle for longer than the ttl", () => {
    const time = clock(Date.UTC(2024, 0, 1));
    const store = new SessionStore({ ttlMs: 1000, now: time.now });
    const idle = store.create();
    const active = store.create();

    time.advance(800);
    store.get(active.id);
    time.advance(800);

    expect(store.get(active.id).id).toBe(active.id);
    expect(() => store.get(idle.id)).toThrow(SessionNotFoundError);
    expect(store.size).toBe(1);
  });
});
