import { afterEach, describe, expect, it, vi } from "vitest";
import { StoreError } from "../src/errors";
import { RoomStore } from "../src/room-store";
import { InMemoryStore } from "../src/storage";
import { hashText } from "../src/utils";
import { codeSequence } from "./helpers";

describe("RoomStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates rooms with codes unique within the store", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store);

    const codes = new Set<string>();
    for (let i = 0; i < 40; i++) {
      codes.add(await rooms.createRoom(`Room ${i}`, "pw", "owner"));
    }

    expect(codes.size).toBe(40);
    for (const code of codes) {
      expect(code).toMatch(/^\d{4}$/);
    }
  });

  it("retries generation when a code is already taken", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { generateCode: codeSequence("1111", "1111", "2222") });

    expect(await rooms.createRoom("First", "pw", "A")).toBe("1111");
    expect(await rooms.createRoom("Second", "pw", "A")).toBe("2222");
  });

  it("fails with StoreError once every code attempt collides", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { maxCodeAttempts: 3, generateCode: () => "1111" });
    await rooms.createRoom("First", "pw", "A");

    await expect(rooms.createRoom("Second", "pw", "A")).rejects.toBeInstanceOf(StoreError);
    expect(store.rooms.size).toBe(1);
  });

  it("stores only the password digest and makes the owner the first member", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { generateCode: codeSequence("4821") });

    const code = await rooms.createRoom("Trip", "pw1", "A");

    expect(store.rooms.get(code)?.passwordHash).toBe(hashText("pw1"));
    expect(await rooms.listMembers(code)).toEqual(["A"]);
    expect(store.users.has("A")).toBe(true);
  });

  it("joins idempotently and lists the joined room", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { generateCode: codeSequence("4821") });
    const code = await rooms.createRoom("Trip", "pw1", "A");

    const first = await rooms.joinRoom(code, "pw1", "B");
    const second = await rooms.joinRoom(code, "pw1", "B");

    expect(first).toEqual({ ok: true, room: { roomCode: "4821", roomName: "Trip" }, alreadyMember: false });
    expect(second).toEqual({ ok: true, room: { roomCode: "4821", roomName: "Trip" }, alreadyMember: true });
    expect(await rooms.listUserRooms("B")).toEqual([{ roomCode: "4821", roomName: "Trip" }]);
    expect(await rooms.listMembers(code)).toEqual(["A", "B"]);
  });

  it("reports unknown codes and wrong passwords without adding members", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { generateCode: codeSequence("4821") });
    await rooms.createRoom("Trip", "pw1", "A");

    expect(await rooms.joinRoom("9999", "pw1", "B")).toEqual({ ok: false, reason: "not_found" });
    expect(await rooms.joinRoom("4821", "nope", "B")).toEqual({ ok: false, reason: "wrong_password" });
    expect(await rooms.listMembers("4821")).toEqual(["A"]);
  });

  it("refuses to leave a room the user never joined", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { generateCode: codeSequence("4821") });
    await rooms.createRoom("Trip", "pw1", "A");
    const before = [...store.memberships.keys()];

    expect(await rooms.leaveRoom("4821", "B")).toEqual({ ok: false, reason: "not_a_member" });
    expect(await rooms.leaveRoom("9999", "A")).toEqual({ ok: false, reason: "not_found" });
    expect([...store.memberships.keys()]).toEqual(before);
  });

  it("leaves a joined room", async () => {
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { generateCode: codeSequence("4821") });
    await rooms.createRoom("Trip", "pw1", "A");
    await rooms.joinRoom("4821", "pw1", "B");

    expect(await rooms.leaveRoom("4821", "B")).toEqual({ ok: true, room: { roomCode: "4821", roomName: "Trip" } });
    expect(await rooms.listUserRooms("B")).toEqual([]);
    expect(await rooms.listMembers("4821")).toEqual(["A"]);
  });

  it("lists rooms most recently joined first", async () => {
    vi.useFakeTimers();
    const store = new InMemoryStore();
    const rooms = new RoomStore(store, { generateCode: codeSequence("1111", "2222", "3333") });

    vi.setSystemTime(new Date(2026, 9, 18, 9, 0));
    await rooms.createRoom("Home", "pw", "A");
    vi.setSystemTime(new Date(2026, 9, 18, 9, 5));
    await rooms.createRoom("Work", "pw", "B");
    vi.setSystemTime(new Date(2026, 9, 18, 9, 10));
    await rooms.createRoom("Club", "pw", "A");
    vi.setSystemTime(new Date(2026, 9, 18, 9, 15));
    await rooms.joinRoom("2222", "pw", "A");

    expect((await rooms.listUserRooms("A")).map((room) => room.roomCode)).toEqual(["2222", "3333", "1111"]);
    expect(await rooms.getRoomName("3333")).toBe("Club");
    expect(await rooms.getRoomName("0000")).toBeUndefined();
  });
});
