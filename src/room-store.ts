import { ROOM_CODE_LENGTH } from "./constants";
import { StoreError } from "./errors";
import { debug, info } from "./logger";
import type { DataStore } from "./storage";
import type { JoinRoomResult, LeaveRoomResult, RoomSummary } from "./types";
import { digestsMatch, hashText, randomDigits } from "./utils";

export interface RoomStoreOptions {
  /** Upper bound on code generation retries before giving up. */
  maxCodeAttempts?: number;
  generateCode?: () => string;
}

const DEFAULT_MAX_CODE_ATTEMPTS = 50;

/**
 * Rooms, memberships and password checks. Passwords are only ever compared as
 * SHA-256 digests.
 */
export class RoomStore {
  private readonly maxCodeAttempts: number;
  private readonly generateCode: () => string;

  constructor(private readonly store: DataStore, options: RoomStoreOptions = {}) {
    this.maxCodeAttempts = options.maxCodeAttempts ?? DEFAULT_MAX_CODE_ATTEMPTS;
    this.generateCode = options.generateCode ?? (() => randomDigits(ROOM_CODE_LENGTH));
  }

  async createRoom(name: string, password: string, ownerId: string): Promise<string> {
    await this.store.ensureUser(ownerId);
    const passwordHash = hashText(password);

    for (let attempt = 1; attempt <= this.maxCodeAttempts; attempt++) {
      const roomCode = this.generateCode();
      if (await this.store.getRoom(roomCode)) {
        debug("rooms", "code_collision", { attempt });
        continue;
      }
      // A concurrent creator can still take the code between the check and the insert.
      const created = await this.store.createRoomWithOwner({
        roomCode,
        roomName: name,
        passwordHash,
        ownerId,
        createdAt: new Date().toISOString(),
      });
      if (created) {
        info("rooms", "room_created", { roomCode, ownerId, attempts: attempt });
        return roomCode;
      }
    }

    throw new StoreError("create_room", `no free room code after ${this.maxCodeAttempts} attempts`);
  }

  async joinRoom(roomCode: string, password: string, userId: string): Promise<JoinRoomResult> {
    const room = await this.store.getRoom(roomCode);
    if (!room) {
      return { ok: false, reason: "not_found" };
    }
    if (!digestsMatch(hashText(password), room.passwordHash)) {
      info("rooms", "join_wrong_password", { roomCode, userId });
      return { ok: false, reason: "wrong_password" };
    }

    await this.store.ensureUser(userId);
    const inserted = await this.store.addMember(roomCode, userId, new Date().toISOString());
    info("rooms", "room_joined", { roomCode, userId, alreadyMember: !inserted });
    return {
      ok: true,
      room: { roomCode: room.roomCode, roomName: room.roomName },
      alreadyMember: !inserted,
    };
  }

  async leaveRoom(roomCode: string, userId: string): Promise<LeaveRoomResult> {
    const room = await this.store.getRoom(roomCode);
    if (!room) {
      return { ok: false, reason: "not_found" };
    }
    const removed = await this.store.removeMember(roomCode, userId);
    if (!removed) {
      return { ok: false, reason: "not_a_member" };
    }
    info("rooms", "room_left", { roomCode, userId });
    return { ok: true, room: { roomCode: room.roomCode, roomName: room.roomName } };
  }

  async getRoomName(roomCode: string): Promise<string | undefined> {
    const room = await this.store.getRoom(roomCode);
    return room?.roomName;
  }

  listUserRooms(userId: string): Promise<RoomSummary[]> {
    return this.store.listRoomsForUser(userId);
  }

  listMembers(roomCode: string): Promise<string[]> {
    return this.store.listMembers(roomCode);
  }
}
