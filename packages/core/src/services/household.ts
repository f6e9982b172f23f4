import { eq } from "drizzle-orm";
import { ulid } from "ulid";
import { type DB, members, rooms } from "../db/index.js";
import type { Member, Room } from "../types.js";
import { ExitCode, HearthError } from "../types.js";
import { validateMemberName, validateRoomName } from "../validation.js";

export interface AddRoomInput {
  name: string;
  areaM2?: number | null;
  floor?: string | null;
  exposure?: string | null;
  floorType?: string | null;
}

export class HouseholdService {
  constructor(private db: DB) {}

  addRoom(input: AddRoomInput): Room {
    const name = validateRoomName(input.name);
    if (this.getRoomByName(name)) {
      throw new HearthError(`Room '${name}' already exists`, ExitCode.CONFLICT);
    }

    const id = ulid();
    this.db
      .insert(rooms)
      .values({
        id,
        name,
        areaM2: input.areaM2 ?? null,
        floor: input.floor ?? null,
        exposure: input.exposure ?? null,
        floorType: input.floorType ?? null,
        createdAt: new Date(),
      })
      .run();

    return this.requireRoom(id);
  }

  /**
   * Create the room, or return the existing one with the same name.
   */
  ensureRoom(name: string): { room: Room; created: boolean } {
    const existing = this.getRoomByName(validateRoomName(name));
    if (existing) return { room: existing, created: false };
    return { room: this.addRoom({ name }), created: true };
  }

  getRoom(id: string): Room | null {
    return this.db.select().from(rooms).where(eq(rooms.id, id)).get() ?? null;
  }

  getRoomByName(name: string): Room | null {
    return this.db.select().from(rooms).where(eq(rooms.name, name.trim())).get() ?? null;
  }

  /** Look a room up by id or by name. */
  resolveRoom(ref: string): Room {
    const room = this.getRoom(ref) ?? this.getRoomByName(ref);
    if (!room) {
      throw new HearthError(`Room '${ref}' not found`, ExitCode.NOT_FOUND);
    }
    return room;
  }

  listRooms(): Room[] {
    return this.db.select().from(rooms).orderBy(rooms.name).all();
  }

  deleteRoom(id: string): void {
    this.requireRoom(id);
    this.db.delete(rooms).where(eq(rooms.id, id)).run();
  }

  addMember(displayName: string): Member {
    const name = validateMemberName(displayName);
    if (this.findMemberByName(name)) {
      throw new HearthError(`Member '${name}' already exists`, ExitCode.CONFLICT);
    }

    const id = ulid();
    this.db.insert(members).values({ id, displayName: name, active: true, createdAt: new Date() }).run();

    const member = this.db.select().from(members).where(eq(members.id, id)).get();
    if (!member) {
      throw new HearthError(`Member '${name}' was not saved`, ExitCode.GENERAL_ERROR);
    }
    return member;
  }

  findMemberByName(displayName: string): Member | null {
    return (
      this.db
        .select()
        .from(members)
        .where(eq(members.displayName, displayName.trim()))
        .get() ?? null
    );
  }

  getMember(id: string): Member | null {
    return this.db.select().from(members).where(eq(members.id, id)).get() ?? null;
  }

  listMembers(): Member[] {
    return this.db.select().from(members).orderBy(members.displayName).all();
  }

  private requireRoom(id: string): Room {
    const room = this.getRoom(id);
    if (!room) {
      throw new HearthError(`Room '${id}' not found`, ExitCode.NOT_FOUND);
    }
    return room;
  }
}
