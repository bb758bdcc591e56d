import {
  Color3,
  DynamicSerializer,
  EnumDomain,
  Serializer,
  Types,
  Vector3,
} from "../../src";
import type { Infer } from "../../src";

export const PlayerState = new EnumDomain("PlayerState", ["Idle", "Running", "Dead"]);

const PlayerSnapshot = Types.Struct({
  id: Types.UInt16,
  position: Types.Vector3Float24,
  state: Types.Enum(PlayerState),
  color: Types.Color3,
  health: Types.UInt8,
  name: Types.Optional(Types.StringTiny),
});

export type PlayerSnapshot = Infer<typeof PlayerSnapshot>;

/** Header byte the transport writes into the reserved offset region */
export const HEADER_SIZE = 1;
export const MESSAGE_SNAPSHOT = 0x01;
export const MESSAGE_CHAT = 0x02;

/** Tick number, then every player */
export const snapshotSerializer = new Serializer(
  [Types.UInt32, Types.ArrayTiny(PlayerSnapshot)],
  { compressionLevel: 6 }
);

/** Free-form chat/debug payloads, no shared schema needed */
export const chatSerializer = new DynamicSerializer({ enums: [PlayerState] });

export function encodeSnapshot(tick: number, players: PlayerSnapshot[]): Uint8Array {
  const buf = snapshotSerializer.serialize([tick, players], HEADER_SIZE);
  buf[0] = MESSAGE_SNAPSHOT;
  return buf;
}

export function decodeMessage(buf: Uint8Array): string {
  switch (buf[0]) {
    case MESSAGE_SNAPSHOT: {
      const [tick, players] = snapshotSerializer.deserialize(buf, HEADER_SIZE);
      return `tick ${tick}: ${players.map((p) => `${p.id}@${p.state.name}`).join(", ")}`;
    }
    case MESSAGE_CHAT:
      return chatSerializer.deserialize(buf, HEADER_SIZE).map(String).join(" ");
    default:
      return `unknown message ${buf[0]}`;
  }
}

export function examplePlayer(id: number): PlayerSnapshot {
  return {
    id,
    position: new Vector3(id * 10.5, 0, -4.25),
    state: PlayerState.get("Running"),
    color: Color3.fromHex(0x33cc99),
    health: 100,
    name: `player-${id}`,
  };
}
