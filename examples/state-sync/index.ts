import {
  HEADER_SIZE,
  MESSAGE_CHAT,
  PlayerState,
  chatSerializer,
  decodeMessage,
  encodeSnapshot,
  examplePlayer,
} from "./shared";

const snapshot = encodeSnapshot(42, [examplePlayer(1), examplePlayer(2)]);
console.log(`snapshot: ${snapshot.length} bytes -> ${decodeMessage(snapshot)}`);

const chat = chatSerializer.serialize(["gg", 3, PlayerState.get("Dead")], HEADER_SIZE);
chat[0] = MESSAGE_CHAT;
console.log(`chat: ${chat.length} bytes -> ${decodeMessage(chat)}`);
