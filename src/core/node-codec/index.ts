export type { CodecContext } from "./node-codec";
export { EMPTY_CONTEXT, fixedSizeOf, measureNode, writeNode, readNode } from "./node-codec";
