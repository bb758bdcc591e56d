export type {
  DynamicValue,
  DynamicMap,
  DynamicObject,
  DynamicContext,
  Classified,
} from "./dynamic-codec";
export {
  TypeTag,
  MAX_DYNAMIC_COUNT,
  classify,
  classifyNumber,
  measureDynamic,
  writeDynamic,
  readDynamic,
} from "./dynamic-codec";
