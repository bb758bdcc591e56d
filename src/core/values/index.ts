export { Vector2, Vector3, Transform, Color3 } from "./values";
export { EnumDomain, EnumItem, MAX_ENUM_ITEMS } from "./enum";
