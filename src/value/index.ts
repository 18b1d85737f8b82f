/**
 * Value module exports.
 */

export {
  ValueKind,
  addressValue,
  inspect,
  intValue,
  isTruthy,
  nativeValue,
} from "./value.js";
export type { AddressValue, IntValue, NativeValue, Value } from "./value.js";
