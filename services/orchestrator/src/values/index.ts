export {
  Value,
  ValueKind,
  FrozenMutationError,
  type AnyValue,
  type BindContext,
  type BindResult,
  type ReadonlyValue,
} from "./Value.js";
export { BooleanValue } from "./BooleanValue.js";
export { IntegerValue, FloatValue } from "./NumericValues.js";
export { StringValue } from "./StringValue.js";
export { EnumValue } from "./EnumValue.js";
export { ObjectValue, isObjectValue, type ReadonlyObjectValue } from "./ObjectValue.js";
export { ListValue, isListValue, type ListValueOptions, type ReadonlyListValue } from "./ListValue.js";
export { toBool, toFloat, toInteger } from "./converters.js";
