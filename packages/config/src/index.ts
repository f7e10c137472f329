export {
  CommandLineSource,
  type CommandLineSourceOptions,
} from "./adapters/command-line/command-line-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource, type ObjectSourceOptions } from "./adapters/object/object-source"
export { asString, type CoercionResult, runCoercion } from "./core/coercion"
export { type ConfigErrorCode, ConfigError, isConfigError } from "./core/errors"
export { type FileMode, fileType, type FileTypeOptions } from "./core/file-type"
export { type Accumulator, createAccumulator } from "./core/item/accumulator"
export { defineItem } from "./core/item/define-item"
export { batchFromMapping, type MappingValues, takesValue } from "./core/raw-batch"
export { ConfigResolver } from "./core/resolver"
export { ABSENT, isPresent, present, slotOf } from "./core/slot"
export { ValueStore } from "./core/value-store"
export {
  type AppendItemOptions,
  type AppendItemSpec,
  type Coercion,
  type ConstAction,
  type CountItemOptions,
  type CountItemSpec,
  type ItemAction,
  type ItemOptions,
  type ItemSpec,
  itemActions,
  type StoreConstItemOptions,
  type StoreConstItemSpec,
  type StoreFlagItemOptions,
  type StoreItemOptions,
  type StoreItemSpec,
} from "./ports/item"
export type { ConfigResolverOptions, GlobalDefaultPolicy, ResolverState } from "./ports/resolver"
export type { Absent, Present, Slot } from "./ports/slot"
export {
  type ConfigSource,
  PRESENT_WITHOUT_VALUE,
  type PresenceMarker,
  type RawValue,
  type RawValuesBatch,
  type SourceKind,
} from "./ports/source"
export type { IValueStore } from "./ports/value-store"
