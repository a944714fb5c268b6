export {
  block,
  bool,
  defineResourceSchema,
  dynamic,
  list,
  map,
  number,
  scalar,
  set,
  string
} from './schema/define';
export type * from './schema/types';
export { lookupSchema, lookupSchemaChain } from './schema/lookup';

export type * from './value/types';
export {
  listValue,
  mapValue,
  markSecret,
  nullValue,
  objectValue,
  scalarValue,
  setValue,
  unknownValue
} from './value/builders';
export { hashValue } from './value/hash';
export { containsSecret, containsUnknown, valuesEqual } from './value/inspect';
export {
  decodeResource,
  decodeValue,
  encodeResource,
  encodeValue,
  type EncodeOptions
} from './value/codec';
export {
  SECRET_SIGNATURE_KEY,
  SECRET_SIGNATURE_VALUE,
  UNKNOWN_SENTINEL,
  isSecretSentinel,
  wrapSecret
} from './value/sentinels';

export {
  formatPropertyPath,
  parsePropertyPath,
  type PropertyPath,
  type PropertyPathSegment
} from './path/property-path';

export { diffResource, diffValues } from './differ';
export type * from './differ/types';
export { applyIgnoreChanges } from './differ/ignore-changes';

export { propagateInputSecrets, propagateOutputSecrets } from './secrets/outputs';

export {
  propertyDiffKind,
  toDetailedDiff,
  toDiffResponse,
  type DetailedDiff,
  type DiffResponse,
  type PropertyDiff,
  type PropertyDiffKind
} from './render/wire';
export {
  formatValue,
  previewOperation,
  previewResourceDiff,
  renderPreview,
  type PreviewOperation,
  type PreviewOptions,
  type ResourcePreview
} from './render/preview';

export {
  checkResource,
  type CheckFailure,
  type CheckFailureReason,
  type CheckResult
} from './check/check';

export { ResourceBridge, type ResourceBridgeOptions } from './bridge/resource-bridge';
export type * from './bridge/types';

export { loadConfig, type BridgeConfig, type LogLevel } from './config';
export { createLogger, type Logger, type LoggerOptions } from './logger';
export * from './errors';
