export {
  transform,
  safeTransform,
  transformMany,
  transformJson,
  TransformError,
  PathError,
  SpreadTypeMismatchError,
  SpreadLengthMismatchError,
  NoSpreadTargetError,
  TemplateSyntaxError,
  DepthExceededError,
  OptionsError,
  DocumentError,
  type TransformErrorKind,
  type TransformOptions,
  type TransformResult,
  type JsonValue
} from './src'
// Note: engine pieces (parseKey, resolvePath, render, zipObject) are exported from './src/transform'
