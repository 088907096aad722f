// @corral/core entry point
//
// validate()/validateOrThrow() are the usual entry points; rule sets are
// built with objectMap()/object() and the leaf factories below.

export * from './api.js';

// Errors
export {
  ErrorCode,
  KIND_BY_CODE,
  HTTP_STATUS_BY_CODE,
  getErrorKind,
  getHttpStatus,
  isInternalCode,
  type ErrorKind,
  type Severity,
} from './errors/codes.js';
export {
  ValidationError,
  ValidationErrorCollection,
  createError,
  isContextError,
  type PathSource,
  type ValidationErrorJSON,
} from './errors/validation-error.js';
export {
  ErrorPresenter,
  type APIErrorView,
  type APIFieldError,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';
export {
  CorralError,
  ConfigError,
  SchemaDefinitionError,
  ValidationFailedError,
  isCorralError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export { Ok, Err, ok, err, isOk, isErr, type Result } from './types/result.js';
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateOptions,
  type ResolvedValidateOptions,
  type ValidateOptions,
} from './types/options.js';

// Context
export {
  PATH_SERIALIZERS,
  defaultPath,
  dotNotation,
  jsonPath,
  jsonPointer,
  type PathFormat,
  type PathSegment,
  type PathSerializer,
} from './context/path.js';
export { RuleContext, type AbortKind } from './context/rule-context.js';

// Rules
export {
  KindedRule,
  flagRule,
  ruleFunc,
  type Awaitable,
  type Rule,
  type RuleFn,
  type RuleResult,
} from './rules/rule.js';
export {
  ConstraintNode,
  chainRules,
  describeChain,
  evaluateChain,
  pruneConflicts,
  withRule,
} from './rules/chain.js';
export {
  ChainedRuleSet,
  typeMismatch,
  type ChainParts,
  type Coerced,
  type Conditional,
  type OutputRef,
  type RuleSet,
} from './rules/rule-set.js';
export { ConstantRuleSet, constant, type ConstantValue } from './rules/constant.js';
export { AnyRuleSet, any } from './rules/any.js';
export { StringRuleSet, strings } from './rules/strings.js';
export { NumberRuleSet, integers, numbers } from './rules/numbers.js';
export { ArrayRuleSet, arrays } from './rules/arrays.js';
export { JsonSchemaRule, jsonSchema } from './rules/json-schema.js';

// Objects
export {
  ObjectRuleSet,
  object,
  objectMap,
  type ObjectOptions,
} from './objects/object-rule-set.js';
export { RefTracker, constantKey } from './objects/ref-tracker.js';
export { KnownKeys } from './objects/known-keys.js';
export { CounterSet, FieldCounter } from './objects/counter.js';
export { MapSetter, RecordSetter, type Setter } from './objects/setter.js';
export {
  accessInput,
  decodeJsonObject,
  isPlainObject,
  nonStringKeyType,
  type InputAccessor,
  type InputShape,
} from './objects/input.js';

// Observability
export {
  MetricsCollector,
  METRIC_COUNTERS,
  METRIC_PHASES,
  type MetricCounter,
  type MetricPhase,
  type MetricsSnapshot,
  type MetricsVerbosity,
} from './util/metrics.js';
export {
  createDebugSink,
  silentSink,
  type DebugEvent,
  type DebugSink,
  type DebugWriter,
} from './util/debug.js';
export { Mutex } from './util/mutex.js';
