// ── Expressions ─────────────────────────────────────────────────
export {
  type Literal,
  type LiteralKind,
  type IntegerLiteral,
  type FloatLiteral,
  type BoolLiteral,
  type Expression,
  type BinaryOperator,
  type UnaryOperator,
  type Comparison,
  type VariableLookup,
  INT64_MIN,
  INT64_MAX,
  integer,
  float,
  bool,
  literalEquals,
  compareLiterals,
  isTruthy,
  formatLiteral,
  formatFloat,
  CharCursor,
  parseExpression,
  evaluateExpression,
} from "./expression/mod.ts";

// ── Segments ────────────────────────────────────────────────────
export {
  type Segment,
  type IncludeSegment,
  type ConditionalSegment,
  type SequenceSegment,
  type ConstantSegment,
  type TextSegment,
  type ReadonlySegment,
  type SegmentEndReason,
  type ParsedSegment,
  type IncludeResolver,
  type WriteContext,
  LineCursor,
  parseSegment,
  parseShaderSource,
  concatSegment,
  canConcatFast,
  text,
  sequence,
  writeSegment,
  renderSegment,
} from "./segment/mod.ts";

// ── Workspace ───────────────────────────────────────────────────
export {
  Environment,
  type EnvironmentTier,
  Shader,
  Workspace,
  normalizeShaderPath,
  loadWorkspace,
  DEFAULT_SHADER_EXTENSIONS,
  type LoadWorkspaceOptions,
} from "./workspace/mod.ts";

// ── Settings ────────────────────────────────────────────────────
export {
  parseSettingsJson,
  convertSettingValue,
  settingsToLiterals,
  mergeSettings,
  applySettings,
  parseDefine,
  loadSettingsFile,
  SettingsError,
  type SettingValue,
  type RawSettings,
  type SettingsLiterals,
} from "./settings.ts";

// ── Type Aliases ────────────────────────────────────────────────
export {
  type VariableName,
  type ShaderPath,
  type ShaderSource,
  type ShaderLine,
  DIRECTIVE_MARKER,
} from "./types.ts";

// ── Errors ──────────────────────────────────────────────────────
export {
  ShaderDirectiveError,
  ParseError,
  UnknownOperationError,
  InvalidIfBlockError,
  NoExpressionError,
  NoClosingParenthesisError,
  DuplicatePeriodError,
  InvalidBaseError,
  NumberFormatError,
  LeftoverCharsError,
  LeftoverLinesError,
  EvaluationError,
  UndefinedVariableError,
  InvalidExpressionError,
  WorkspaceError,
  ShaderNotFoundError,
  CircularIncludeError,
} from "./errors.ts";
