export { main, parseCliArgs, resolveSettings, usage } from "./cli.js";
export type { CliOptions, EffectiveSettings, MainIo, ParseResult } from "./cli.js";
export { loadConfig, validateConfig } from "./config/loadConfig.js";
export type { ConfdeltaConfig } from "./config/types.js";
export { diff } from "./diff/diff.js";
export { numbersEqual } from "./diff/numbers.js";
export { formatPath } from "./diff/path.js";
export type {
  AddedChange,
  Change,
  ChangeKind,
  DiffOptions,
  KeyOrder,
  Path,
  PathSegment,
  RemovedChange,
  TypeChange,
  ValueChange
} from "./diff/types.js";
export { loadDocumentFile, parseDocumentText } from "./load/loadDocument.js";
export type { LoadDocumentOptions, LoadedDocument, ParseDocumentOptions } from "./load/loadDocument.js";
export { formatJsonReport } from "./reporting/formatJson.js";
export { formatChangeLine, formatTextReport } from "./reporting/formatText.js";
export type { TextFormatOptions } from "./reporting/formatText.js";
export { formatYamlReport } from "./reporting/formatYaml.js";
export type { SerializedChange, SerializedReport } from "./reporting/serialize.js";
export type { DiffReport, OutputFormat, ReportSide } from "./reporting/types.js";
export { ConfigError, LoadError, NotFoundError, ParseError, UsageError } from "./util/errors.js";
export { fromPlain } from "./value/fromPlain.js";
export { DEFAULT_MAX_ALIAS_NODES } from "./value/fromYaml.js";
export { renderValue } from "./value/render.js";
export { toPlain } from "./value/toPlain.js";
export type { PlainValue } from "./value/toPlain.js";
export type {
  BooleanValue,
  MappingValue,
  NullValue,
  NumberValue,
  ScalarValue,
  SequenceValue,
  SourceLocation,
  StringValue,
  Value,
  ValueCategory,
  ValueKind
} from "./value/types.js";
