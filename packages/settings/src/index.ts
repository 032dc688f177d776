export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { FileSource } from "./adapters/file/file-source"
export { IniSource } from "./adapters/ini/ini-source"
export { JsonSource } from "./adapters/json/json-source"
export {
  ModuleSource,
  type ModuleSourceDeps,
  type ModuleSourceOptions,
} from "./adapters/module/module-source"
export { ObjectSource, type ObjectSourceOptions } from "./adapters/object/object-source"
export { TomlSource } from "./adapters/toml/toml-source"
export { XmlSource, type XmlSourceOptions } from "./adapters/xml/xml-source"
export { YamlSource } from "./adapters/yaml/yaml-source"
export {
  type CreateSettingsOptions,
  createSettings,
  isSettingsSource,
  type LoadSettingsOptions,
  loadSettings,
  type SettingsClass,
  sourceForPath,
} from "./core/create"
export {
  AmbiguousSubsetRequestError,
  type ErrorContext,
  InvalidParserError,
  InvalidPolicyError,
  InvalidSectionValueError,
  isSettingsError,
  KeyNotFoundError,
  SectionNotFoundError,
  type SerializedSettingsError,
  SettingsError,
  type SettingsErrorCode,
  SourceNotFoundError,
  SourceParseError,
  SourceTypeError,
  serializeError,
  UnsupportedSourceError,
} from "./core/errors"
export { inferType, inferTypes } from "./core/infer"
export { matchTerm } from "./core/match"
export {
  type BoundViews,
  defineParser,
  Parser,
  type ParserBindings,
  type ParserTarget,
} from "./core/parser"
export { defaultPolicy, type LoadPolicyOptions, loadPolicy, type SettingsPolicy } from "./core/policy"
export { projectFirst, projectView } from "./core/project"
export {
  type DefaultsMap,
  hasBoundViews,
  type InjectOptions,
  Settings,
  type SettingsOptions,
  type SubsetOptions,
} from "./core/settings"
export type {
  FirstOf,
  MatchMode,
  MatchOptions,
  ParserOptions,
  TermMatch,
  ViewOf,
  ViewResult,
  ViewShape,
} from "./ports/parser"
export { matchModes, viewShapes } from "./ports/parser"
export type { Scalar, Section, SettingsContents, SettingValue } from "./ports/settings"
export type { FileSourceOptions, SettingsSource, SourceFormat } from "./ports/source"
export { sourceFormats } from "./ports/source"
