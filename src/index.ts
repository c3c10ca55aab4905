export {
  generateSource,
  generateFile,
  generateFiles,
  BindingBuild,
  type GenerateOptions,
  type GenerateResult,
  type FileGenerateOptions,
  type FileJob,
} from './generate.js';

export { parseRustSource, parseRustFile, DEFAULT_MARKER } from './parser/index.js';
export type { SourceItem, TypeExpr, ParsedSource } from './parser/parserTypes.js';

export { classifyType } from './oracle/classifyType.js';
export type { TypeDescriptor, PrimitiveKind, TypePosition } from './oracle/oracleTypes.js';

export { classifyDeclaration } from './classify/classifyDeclaration.js';
export { classifyMethod } from './classify/classifyMethod.js';
export { RETURN_RULES, resolveReturn } from './classify/returnRules.js';
export type { Decl, MethodRole } from './classify/declTypes.js';

export { emitDeclaration, SymbolRegistry } from './emit/index.js';
export type { EmittedItem, GeneratedArtifact } from './emit/emitTypes.js';

export {
  renderItems,
  renderHostModule,
  modeFromTarget,
  C_ABI_ONLY,
} from './target/emissionController.js';
export type { EmissionMode, EmissionTarget } from './target/targetTypes.js';

export { buildManifest, formatBindingSignature } from './manifest/buildManifest.js';
export type { BindingManifest } from './manifest/manifestTypes.js';

export { BindingDiagnosticsError, type Diagnostic } from './diagnostics/diagnostics.js';
export { loadOptionalConfig, type AbiforgeConfig } from './dx/config.js';
export { setDebugEnabled } from './dx/logger.js';
