export * from './types';
export * from './errors';
export { extractErrorMessage, describeError, parseJsonObject } from './utils';

export * from './llm';

export { FileToolStore, toolMetadataSchema } from './store/toolStore';
export type { DependencyManifest } from './store/toolStore';

export { extractCode } from './synthesis/codeExtractor';
export { generateSpecification, PLACEHOLDER_CONTENT } from './synthesis/specGenerator';
export { synthesizeCode } from './synthesis/codeSynthesizer';
export type { SynthesisResult } from './synthesis/codeSynthesizer';
export { scanDependencies, writeDependencyManifest } from './synthesis/dependencyManifest';

export { loadModule, invokeInContext } from './debug/sandbox';
export type { LoadedModule } from './debug/sandbox';
export { introspectModule, mapDeclaredType } from './debug/introspector';
export { KNOWN_ANSWER_RULES } from './debug/knownAnswerRules';
export type { KnownAnswerRule } from './debug/knownAnswerRules';
export { synthesizeTestCases } from './debug/testCaseSynthesizer';
export { runFunctionTests } from './debug/executionHarness';
export { buildFailureDigest, synthesizeFix } from './debug/fixSynthesizer';
export { DebugLoopController } from './debug/debugController';

export { parseCatalog, formatCatalog } from './invocation/catalogParser';
export { selectFunction } from './invocation/functionSelector';
export {
  extractArguments,
  PatternArgumentStage,
  GatewayArgumentStage,
} from './invocation/argumentExtractor';
export { runTool, formatRunToolResult, loadCatalog } from './invocation/toolRunner';

export { matchesQuery } from './library/types';
export type { ToolLibrary, LibraryOperationResult } from './library/types';
export { generateMetadata, autoTagTool } from './library/metadata';
export { findAndInstallTool, installToolByName } from './library/installer';
export type { InstallOutcome } from './library/installer';

export { ToolListingCache } from './listing/toolListingCache';
export type { ToolListing, Clock } from './listing/toolListingCache';

export { detectIntent, handleIntent, INTENT_TYPES } from './intent/intentRouter';
export type { DetectedIntent, IntentDetection, IntentOutcome, IntentType } from './intent/intentRouter';

export { ToolService } from './toolService';
export type { DebugToolOptions, ToolServiceDeps } from './toolService';
