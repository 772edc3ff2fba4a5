// src/index.ts — Library API
// Everything the CLI does can be driven from here without a terminal.

export const DECKSPEC_VERSION = "0.1.0";

export type {
  Warning,
  ResolvedConfig,
  SemanticVersion,
  VersionBump,
  Section,
  MarkdownLink,
  DocumentMetadata,
  SourceMode,
  PitchDeck,
  SectionId,
  StrategicName,
  ExtractionMethod,
  PrincipleSignal,
  Principle,
  FeaturePriority,
  DetectedFeature,
  RelationshipType,
  EntityRelationship,
  ExtractedEntity,
  SuccessCriterion,
  ConstitutionKind,
  LinkType,
  TraceabilityLink,
  LinkState,
  LinkValidationResult,
  Constitution,
  ConflictRecord,
  VersionMismatch,
  OrphanedPrinciple,
  QuestionPriority,
  ClarificationQuestion,
  ClarificationAnswer,
  ChecklistItem,
  Checklist,
  IssueCategory,
  ValidationError,
  ValidationWarning,
  ValidationInfo,
  AnalysisIssue,
  AnalysisReport,
  DecompositionMode,
  DecompositionError,
  DecompositionResult,
} from "./types.js";
export { StructuralError, InstallationError, UserCancelledError, EXIT_OK, EXIT_FAILURE, EXIT_CANCELLED } from "./types.js";

// Documents
export { slugify, extractSections, extractLinks, buildHeadingIndex } from "./markdown-parser.js";
export { INITIAL_VERSION, parseVersion, formatVersion, compareVersions, bumpVersion } from "./version-tracker.js";
export { readVersionFromFile, writeVersionToFile } from "./frontmatter.js";
export { SEQUOIA_SECTIONS, SECTION_IDS, STRATEGIC_NAMES, STRATEGIC_SOURCES } from "./sequoia.js";
export {
  parsePitchDeck,
  parsePitchDeckContent,
  loadSequoiaDeck,
  validatePitchDeck,
  applyClarification,
  savePitchDeck,
  serializePitchDeck,
} from "./pitch-deck.js";

// Extraction and generation
export { extractPrinciples, extractBulletPrinciples } from "./extractors/principle-extractor.js";
export { detectFeatures } from "./extractors/feature-detector.js";
export { extractEntities } from "./extractors/entity-extractor.js";
export { generateSuccessCriteria } from "./extractors/success-criteria.js";
export { markdownRenderer } from "./templates/constitution.js";
export type { ConstitutionRenderer, StrategicDocument, FeatureDocument } from "./templates/constitution.js";
export { generateConstitutions, isSuccess } from "./constitution-generator.js";
export { decompose, extractionConfidence, pdfToMarkdown } from "./decomposition.js";
export type { DecomposeOptions, PdfSection, PdfTextExtractor } from "./decomposition.js";

// Validation
export { parseConstitution, parseConstitutionContent, loadConstitutions } from "./constitution.js";
export { validateLink, validateLinks } from "./traceability.js";
export {
  detectConflicts,
  checkCoverage,
  validateVersionConsistency,
  detectCircularDependencies,
  getOrphanedPrinciples,
} from "./consistency-checker.js";
export { runAnalysis, fixVersionMismatches } from "./analyzer.js";
export { buildAnalysisReport, renderAnalysisReport, saveAnalysisReport } from "./analysis-report.js";

// Clarification and checklists
export { detectVagueSections, generateQuestions, prioritizeQuestions } from "./ambiguity-detector.js";
export { runClarificationSession, renderClarificationLog } from "./clarification.js";
export { buildChecklist, calculateCompletion, renderChecklist, parseChecklistContent } from "./checklist.js";

// Workspace and plumbing
export { workspacePaths, DEFAULT_SPEC_DIR } from "./workspace.js";
export type { WorkspacePaths } from "./workspace.js";
export { installWorkspace, checkWorkspace, RollbackJournal } from "./installer.js";
export { resolveConfig, parseCliArgs } from "./config.js";
export { createStreamSink, createBufferedSink } from "./output.js";
export type { OutputSink } from "./output.js";
export { createReadlinePrompter, createScriptedPrompter } from "./prompter.js";
export type { Prompter } from "./prompter.js";
