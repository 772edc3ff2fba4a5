// src/types.ts — Shared types for deckspec
// Records passed between the parser, extractors, generator and validator.

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface ResolvedConfig {
  projectDir: string;
  specDir: string;
  exclude: string[];
  maxQuestions: number;
  maxFeatures: number;
  verbose: boolean;
  quiet: boolean;
}

// ─── Versions ────────────────────────────────────────────────────────────────

export interface SemanticVersion {
  major: number;
  minor: number;
  patch: number;
}

export type VersionBump = "MAJOR" | "MINOR" | "PATCH";

// ─── Markdown ────────────────────────────────────────────────────────────────

/** A heading plus everything up to the next heading of any depth. Lines are 1-based. */
export interface Section {
  id: string;
  title: string;
  level: number;
  content: string;
  lineStart: number;
  lineEnd: number;
}

export interface MarkdownLink {
  text: string;
  url: string;
  line: number;
}

/** Frontmatter keys preserved on save. Anything else is dropped. */
export interface DocumentMetadata {
  created?: string;
  updated?: string;
  type?: string;
  source?: string;
}

// ─── Pitch Deck ──────────────────────────────────────────────────────────────

export type SourceMode = "interactive" | "from-file" | "from-pdf" | "manual";

export interface PitchDeck {
  path: string;
  version: SemanticVersion;
  sections: Section[];
  metadata: DocumentMetadata;
  lastModified: Date;
  sourceMode: SourceMode;
}

export type SectionId =
  | "company-purpose"
  | "problem"
  | "solution"
  | "why-now"
  | "market-potential"
  | "competition"
  | "product"
  | "business-model"
  | "team"
  | "financials";

export type StrategicName = "company" | "product" | "market" | "business";

// ─── Principles ──────────────────────────────────────────────────────────────

export type ExtractionMethod = "heuristic" | "manual" | "derived";

export type PrincipleSignal =
  | "value-prop"
  | "numeric-constraint"
  | "comparative"
  | "imperative"
  | "market-number"
  | "bullet";

export interface Principle {
  id: string;
  title: string;
  rule: string;
  sourceLink: string;
  rationale?: string;
  testCriteria?: string;
  confidence: number;
  method: ExtractionMethod;
  signal?: PrincipleSignal;
}

// ─── Features, Entities, Criteria ────────────────────────────────────────────

export type FeaturePriority = "P1" | "P2" | "P3";

export interface DetectedFeature {
  id: string;
  name: string;
  title: string;
  description: string;
  priority: FeaturePriority;
  sourceSectionId: string;
  confidence: number;
  keywords: string[];
}

export type RelationshipType = "has_many" | "belongs_to" | "has_one" | "many_to_many";

export interface EntityRelationship {
  type: RelationshipType;
  target: string;
  description?: string;
}

export interface ExtractedEntity {
  name: string;
  sourceLink: string;
  rationale: string;
  relationships: EntityRelationship[];
  attributes: string;
  constraints: string;
  states: string;
  confidence: number;
}

export type SuccessCriterion =
  | {
      kind: "derived";
      id: string;
      text: string;
      rationale: string;
      test: string;
      confidence: number;
    }
  | {
      kind: "placeholder";
      id: string;
      text: string;
      businessGoal: string;
      suggestedApproaches: string[];
    };

// ─── Constitutions & Traceability ────────────────────────────────────────────

export type ConstitutionKind = "strategic" | "feature";

export type LinkType =
  | "pitch-to-strategic"
  | "strategic-to-pitch"
  | "strategic-to-feature"
  | "strategic-to-strategic"
  | "feature-to-strategic"
  | "feature-to-pitch"
  | "feature-to-feature";

/** Directed edge between two documents. Paths are absolute. */
export interface TraceabilityLink {
  sourceFile: string;
  sourceLine: number;
  targetFile: string;
  targetSection?: string;
  type: LinkType;
  text: string;
}

export type LinkState = "valid" | "broken_file" | "broken_section" | "missing_source";

export type LinkValidationResult =
  | { state: "valid"; link: TraceabilityLink; message: string }
  | { state: "missing_source"; link: TraceabilityLink; message: string; suggestion: string }
  | { state: "broken_file"; link: TraceabilityLink; message: string; suggestion: string }
  | {
      state: "broken_section";
      link: TraceabilityLink;
      message: string;
      suggestion: string;
      availableSections: string[];
    };

export interface Constitution {
  path: string;
  kind: ConstitutionKind;
  name: string;
  version: SemanticVersion;
  principles: Principle[];
  upstreamLinks: TraceabilityLink[];
  downstreamLinks: TraceabilityLink[];
}

export interface ConflictRecord {
  constitution: string;
  principleId: string;
  description: string;
}

export interface VersionMismatch {
  constitution: string;
  constitutionVersion: string;
  deckVersion: string;
}

export interface OrphanedPrinciple {
  constitution: string;
  principleId: string;
}

// ─── Clarification ───────────────────────────────────────────────────────────

export type QuestionPriority = "HIGH" | "MEDIUM" | "LOW";

export interface ClarificationQuestion {
  id: string;
  text: string;
  sectionId: string;
  priority: QuestionPriority;
  suggestedAnswers: string[];
}

export interface ClarificationAnswer {
  questionId: string;
  sectionId: string;
  answer: string;
}

// ─── Checklists ──────────────────────────────────────────────────────────────

export interface ChecklistItem {
  id: string;
  description: string;
  checked: boolean;
  category: string;
}

export interface Checklist {
  name: string;
  constitutionFile: string;
  kind: ConstitutionKind;
  generated: string;
  items: ChecklistItem[];
}

// ─── Analysis ────────────────────────────────────────────────────────────────

export type IssueCategory =
  | "broken-link"
  | "conflict"
  | "coverage"
  | "version-mismatch"
  | "circular-dependency"
  | "orphan";

interface IssueFields {
  issueId: string;
  category: IssueCategory;
  message: string;
  filePath?: string;
  lineNumber?: number;
  suggestion?: string;
}

export type ValidationError = IssueFields & { severity: "error" };
export type ValidationWarning = IssueFields & { severity: "warning" };
export type ValidationInfo = IssueFields & { severity: "info" };
export type AnalysisIssue = ValidationError | ValidationWarning | ValidationInfo;

export interface AnalysisReport {
  generatedAt: Date;
  deckPath: string;
  deckVersion: string;
  constitutionCount: number;
  linkCount: number;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  infos: ValidationInfo[];
}

// ─── Decomposition ───────────────────────────────────────────────────────────

export type DecompositionMode =
  | { kind: "from-file"; path: string }
  | { kind: "from-pdf"; path: string }
  | { kind: "interactive" };

export interface DecompositionError {
  code: string;
  message: string;
  section?: string;
  suggestion?: string;
  recoverable: boolean;
}

export interface DecompositionResult {
  mode: DecompositionMode["kind"];
  dryRun: boolean;
  createdFiles: string[];
  strategicCount: number;
  featureCount: number;
  principleCount: number;
  linkCount: number;
  entityCount: number;
  derivedCriteriaCount: number;
  placeholderCriteriaCount: number;
  warnings: Warning[];
  errors: DecompositionError[];
}

// ─── Errors ──────────────────────────────────────────────────────────────────

/** Fatal document problem: missing frontmatter, bad version, missing sections. */
export class StructuralError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "StructuralError";
  }
}

export class InstallationError extends Error {
  constructor(
    message: string,
    public readonly rolledBack: string[] = [],
    cause?: Error,
  ) {
    super(message);
    this.name = "InstallationError";
    if (cause) this.cause = cause;
  }
}

export class UserCancelledError extends Error {
  constructor(message = "Cancelled by user") {
    super(message);
    this.name = "UserCancelledError";
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 2;
