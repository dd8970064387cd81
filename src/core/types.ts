// ---------------------------------------------------------------------------
// Core types for the safe-tutor service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Supported ages ──────────────────────────────────────────────────────────

export const MIN_AGE = 2;
export const MAX_AGE = 18;

// ── Enums ───────────────────────────────────────────────────────────────────

/** Cells of the age partition, youngest first. */
export const AgeBand = {
  TODDLER: "toddler",
  PRESCHOOL: "preschool",
  EARLY_ELEMENTARY: "early_elementary",
  LATE_ELEMENTARY: "late_elementary",
  MIDDLE: "middle",
  HIGH: "high",
  ADULT: "adult",
} as const;
export type AgeBand = (typeof AgeBand)[keyof typeof AgeBand];

export const SafetyCategory = {
  SAFE: "safe",
  VIOLENCE: "violence",
  INAPPROPRIATE: "inappropriate",
  PERSONAL_INFO: "personal_info",
  DANGEROUS: "dangerous",
  SCARY: "scary",
  BULLYING: "bullying",
  MEDICAL: "medical",
  COMMERCIAL: "commercial",
  PROFANITY: "profanity",
  OFF_TOPIC: "off_topic",
} as const;
export type SafetyCategory =
  (typeof SafetyCategory)[keyof typeof SafetyCategory];

/** Categories an issue can carry (everything except `safe`). */
export type ViolationCategory = Exclude<SafetyCategory, "safe">;

/** Violation categories, highest priority first. */
export const VIOLATION_CATEGORIES = [
  "violence",
  "inappropriate",
  "personal_info",
  "dangerous",
  "scary",
  "bullying",
  "medical",
  "commercial",
  "profanity",
  "off_topic",
] as const satisfies readonly ViolationCategory[];

export const SeverityLevel = {
  NONE: 0,
  MINOR: 1,
  MODERATE: 2,
  SEVERE: 3,
  CRITICAL: 4,
} as const;
export type SeverityLevel = (typeof SeverityLevel)[keyof typeof SeverityLevel];

export const SentenceComplexity = {
  SIMPLE: "simple",
  COMPOUND: "compound",
  COMPLEX: "complex",
  SOPHISTICATED: "sophisticated",
} as const;
export type SentenceComplexity =
  (typeof SentenceComplexity)[keyof typeof SentenceComplexity];

export const VocabularyTier = {
  BASIC: "basic",
  INTERMEDIATE: "intermediate",
  ADVANCED: "advanced",
  NONE: "none",
} as const;
export type VocabularyTier =
  (typeof VocabularyTier)[keyof typeof VocabularyTier];

export const FilterStrictness = {
  MAXIMUM: "maximum",
  HIGH: "high",
  MODERATE: "moderate",
  STANDARD: "standard",
} as const;
export type FilterStrictness =
  (typeof FilterStrictness)[keyof typeof FilterStrictness];

export const PipelineStatus = {
  IDLE: "idle",
  PROCESSING: "processing",
  COMPLETED: "completed",
  ERROR: "error",
  SAFETY_BLOCKED: "safety_blocked",
} as const;
export type PipelineStatus =
  (typeof PipelineStatus)[keyof typeof PipelineStatus];

// ── Age profiles ────────────────────────────────────────────────────────────

export interface AgeRange {
  readonly min: number;
  readonly max: number;
}

/** Content classes a band may be allowed to see. */
export interface ContentTolerance {
  readonly scary: boolean;
  readonly violent: boolean;
  readonly romantic: boolean;
}

/**
 * How many issues a band may see before the content counts as not
 * age-appropriate. Operator-tunable; never above `severe`.
 */
export interface IssueTolerance {
  readonly maxIssues: number;
  readonly maxSeverity: SeverityLevel;
}

export interface EngagementSettings {
  readonly greeting: boolean;
  readonly followUp: boolean;
}

export interface AgeProfile {
  readonly band: AgeBand;
  readonly maxWords: number;
  readonly sentenceComplexity: SentenceComplexity;
  readonly vocabularyTier: VocabularyTier;
  readonly allowedTopics: ReadonlySet<string>;
  readonly blockedTopics: ReadonlySet<string>;
  readonly filterStrictness: FilterStrictness;
  readonly tolerance: ContentTolerance;
  /** Added to the worst issue severity (capped at critical). */
  readonly severityBoost: 0 | 1;
  readonly issueTolerance: IssueTolerance;
  readonly engagement: EngagementSettings;
  /** Numbers larger than this become a vague quantity word. */
  readonly vagueNumbersAbove: number | null;
}

// ── Pattern catalogue ───────────────────────────────────────────────────────

/** Tolerance flag that switches a term table off for a band. */
export type ToleranceGate = keyof ContentTolerance;

/** A word list matched on word boundaries. */
export interface TermTable {
  readonly id: string;
  readonly category: ViolationCategory;
  readonly severity: SeverityLevel;
  readonly gate: ToleranceGate | null;
  readonly pattern: RegExp;
}

/** A hand-written expression for phrasing that word lists cannot express. */
export interface PatternRule {
  readonly id: string;
  readonly category: ViolationCategory;
  readonly severity: SeverityLevel;
  readonly pattern: RegExp;
}

/** A topic tag a profile can allow or block. */
export interface TopicDefinition {
  readonly tag: string;
  readonly category: ViolationCategory;
  readonly severity: SeverityLevel;
  readonly pattern: RegExp;
}

/**
 * Flags text dominated by symbols rather than letters and digits, which
 * usually means an encoded or obfuscated message.
 */
export interface SymbolDensityCheck {
  readonly id: string;
  readonly category: ViolationCategory;
  readonly severity: SeverityLevel;
  /** Share of non-space characters above which text is flagged. */
  readonly maxRatio: number;
  /** Texts with fewer non-space characters are never flagged. */
  readonly minLength: number;
}

export interface PatternCatalogue {
  readonly termTables: readonly TermTable[];
  readonly rules: readonly PatternRule[];
  readonly symbolDensity: SymbolDensityCheck | null;
  readonly topics: ReadonlyMap<string, TopicDefinition>;
  /** Allowed-topic tag -> term matcher. Matching marks text as on-topic. */
  readonly educationalTopics: ReadonlyMap<string, RegExp>;
}

// ── Redirects & vocabulary ──────────────────────────────────────────────────

/** Phrases keyed by band, with an optional band-independent fallback. */
export interface BandPhrases {
  readonly byBand: Partial<Record<AgeBand, readonly string[]>>;
  readonly fallback: readonly string[];
}

export interface RedirectCatalogue {
  readonly byCategory: Partial<Record<ViolationCategory, BandPhrases>>;
  readonly generic: BandPhrases;
  readonly educational: Partial<Record<ViolationCategory, readonly string[]>>;
}

export type VocabularyTable = ReadonlyMap<string, string>;

/**
 * Chooses one phrase from a non-empty list. The default picks the first
 * entry; inject a seeded picker to vary phrasing reproducibly.
 */
export type PhrasePicker = (phrases: readonly string[]) => string;

export interface EngagementPhrases {
  readonly greetings: readonly string[];
  readonly followUps: readonly string[];
  readonly continuation: string;
}

export interface VocabularyCatalogue {
  readonly tiers: Readonly<
    Record<Exclude<VocabularyTier, "none">, VocabularyTable>
  >;
  readonly engagement: EngagementPhrases;
  readonly vagueQuantity: string;
}

// ── Pipeline config ─────────────────────────────────────────────────────────

export interface PipelineConfig {
  readonly order: readonly string[];
  readonly safetyStage: string;
}

/** Everything loaded from the policy directory at startup. */
export interface SafetyPolicy {
  readonly profiles: ReadonlyMap<AgeBand, AgeProfile>;
  readonly patterns: PatternCatalogue;
  readonly redirects: RedirectCatalogue;
  readonly vocabulary: VocabularyCatalogue;
  readonly pipeline: PipelineConfig;
}

// ── Safety results ──────────────────────────────────────────────────────────

export interface SafetyIssue {
  /** Term table, rule or topic id that matched. */
  readonly type: string;
  readonly match: string;
  readonly severity: SeverityLevel;
  readonly category: ViolationCategory;
}

export interface SafetyResult {
  readonly safe: boolean;
  readonly score: number;
  readonly flags: readonly string[];
  readonly category: SafetyCategory;
  readonly severity: SeverityLevel;
  readonly ageAppropriate: boolean;
  readonly band: AgeBand | null;
  readonly redirect: string | null;
  readonly educationalRedirect: string | null;
  readonly parentAlert: boolean;
  readonly issues: readonly SafetyIssue[];
  readonly details: Readonly<Record<string, unknown>>;
}

// ── Pipeline context & stages ───────────────────────────────────────────────

export interface PipelineContext {
  sessionId: string;
  profileId: string;
  childName: string;
  childAge: number;
  inputText: string;
  responseText: string;
  safetyFlags: string[];
  metadata: Record<string, unknown>;
  timestamp: string;
}

/** Verdict returned by the gate stage. */
export interface GateOutcome {
  safe: boolean;
  context: PipelineContext;
}

/**
 * The safety gate. It is the only stage allowed to halt the pipeline.
 */
export interface SafetyGateStage {
  readonly kind: "gate";
  readonly name: string;
  apply(context: PipelineContext): Promise<GateOutcome>;
  close?(): Promise<void>;
}

/**
 * Every other stage (adaptation and external collaborators) transforms the
 * context and hands it back. It may append to `metadata`, `responseText` and
 * `safetyFlags`, but never touches `inputText`.
 */
export interface TransformStage {
  readonly kind: "transform";
  readonly name: string;
  apply(context: PipelineContext): Promise<PipelineContext>;
  close?(): Promise<void>;
}

export type PipelineStage = SafetyGateStage | TransformStage;

/** Per-stage diagnostics returned alongside the response. */
export interface StageReport {
  durationMs: number;
  safe?: boolean;
  error?: string;
}

export interface TurnOutcome {
  responseText: string;
  status: PipelineStatus;
  stages: Record<string, StageReport>;
}

// ── Incidents ───────────────────────────────────────────────────────────────

export interface SafetyIncident {
  id: string;
  timestamp: string;
  childId: string;
  childAge: number;
  sessionId: string;
  inputText: string;
  category: SafetyCategory;
  severity: SeverityLevel;
  actionTaken: "blocked_and_redirected";
  parentNotified: boolean;
  flags: string[];
}

export interface IncidentQuery {
  from?: Date;
  to?: Date;
  limit?: number;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "staging" | "production";
  port: number;
  logLevel: string;
  policyDir: string;
  database: DatabaseConfig;
  metrics: MetricsConfig;
  turnBudget: TurnBudgetConfig;
  sessions: SessionConfig;
}

export interface DatabaseConfig {
  /** `null` keeps incidents in memory (development only). */
  connectionString: string | null;
  maxConnections: number;
}

export interface MetricsConfig {
  enabled: boolean;
  reportIntervalMs: number;
}

/** Turns one child profile may take per minute. */
export interface TurnBudgetConfig {
  enabled: boolean;
  turnsPerMinute: number;
}

export interface SessionConfig {
  idleTtlMs: number;
  sweepIntervalMs: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
