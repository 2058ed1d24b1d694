/**
 * REPORT GOVERNANCE — TYPES
 *
 * Lifecycle, approval workflow, version ledger, change freeze, quality
 * gate, change requests and releases of one report artifact.
 */

// ═══════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════

export type LifecycleStage =
  | 'DRAFT'
  | 'REVIEW'
  | 'APPROVED'
  | 'PUBLISHED'
  | 'DEPRECATED'
  | 'ARCHIVED'
  | 'RETIRED';

export const LIFECYCLE_STAGES: readonly LifecycleStage[] = [
  'DRAFT',
  'REVIEW',
  'APPROVED',
  'PUBLISHED',
  'DEPRECATED',
  'ARCHIVED',
  'RETIRED',
];

export type GovernanceLevel = 'NONE' | 'BASIC' | 'STANDARD' | 'STRICT' | 'ENTERPRISE';
export const GOVERNANCE_LEVELS: readonly GovernanceLevel[] = ['NONE', 'BASIC', 'STANDARD', 'STRICT', 'ENTERPRISE'];

export type StepStatus = 'PENDING' | 'APPROVED' | 'REJECTED';
export type WorkflowStatus = 'PENDING' | 'IN_PROGRESS' | 'APPROVED' | 'REJECTED';

export type ChangeType = 'MAJOR' | 'MINOR' | 'PATCH' | 'HOTFIX' | 'ENHANCEMENT' | 'REFACTOR';
export const CHANGE_TYPES: readonly ChangeType[] = ['MAJOR', 'MINOR', 'PATCH', 'HOTFIX', 'ENHANCEMENT', 'REFACTOR'];

export type ChangeRequestStatus = 'PENDING' | 'APPROVED' | 'REJECTED';
export type CheckSeverity = 'INFO' | 'WARNING' | 'CRITICAL';
export type ReleaseStatus = 'PLANNING' | 'SCHEDULED' | 'RELEASED' | 'ROLLED_BACK' | 'CANCELLED';
export type QualityGrade = 'A' | 'B' | 'C' | 'D' | 'F';

// ═══════════════════════════════════════════════════════════════
// LIFECYCLE
// ═══════════════════════════════════════════════════════════════

export interface StageTransition {
  readonly transitionId: string;
  readonly from: LifecycleStage | null;
  readonly to: LifecycleStage;
  readonly at: string; // ISO timestamp
  readonly actor: string;
  readonly reason: string;
}

export interface LifecycleRecord {
  readonly currentStage: LifecycleStage | null;
  readonly previousStage: LifecycleStage | null;
  readonly stageChangedAt: string | null;
  readonly stageChangedBy: string | null;
  readonly history: readonly StageTransition[];
  /** last time each stage was entered */
  readonly stageEnteredAt: Readonly<Partial<Record<LifecycleStage, string>>>;
}

export interface Deprecation {
  readonly deprecatedAt: string;
  readonly deprecatedBy: string;
  readonly reason: string;
  readonly replacementReportId: string | null;
  readonly retirementDate: string | null;
}

// ═══════════════════════════════════════════════════════════════
// APPROVAL WORKFLOW
// ═══════════════════════════════════════════════════════════════

export interface ApprovalStep {
  readonly stepId: string;
  readonly order: number;
  readonly name: string;
  readonly approverId: string;
  readonly approverRole: string | null;
  readonly required: boolean;
  readonly status: StepStatus;
  readonly requestedAt: string;
  readonly respondedAt: string | null;
  readonly decidedBy: string | null;
  readonly comment: string | null;
  readonly timeoutDays: number | null;
}

export interface Workflow {
  readonly steps: readonly ApprovalStep[];
  readonly status: WorkflowStatus;
  readonly requestedAt: string | null;
  readonly completedAt: string | null;
}

// ═══════════════════════════════════════════════════════════════
// VERSION LEDGER
// ═══════════════════════════════════════════════════════════════

export interface SemVer {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export interface Version extends SemVer {
  readonly versionId: string;
  readonly versionNumber: string;
  readonly changeType: ChangeType;
  readonly description: string;
  readonly createdAt: string;
  readonly createdBy: string;
  readonly current: boolean;
  readonly stable: boolean;
}

export interface VersionLedger {
  readonly versions: readonly Version[];
  readonly currentVersion: string | null;
  readonly currentMajor: number | null;
  readonly currentMinor: number | null;
  readonly currentPatch: number | null;
}

// ═══════════════════════════════════════════════════════════════
// CHANGE CONTROL
// ═══════════════════════════════════════════════════════════════

export interface FreezeWindow {
  readonly active: boolean;
  readonly activatedAt: string | null;
  readonly until: string | null;
  readonly activatedBy: string | null;
  readonly reason: string | null;
}

export interface ChangeRequest {
  readonly changeId: string;
  readonly title: string;
  readonly description: string;
  readonly changeType: ChangeType;
  readonly requestedBy: string;
  readonly requestedAt: string;
  readonly status: ChangeRequestStatus;
  readonly decidedBy: string | null;
  readonly decidedAt: string | null;
  readonly rejectionReason: string | null;
  readonly scheduledFor: string | null;
  readonly implementedAt: string | null;
  readonly impactsProduction: boolean;
}

// ═══════════════════════════════════════════════════════════════
// QUALITY
// ═══════════════════════════════════════════════════════════════

export interface QualityCheck {
  readonly checkId: string;
  readonly name: string;
  readonly checkType: string;
  readonly passed: boolean;
  readonly severity: CheckSeverity;
  readonly score: number; // 0..1
  readonly issues: readonly string[];
  readonly executedAt: string;
  readonly executedBy: string;
}

export interface QualityGate {
  readonly checks: readonly QualityCheck[];
  readonly failedCount: number;
  readonly lastCheckedAt: string | null;
}

export interface QualityScore {
  readonly overallScore: number;
  readonly grade: QualityGrade;
  readonly threshold: number;
  readonly meetsThreshold: boolean;
  readonly checkCount: number;
}

// ═══════════════════════════════════════════════════════════════
// RELEASES
// ═══════════════════════════════════════════════════════════════

export interface Release {
  readonly releaseId: string;
  readonly name: string;
  readonly versionNumber: string;
  readonly status: ReleaseStatus;
  readonly scheduledAt: string | null;
  readonly releasedAt: string | null;
  readonly releasedBy: string | null;
}

export interface ReleaseReadiness {
  readonly go: boolean;
  readonly blockers: string[];
}

// ═══════════════════════════════════════════════════════════════
// POLICIES
// ═══════════════════════════════════════════════════════════════

/**
 * A rule attached to a report. Lower `priority` ranks first.
 * `condition` and `action` are opaque to this service.
 */
export interface GovernancePolicy {
  readonly policyId: string;
  readonly name: string;
  readonly description: string;
  readonly policyType: string;
  readonly enabled: boolean;
  readonly mandatory: boolean;
  readonly priority: number;
  readonly condition: string | null;
  readonly action: string | null;
  readonly effectiveFrom: string | null; // ISO timestamp
  readonly effectiveUntil: string | null; // ISO timestamp
  readonly createdBy: string;
  readonly createdAt: string;
}

// ═══════════════════════════════════════════════════════════════
// AGGREGATE
// ═══════════════════════════════════════════════════════════════

export interface GovernanceOptions {
  readonly level: GovernanceLevel;
  readonly approvalRequired: boolean;
  readonly versionControl: boolean;
  readonly qualityChecks: boolean;
  readonly qualityThreshold: number;
}

export const DEFAULT_GOVERNANCE_OPTIONS: GovernanceOptions = {
  level: 'STANDARD',
  approvalRequired: true,
  versionControl: true,
  qualityChecks: true,
  qualityThreshold: 0.7,
};

export interface ReportGovernance {
  readonly reportId: string;
  readonly reportName: string;
  readonly owner: string;
  readonly options: GovernanceOptions;
  readonly lifecycle: LifecycleRecord;
  readonly workflow: Workflow;
  readonly ledger: VersionLedger;
  readonly quality: QualityGate;
  readonly freeze: FreezeWindow;
  readonly changeRequests: readonly ChangeRequest[];
  readonly releases: readonly Release[];
  readonly currentReleaseId: string | null;
  readonly policies: readonly GovernancePolicy[];
  readonly deprecation: Deprecation | null;
  readonly createdAt: string;
  readonly createdBy: string;
  readonly updatedAt: string;
  readonly revision: number;
}

// ═══════════════════════════════════════════════════════════════
// EVENTS / PORTS
// ═══════════════════════════════════════════════════════════════

export type GovernanceEventType =
  | 'GOVERNANCE_CREATED'
  | 'STAGE_TRANSITION'
  | 'STEP_ADDED'
  | 'STEP_APPROVED'
  | 'STEP_REJECTED'
  | 'VERSION_ADDED'
  | 'CHECK_RECORDED'
  | 'FREEZE_ACTIVATED'
  | 'FREEZE_DEACTIVATED'
  | 'CHANGE_SUBMITTED'
  | 'CHANGE_APPROVED'
  | 'CHANGE_REJECTED'
  | 'CHANGE_IMPLEMENTED'
  | 'RELEASE_PLANNED'
  | 'RELEASE_PUBLISHED'
  | 'RELEASE_CANCELLED'
  | 'RELEASE_ROLLED_BACK'
  | 'POLICY_ADDED';

export interface GovernanceEvent {
  readonly reportId: string;
  readonly type: GovernanceEventType;
  readonly actor: string;
  readonly ts: string;
  readonly transition?: StageTransition;
  readonly meta?: Record<string, unknown>;
}

export interface AuditSink {
  record: (event: GovernanceEvent) => void;
}

export interface GovernanceRepository {
  load: (reportId: string) => Promise<ReportGovernance | null>;
  save: (governance: ReportGovernance, expectedRevision: number | null) => Promise<void>;
  list: () => Promise<ReportGovernance[]>;
}

export interface GovernanceStatistics {
  totalGovernances: number;
  byStage: Partial<Record<LifecycleStage, number>>;
  byLevel: Partial<Record<GovernanceLevel, number>>;
  deprecatedReports: number;
  totalApprovalSteps: number;
  totalChangeRequests: number;
  pendingChangeRequests: number;
  totalPolicies: number;
  activePolicies: number;
}
