export {
  BACKEND_VERSIONS,
  CERTIFICATE_MODES,
  isBackendVersion,
  type BackendVersion,
  type CertificateMode,
} from './backend-version';
export {
  toUnifiedQueryResponse,
  type ChatEnvelope,
  type ConversationTurn,
  type RawBackendResponse,
  type UnifiedQueryResponse,
} from './chat-envelope';
export {
  PARSE_STRATEGIES,
  type ContentNode,
  type IngestionResult,
  type ParseAttempt,
  type ParseFailureKind,
  type ParseFailureReason,
  type ParseStrategyName,
} from './ingestion-result';
export type {
  OrganizationUsageReport,
  TokenUsage,
  TokenUsageReport,
  VersionUsageReport,
} from './token-usage-report';
export type {
  MentionConfidence,
  ProjectMetadata,
  RequirementMention,
  SkippedFile,
  SubmissionRequirement,
} from './shredding-result';
