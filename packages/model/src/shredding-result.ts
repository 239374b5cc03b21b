/**
 * How sure the model is about one mention; `null` when very uncertain
 */
export type MentionConfidence = 'high' | 'medium' | null;

/**
 * Where a submission requirement was found
 */
export interface RequirementMention {
  sourceFile: string;

  /** Section and page, e.g. "Section 4.1 - Submission Requirements, Page 12" */
  sourceLocation: string;

  confidence: MentionConfidence;
}

/**
 * One item a proposer must (or may) submit, deduplicated across files
 */
export interface SubmissionRequirement {
  /** Task-style name, e.g. "Submit Technical Proposal" */
  name: string;
  description: string;
  isRequired: boolean;
  mentions: RequirementMention[];
}

/**
 * Project fields read from the solicitation. Unknown fields are `null`.
 */
export interface ProjectMetadata {
  projectName: string | null;
  issuerName: string | null;

  /** ISO 8601 timestamp */
  dueDate: string | null;
}

/**
 * A file left out of the analysis because it could not be loaded
 */
export interface SkippedFile {
  fileId: string;
  fileName: string;
  reason: string;
}
