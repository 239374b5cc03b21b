import type { LoggerMethods } from '@ragbridge/logger';
import type {
  IngestionResult,
  ProjectMetadata,
  SkippedFile,
  SubmissionRequirement,
} from '@ragbridge/model';
import type { ModelTokenUsage } from '@ragbridge/shared';
import type { LanguageModel } from 'ai';

import { redactSensitive } from '@ragbridge/shared';
import { z } from 'zod';

import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';
import { ShreddingError } from './shredding-error';

/**
 * A stored solicitation file to analyse
 */
export interface ShredFile {
  fileId: string;
  fileName: string;

  /** Storage location understood by the {@link DocumentSource} */
  location: string;
}

/**
 * Downloads a stored file and extracts its text
 */
export interface DocumentSource {
  load(file: ShredFile, abortSignal?: AbortSignal): Promise<IngestionResult>;
}

export interface ShredRequest {
  files: readonly ShredFile[];
  organizationId: string;
  abortSignal?: AbortSignal;
}

export interface ShreddingResult {
  projectMetadata: ProjectMetadata;
  submissionRequirements: SubmissionRequirement[];
  skippedFiles: SkippedFile[];
  usage: ModelTokenUsage;
}

const RequirementMentionSchema = z.object({
  sourceFile: z.string().describe('File name the requirement was found in'),
  sourceLocation: z
    .string()
    .describe('Section and page, e.g. "Section 4.1 - Submission Requirements, Page 12"'),
  confidence: z.enum(['high', 'medium']).nullable(),
});

const SubmissionRequirementSchema = z.object({
  name: z.string().describe('Task-style name, e.g. "Submit Technical Proposal"'),
  description: z.string(),
  isRequired: z.boolean(),
  mentions: z.array(RequirementMentionSchema),
});

/**
 * Schema for LLM response. Missing sections come back as `null`.
 */
export const ShreddingResponseSchema = z.object({
  projectMetadata: z
    .object({
      projectName: z.string().nullable(),
      issuerName: z.string().nullable(),
      dueDate: z
        .string()
        .nullable()
        .describe('Submission deadline as YYYY-MM-DDTHH:MM:SSZ'),
    })
    .nullable(),
  submissionRequirements: z.array(SubmissionRequirementSchema).nullable(),
});

export type ShreddingResponse = z.infer<typeof ShreddingResponseSchema>;

const EMPTY_METADATA: ProjectMetadata = {
  projectName: null,
  issuerName: null,
  dueDate: null,
};

interface LoadedDocument {
  fileName: string;
  text: string;
}

/**
 * DocumentShredder
 *
 * Reads a set of solicitation (RFP) files and extracts the project metadata
 * and the list of items a proposer has to submit. Files that cannot be loaded
 * are skipped; the model sees the text of the rest in one request.
 */
export class DocumentShredder extends TextLLMComponent {
  private readonly source: DocumentSource;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    source: DocumentSource,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
  ) {
    super(
      logger,
      model,
      'DocumentShredder',
      { temperature: 0.2, maxOutputTokens: 8192, ...options },
      fallbackModel,
    );
    this.source = source;
  }

  /**
   * @throws {ShreddingError} When no files are given or none could be loaded
   */
  async shred(request: ShredRequest): Promise<ShreddingResult> {
    if (request.files.length === 0) {
      throw new ShreddingError('invalid-request', 'No files provided');
    }
    if (!request.organizationId.trim()) {
      throw new ShreddingError(
        'invalid-request',
        'Organization id must not be empty',
      );
    }

    this.log(
      'info',
      `Shredding ${request.files.length} files for ${request.organizationId}`,
    );

    const documents: LoadedDocument[] = [];
    const skippedFiles: SkippedFile[] = [];

    for (const file of request.files) {
      try {
        const result = await this.source.load(file, request.abortSignal);
        const text = result.content
          .map((node) => node.text)
          .join('\n\n')
          .trim();
        if (!text) {
          skippedFiles.push(this.skip(file, 'No text extracted'));
          continue;
        }
        documents.push({ fileName: file.fileName, text });
      } catch (error) {
        if (request.abortSignal?.aborted) {
          throw error;
        }
        skippedFiles.push(
          this.skip(file, redactSensitive(ShreddingError.getErrorMessage(error))),
        );
      }
    }

    if (documents.length === 0) {
      throw new ShreddingError(
        'no-content',
        'No files could be processed',
        skippedFiles,
      );
    }

    const result = await this.callStructuredLLM(
      ShreddingResponseSchema,
      this.buildSystemPrompt(),
      [{ role: 'user', content: this.buildUserPrompt(documents) }],
      request.abortSignal,
    );

    const projectMetadata = result.output.projectMetadata ?? EMPTY_METADATA;
    const submissionRequirements = result.output.submissionRequirements ?? [];

    this.log(
      'info',
      `Project: ${projectMetadata.projectName ?? 'unknown'}, issuer: ${projectMetadata.issuerName ?? 'unknown'}, due: ${projectMetadata.dueDate ?? 'unknown'}, ${submissionRequirements.length} requirements`,
    );

    return {
      projectMetadata,
      submissionRequirements,
      skippedFiles,
      usage: result.usage,
    };
  }

  private skip(file: ShredFile, reason: string): SkippedFile {
    this.log('warn', `Skipping ${file.fileName}: ${reason}`);
    return { fileId: file.fileId, fileName: file.fileName, reason };
  }

  protected buildSystemPrompt(): string {
    return `You are a specialized RFP analyst. Extract structured metadata and submission requirements from the provided solicitation documents to initialize a project workspace.

## Instructions

1. **Metadata**:
   - Project name: titles such as "Request for Proposal for...", "RFP Title:", "Project:" or document headers
   - Issuer name: the organization, agency or company issuing the RFP (headers, letterheads, contact details)
   - Due date: the submission deadline ("Due Date:", "Deadline:", "Closing Date:", "Submit by:") as YYYY-MM-DDTHH:MM:SSZ
   - Use null for anything the documents do not state

2. **Submission requirements**: every item proposers must submit, for example:
   - Forms (Conflict of Interest Form, Proposal Cover Sheet, Budget Template, Bid Form)
   - Documents (Technical Proposal, Financial Proposal, Company Profile, Executive Summary)
   - Certifications (Insurance Certificate, Business License, Tax Clearance)
   - Attachments (Work Samples, References, Resumes, Past Performance)
   - Information to provide (Project Timeline, Pricing Structure, Methodology)

3. **De-duplication**: a requirement found in several files or sections is ONE entry with several mentions.

4. **Naming**: short task names such as "Submit Technical Proposal" or "Complete Budget Form", not section headings.

5. **isRequired**: true for "required", "mandatory", "must", "shall"; false for "optional", "if applicable", "may".

6. **Mentions**: name the file and a specific location such as "Section 4.1 - Submission Requirements, Page 12".

7. **Confidence**: "high" for an explicit requirement, "medium" for an implied or unclear one, null when very uncertain.

8. Analyse ALL documents and aggregate the findings.`;
  }

  protected buildUserPrompt(documents: LoadedDocument[]): string {
    return documents
      .map(
        (doc) =>
          `--- Document: ${doc.fileName} ---\n${doc.text}\n--- End of document: ${doc.fileName} ---`,
      )
      .join('\n\n');
  }
}
