import type { LoggerMethods } from '@ragbridge/logger';
import type { IngestionResult } from '@ragbridge/model';
import type { LanguageModel } from 'ai';

import type { DocumentSource, ShredFile } from './document-shredder';

import { generateText } from 'ai';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { DocumentShredder } from './document-shredder';
import { ShreddingError } from './shredding-error';

vi.mock('ai', async (importOriginal) => ({
  ...(await importOriginal<typeof import('ai')>()),
  generateText: vi.fn(),
}));

function ingested(fileId: string, texts: string[]): IngestionResult {
  return {
    fileId,
    finalStrategyUsed: 'plain-text',
    content: texts.map((text) => ({
      text,
      metadata: { source: `/tmp/${fileId}`, strategy: 'plain-text' },
    })),
    attempts: [],
  };
}

function structuredResult(output: unknown) {
  return {
    text: JSON.stringify(output),
    experimental_output: output,
    usage: { inputTokens: 900, outputTokens: 150, totalTokens: 1050 },
  } as any;
}

const RFP: ShredFile = {
  fileId: 'file-1',
  fileName: 'rfp.pdf',
  location: 'gs://bucket/org-1/rfp.pdf',
};
const APPENDIX: ShredFile = {
  fileId: 'file-2',
  fileName: 'appendix.pdf',
  location: 'gs://bucket/org-1/appendix.pdf',
};

const REQUIREMENT = {
  name: 'Provide Insurance Certificate',
  description: 'Proof of general liability coverage.',
  isRequired: true,
  mentions: [
    {
      sourceFile: 'appendix.pdf',
      sourceLocation: 'Page 2 - Required Documents, Item 3',
      confidence: 'high',
    },
  ],
};

describe('DocumentShredder', () => {
  const model = { modelId: 'gpt-test' } as LanguageModel;

  let logger: LoggerMethods;
  let source: DocumentSource;
  let shredder: DocumentShredder;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    source = { load: vi.fn() };
    shredder = new DocumentShredder(logger, model, source);
  });

  test('should extract metadata and requirements from every loaded file', async () => {
    vi.mocked(source.load).mockImplementation(async (file) =>
      file.fileId === 'file-1'
        ? ingested('file-1', [
            'Request for Proposal: Network Upgrade',
            'Proposals due 2026-03-15 17:00 UTC.',
          ])
        : ingested('file-2', ['Attach insurance certificate.']),
    );
    vi.mocked(generateText).mockResolvedValue(
      structuredResult({
        projectMetadata: {
          projectName: 'Network Upgrade',
          issuerName: 'City of Springfield',
          dueDate: '2026-03-15T17:00:00Z',
        },
        submissionRequirements: [REQUIREMENT],
      }),
    );

    const result = await shredder.shred({
      files: [RFP, APPENDIX],
      organizationId: 'org-1',
    });

    expect(result).toEqual({
      projectMetadata: {
        projectName: 'Network Upgrade',
        issuerName: 'City of Springfield',
        dueDate: '2026-03-15T17:00:00Z',
      },
      submissionRequirements: [REQUIREMENT],
      skippedFiles: [],
      usage: {
        model: 'primary',
        modelName: 'gpt-test',
        inputTokens: 900,
        outputTokens: 150,
        totalTokens: 1050,
      },
    });
    expect(source.load).toHaveBeenCalledWith(RFP, undefined);
    expect(source.load).toHaveBeenCalledWith(APPENDIX, undefined);
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model,
        system: expect.stringContaining('specialized RFP analyst'),
        messages: [
          {
            role: 'user',
            content:
              '--- Document: rfp.pdf ---\n' +
              'Request for Proposal: Network Upgrade\n\n' +
              'Proposals due 2026-03-15 17:00 UTC.\n' +
              '--- End of document: rfp.pdf ---\n\n' +
              '--- Document: appendix.pdf ---\n' +
              'Attach insurance certificate.\n' +
              '--- End of document: appendix.pdf ---',
          },
        ],
        temperature: 0.2,
        maxOutputTokens: 8192,
        maxRetries: 3,
        experimental_output: expect.anything(),
      }),
    );
  });

  test('should fill defaults when the model omits both sections', async () => {
    vi.mocked(source.load).mockResolvedValue(ingested('file-1', ['Scope only.']));
    vi.mocked(generateText).mockResolvedValue(
      structuredResult({ projectMetadata: null, submissionRequirements: null }),
    );

    const result = await shredder.shred({ files: [RFP], organizationId: 'org-1' });

    expect(result.projectMetadata).toEqual({
      projectName: null,
      issuerName: null,
      dueDate: null,
    });
    expect(result.submissionRequirements).toEqual([]);
    expect(logger.info).toHaveBeenLastCalledWith(
      '[DocumentShredder] Project: unknown, issuer: unknown, due: unknown, 0 requirements',
    );
  });

  test('should skip files that fail to load or have no text', async () => {
    const blank: ShredFile = {
      fileId: 'file-3',
      fileName: 'scan.png',
      location: 'gs://bucket/org-1/scan.png',
    };
    vi.mocked(source.load).mockImplementation(async (file) => {
      if (file.fileId === 'file-1') {
        throw new Error(
          'Download of https://storage.example.com/org-1/rfp.pdf failed',
        );
      }
      return file.fileId === 'file-2'
        ? ingested('file-2', ['Attach insurance certificate.'])
        : ingested('file-3', ['  ', '']);
    });
    vi.mocked(generateText).mockResolvedValue(
      structuredResult({
        projectMetadata: null,
        submissionRequirements: [REQUIREMENT],
      }),
    );

    const result = await shredder.shred({
      files: [RFP, APPENDIX, blank],
      organizationId: 'org-1',
    });

    expect(result.skippedFiles).toEqual([
      { fileId: 'file-1', fileName: 'rfp.pdf', reason: 'Download of [URL] failed' },
      { fileId: 'file-3', fileName: 'scan.png', reason: 'No text extracted' },
    ]);
    expect(result.submissionRequirements).toEqual([REQUIREMENT]);
    expect(logger.warn).toHaveBeenCalledWith(
      '[DocumentShredder] Skipping rfp.pdf: Download of [URL] failed',
    );
    expect(vi.mocked(generateText).mock.calls[0][0].messages).toEqual([
      {
        role: 'user',
        content:
          '--- Document: appendix.pdf ---\n' +
          'Attach insurance certificate.\n' +
          '--- End of document: appendix.pdf ---',
      },
    ]);
  });

  test('should fail without calling the model when no file loads', async () => {
    vi.mocked(source.load).mockRejectedValue(new Error('bucket not found'));

    const error = await shredder
      .shred({ files: [RFP], organizationId: 'org-1' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ShreddingError);
    expect(error).toMatchObject({
      kind: 'no-content',
      message: 'No files could be processed',
      skippedFiles: [
        { fileId: 'file-1', fileName: 'rfp.pdf', reason: 'bucket not found' },
      ],
    });
    expect(generateText).not.toHaveBeenCalled();
  });

  test.each([
    [{ files: [], organizationId: 'org-1' }, 'No files provided'],
    [{ files: [RFP], organizationId: '  ' }, 'Organization id must not be empty'],
  ])('should reject an invalid request: %o', async (request, message) => {
    await expect(shredder.shred(request)).rejects.toMatchObject({
      kind: 'invalid-request',
      message,
    });
    expect(source.load).not.toHaveBeenCalled();
  });

  test('should rethrow instead of skipping when the caller cancels', async () => {
    const controller = new AbortController();
    vi.mocked(source.load).mockImplementation(async () => {
      controller.abort();
      throw new Error('download cancelled');
    });

    await expect(
      shredder.shred({
        files: [RFP, APPENDIX],
        organizationId: 'org-1',
        abortSignal: controller.signal,
      }),
    ).rejects.toThrow('download cancelled');
    expect(source.load).toHaveBeenCalledTimes(1);
    expect(generateText).not.toHaveBeenCalled();
  });
});
