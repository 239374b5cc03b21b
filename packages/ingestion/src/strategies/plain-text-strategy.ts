import { readFile } from 'node:fs/promises';

import type {
  ParseStrategy,
  SourceDocument,
  StrategyOutput,
} from '../core/parse-strategy';

import { ParseFailure } from '../errors/parse-failure';

/**
 * Last resort: the whole file as one unstructured node.
 *
 * Fails only when the bytes are not valid UTF-8.
 */
export class PlainTextStrategy implements ParseStrategy {
  readonly name = 'plain-text';

  appliesTo(): boolean {
    return true;
  }

  async parse(document: SourceDocument): Promise<StrategyOutput> {
    const bytes = await readFile(document.path);

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(
        bytes,
      );
    } catch (error) {
      throw new ParseFailure(
        'decode-failed',
        `${document.fileName} is not valid UTF-8`,
        { cause: error },
      );
    }

    return {
      nodes: [
        {
          text,
          metadata: { source: document.path, strategy: this.name },
        },
      ],
    };
  }
}
