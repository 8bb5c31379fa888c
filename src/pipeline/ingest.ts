import { ExtractionError, PipelineError, describeError } from '../errors';
import type { CallOptions, DocumentChunk } from '../rag/schema';
import { createLogger, type Logger } from '../util/logger';
import { chunkText, tokenize, type ChunkingOptions } from './chunk';
import type { Downloader } from './download';
import { resolveDocument, type ExtractorRegistry } from './extract';

export type DocumentProcessorOptions = {
  downloader: Downloader;
  extractors: ExtractorRegistry;
  chunking: ChunkingOptions;
  /** Extracted text is cut to this many words before chunking. */
  maxDocumentWords: number;
  logger?: Logger;
};

/** Download → resolve format → extract → cap words → chunk. */
export class DocumentProcessor {
  private readonly downloader: Downloader;

  private readonly extractors: ExtractorRegistry;

  private readonly chunking: ChunkingOptions;

  private readonly maxDocumentWords: number;

  private readonly logger: Logger;

  constructor({ downloader, extractors, chunking, maxDocumentWords, logger }: DocumentProcessorOptions) {
    this.downloader = downloader;
    this.extractors = extractors;
    this.chunking = chunking;
    this.maxDocumentWords = maxDocumentWords;
    this.logger = logger ?? createLogger('ingest');
  }

  async process(url: string, { signal }: CallOptions = {}): Promise<DocumentChunk[]> {
    const content = await this.downloader.fetch(url, { signal });
    signal?.throwIfAborted();

    const { filename, documentType } = resolveDocument(url);
    const extractor = this.extractors[documentType];

    let text: string;
    try {
      text = await extractor.extract(content);
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      throw new ExtractionError(`Failed to extract ${documentType} text: ${describeError(error)}`, { cause: error });
    }

    const words = tokenize(text);
    if (words.length > this.maxDocumentWords) {
      this.logger.debug(`Truncating ${filename} from ${words.length} to ${this.maxDocumentWords} words`);
      text = words.slice(0, this.maxDocumentWords).join(' ');
    }

    const chunks = chunkText(text, { sourceUrl: url, documentType, filename }, this.chunking);

    this.logger.info(`Processed ${filename || url} as ${documentType}: ${chunks.length} chunk(s)`);

    return chunks;
  }
}
