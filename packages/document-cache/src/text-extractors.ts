import { ExtractError, type RawBytesFetcher, type SourceLocation } from '@clinical/api';

export interface TextExtractorAdapter {
  name: string;
  method: string;
  contentTypes: string[];
  extract: (bytes: Uint8Array) => Promise<string>;
}

export interface ExtractedText {
  text: string;
  extractionMethod: string;
  extractorName: string;
}

export type FetchAndExtract = () => Promise<ExtractedText>;

export interface TextExtractorRegistry {
  resolve: (contentType: string) => TextExtractorAdapter | null;
  contentTypes: () => string[];
}

// "text/plain; charset=utf-8" and "TEXT/PLAIN" both resolve to the text/plain adapter.
const baseContentType = (contentType: string): string =>
  (contentType.split(';')[0] ?? '').trim().toLowerCase();

export const createTextExtractorRegistry = (
  adapters: TextExtractorAdapter[],
): TextExtractorRegistry => {
  const byContentType = new Map<string, TextExtractorAdapter>();

  for (const adapter of adapters) {
    for (const contentType of adapter.contentTypes) {
      const key = baseContentType(contentType);
      if (byContentType.has(key)) {
        throw new Error(`Content type ${key} is registered by more than one text extractor.`);
      }
      byContentType.set(key, adapter);
    }
  }

  return {
    resolve: (contentType) => byContentType.get(baseContentType(contentType)) ?? null,
    contentTypes: () => [...byContentType.keys()].sort(),
  };
};

export const plainTextAdapter: TextExtractorAdapter = {
  name: 'plain-text',
  method: 'text_direct',
  contentTypes: ['text/plain'],
  extract: async (bytes) => {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      throw new ExtractError('Document bytes are not valid UTF-8 text.', { cause: error });
    }
  },
};

export const createFetchAndExtract = (
  fetcher: RawBytesFetcher,
  registry: TextExtractorRegistry,
  document: { sourceLocation: SourceLocation; contentType: string },
): FetchAndExtract => {
  return async () => {
    const adapter = registry.resolve(document.contentType);
    if (!adapter) {
      throw new ExtractError(`Unsupported content type: ${document.contentType}.`);
    }

    const bytes = await fetcher.fetch(document.sourceLocation);
    const text = await adapter.extract(bytes);

    return {
      text,
      extractionMethod: adapter.method,
      extractorName: adapter.name,
    };
  };
};
