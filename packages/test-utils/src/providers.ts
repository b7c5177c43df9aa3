import type {
  ClarificationRequest,
  ClarificationResponse,
  DocumentDescriptor,
  DocumentLocatorProvider,
  ExtractedField,
  FieldExtractionInput,
  FieldExtractor,
  RawBytesFetcher,
  SourceLocation,
  StructuredContext,
  StructuredContextProvider,
} from '@clinical/api';
import { FetchError } from '@clinical/api';

export interface StoredDocument {
  descriptor: DocumentDescriptor;
  text: string;
}

export interface InMemoryProviders {
  structuredContext: StructuredContextProvider;
  documentLocator: DocumentLocatorProvider;
  fetcher: RawBytesFetcher;
  /** Object-store keys in the order they were fetched. */
  fetchedKeys: string[];
}

const locationKey = (location: SourceLocation): string =>
  `${location.bucket}/${location.key}@${location.revision ?? 'latest'}`;

/** Structured records and documents held in memory, keyed by patient id. */
export const createInMemoryProviders = (data: {
  structured?: Record<string, StructuredContext>;
  documents?: Record<string, StoredDocument[]>;
}): InMemoryProviders => {
  const fetchedKeys: string[] = [];
  const bytesByLocation = new Map<string, Uint8Array>();
  for (const documents of Object.values(data.documents ?? {})) {
    for (const document of documents) {
      bytesByLocation.set(
        locationKey(document.descriptor.sourceLocation),
        new TextEncoder().encode(document.text),
      );
    }
  }

  return {
    structuredContext: {
      getStructuredContext: async (patientId) => data.structured?.[patientId] ?? null,
    },
    documentLocator: {
      listDocuments: async (patientId) =>
        (data.documents?.[patientId] ?? []).map((document) => ({ ...document.descriptor })),
    },
    fetcher: {
      fetch: async (location) => {
        fetchedKeys.push(location.key);
        const bytes = bytesByLocation.get(locationKey(location));
        if (!bytes) {
          throw new FetchError(`No object at ${location.bucket}/${location.key}.`);
        }
        return bytes;
      },
    },
    fetchedKeys,
  };
};

export interface ScriptedFieldExtractor extends FieldExtractor {
  inputs: FieldExtractionInput[];
  clarifications: ClarificationRequest[];
}

/**
 * Answers `extractFields` from a table keyed by document text; unknown text fails the call.
 * Clarifications are answered by `clarify`, or left open when it is omitted.
 */
export const createScriptedFieldExtractor = (script: {
  byText: Record<string, ExtractedField[]>;
  clarify?: (request: ClarificationRequest) => ClarificationResponse;
}): ScriptedFieldExtractor => {
  const inputs: FieldExtractionInput[] = [];
  const clarifications: ClarificationRequest[] = [];

  return {
    inputs,
    clarifications,
    extractFields: async (input) => {
      inputs.push(input);
      if (input.kind !== 'text') {
        return [];
      }
      const fields = script.byText[input.text];
      if (!fields) {
        throw new Error(`No scripted fields for text: ${input.text.slice(0, 40)}`);
      }
      return fields.map((field) => ({ ...field }));
    },
    clarify: async (request) => {
      clarifications.push(request);
      return script.clarify?.(request) ?? { answer: 'Unclear from the record.', candidate: null };
    },
  };
};
