import type {
  ClarificationRequest,
  ClarificationResponse,
  ExtractedField,
  FieldDescriptor,
  FieldExtractionInput,
  FieldExtractor,
} from '@clinical/api';
import { buildClarificationPrompt, buildFieldPrompt } from './prompt.js';
import { parseClarificationOutput, parseFieldExtractionOutput } from './validate.js';
import { isObject } from './values.js';

const DEFAULT_OUTPUT_TOKENS = 512;
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CompletionFieldExtractorOptions {
  baseUrl: string;
  timeoutMs?: number;
  nPredict?: number;
  fetch?: FetchLike;
}

export const readCompletionText = (responseBody: unknown): string => {
  if (!isObject(responseBody)) {
    throw new Error('Unexpected completion server response shape.');
  }

  if (typeof responseBody.content === 'string') {
    return responseBody.content;
  }

  const choices = responseBody.choices;
  if (Array.isArray(choices)) {
    const firstChoice: unknown = choices[0];
    if (isObject(firstChoice)) {
      if (typeof firstChoice.text === 'string') {
        return firstChoice.text;
      }

      const message = firstChoice.message;
      if (isObject(message) && typeof message.content === 'string') {
        return message.content;
      }
    }
  }

  throw new Error('Unable to find completion text in completion server response.');
};

const renderInput = (input: FieldExtractionInput): string =>
  input.kind === 'text'
    ? input.text
    : ['Structured record (JSON):', JSON.stringify(input.context, null, 2)].join('\n');

/**
 * Field Extractor backed by a completion server (`POST /completion`). Each call is one
 * non-streaming completion at temperature 0 with its own timeout.
 */
export const createCompletionFieldExtractor = (
  options: CompletionFieldExtractorOptions,
): FieldExtractor => {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const nPredict = options.nPredict ?? DEFAULT_OUTPUT_TOKENS;
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));

  const runCompletion = async (prompt: string): Promise<string> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      const response = await fetchImpl(`${baseUrl}/completion`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
        },
        body: JSON.stringify({
          prompt,
          n_predict: nPredict,
          temperature: 0,
          stream: false,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const bodyText = await response.text();
        throw new Error(`Completion failed (${response.status}): ${bodyText.slice(0, 600)}`);
      }

      const json: unknown = await response.json();
      return readCompletionText(json);
    } catch (error) {
      const message = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new Error(`Failed to run field extraction completion: ${message}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  };

  return {
    extractFields: async (
      input: FieldExtractionInput,
      schema: FieldDescriptor[],
    ): Promise<ExtractedField[]> => {
      if (schema.length === 0) {
        return [];
      }

      const rawOutput = await runCompletion(buildFieldPrompt(renderInput(input), schema));
      return parseFieldExtractionOutput(rawOutput, schema);
    },
    clarify: async (request: ClarificationRequest): Promise<ClarificationResponse> => {
      const rawOutput = await runCompletion(buildClarificationPrompt(request));
      return parseClarificationOutput(rawOutput, request.field);
    },
  };
};
