/**
 * Pipeline tests: extract → structure → render
 */

import {
  ExtractionClientError,
  ExtractionError,
  XLSX_MIME_TYPE,
  type ExtractedRecord,
} from '@doc-structurer/shared';
import {
  findUnverifiedRecords,
  processDocument,
} from '../../services/structurer-api/src/lib/pipeline';
import type { RecordExtractor } from '../../services/structurer-api/src/lib/llm';
import { buildPdf, createFakeOpenAI, readSheet, recordsCompletion } from './helpers';

function stubExtractor(records: ExtractedRecord[]) {
  const received: Array<{ apiKey: string; text: string }> = [];
  const extractor: RecordExtractor = async (apiKey, text) => {
    received.push({ apiKey, text });
    return { records, model: 'gpt-4o', requestId: 'req_test' };
  };
  return { received, extractor };
}

describe('processDocument', () => {
  it('should turn a two-page PDF into a two-row spreadsheet', async () => {
    const pdf = await buildPdf([['Name: Alice'], ['Role: Engineer']]);
    const { received, extractor } = stubExtractor([
      { key: 'Name', value: 'Alice', comments: null },
      { key: 'Role', value: 'Engineer', comments: null },
    ]);

    const output = await processDocument(
      { pdf, apiKey: 'test-key' },
      { extractRecords: extractor }
    );

    expect(received).toEqual([{ apiKey: 'test-key', text: 'Name: Alice\nRole: Engineer\n' }]);
    expect(output.fileName).toBe('Structured_Output.xlsx');
    expect(output.mimeType).toBe(XLSX_MIME_TYPE);
    expect(output.pageCount).toBe(2);
    expect(output.records).toHaveLength(2);

    const { rows } = await readSheet(output.spreadsheet);
    expect(rows).toEqual([
      ['key', 'value', 'comments'],
      ['Name', 'Alice', null],
      ['Role', 'Engineer', null],
    ]);
  });

  it('should still call the model for a blank PDF', async () => {
    const pdf = await buildPdf([[]]);
    const { received, extractor } = stubExtractor([]);

    const output = await processDocument(
      { pdf, apiKey: 'test-key' },
      { extractRecords: extractor }
    );

    expect(received).toEqual([{ apiKey: 'test-key', text: '\n' }]);
    expect(output.records).toEqual([]);

    const { rows } = await readSheet(output.spreadsheet);
    expect(rows).toEqual([['key', 'value', 'comments']]);
  });

  it('should fail on a missing credential without any outbound request', async () => {
    const pdf = await buildPdf([['Name: Alice']]);
    const openai = createFakeOpenAI(() => recordsCompletion([]));

    await expect(
      processDocument({ pdf, apiKey: '' }, { llmOptions: { fetch: openai.fetch } })
    ).rejects.toBeInstanceOf(ExtractionClientError);
    expect(openai.calls).toHaveLength(0);
  });

  it('should run end to end through the OpenAI client', async () => {
    const pdf = await buildPdf([['Name: Alice']]);
    const openai = createFakeOpenAI(() =>
      recordsCompletion([{ key: 'Name', value: 'Alice', comments: 'From page 1' }])
    );

    const output = await processDocument(
      { pdf, apiKey: 'test-key' },
      { llmOptions: { fetch: openai.fetch } }
    );

    expect(openai.calls).toHaveLength(1);
    const { rows } = await readSheet(output.spreadsheet);
    expect(rows[1]).toEqual(['Name', 'Alice', 'From page 1']);
  });

  it('should not render anything when the model call fails', async () => {
    const pdf = await buildPdf([['Name: Alice']]);
    let renderCalls = 0;
    const failing: RecordExtractor = async () => {
      throw new ExtractionClientError('Could not reach OpenAI: Connection error.');
    };

    await expect(
      processDocument(
        { pdf, apiKey: 'test-key' },
        {
          extractRecords: failing,
          renderSpreadsheet: async () => {
            renderCalls++;
            return Buffer.alloc(0);
          },
        }
      )
    ).rejects.toThrow('Could not reach OpenAI: Connection error.');
    expect(renderCalls).toBe(0);
  });

  it('should stop before the model when the PDF is unreadable', async () => {
    const { received, extractor } = stubExtractor([]);

    await expect(
      processDocument(
        { pdf: Buffer.from('not a pdf'), apiKey: 'test-key' },
        { extractRecords: extractor }
      )
    ).rejects.toBeInstanceOf(ExtractionError);
    expect(received).toHaveLength(0);
  });
});

describe('findUnverifiedRecords', () => {
  const text = 'Name: Alice\nSummary: Leads the\nplatform team.\n';

  it('should accept values found verbatim, ignoring whitespace differences', () => {
    const records: ExtractedRecord[] = [
      { key: 'Name', value: 'Alice', comments: null },
      { key: 'Summary', value: 'Leads the platform team.', comments: null },
    ];

    expect(findUnverifiedRecords(records, text)).toEqual([]);
  });

  it('should flag values that do not occur in the text', () => {
    const records: ExtractedRecord[] = [
      { key: 'Name', value: 'Alice', comments: null },
      { key: 'Title', value: 'Team lead', comments: null },
      { key: 'Empty', value: '  ', comments: null },
    ];

    expect(findUnverifiedRecords(records, text)).toEqual([
      { key: 'Title', value: 'Team lead', comments: null },
    ]);
  });
});
