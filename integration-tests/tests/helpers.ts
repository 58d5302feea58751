/**
 * Test Helpers
 *
 * In-process stand-ins: PDFs built with pdf-lib and a fetch that plays the
 * OpenAI chat completions endpoint.
 */

import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { ExtractedRecord } from '@doc-structurer/shared';

/**
 * Build a PDF with one page per entry; each string is drawn as its own line.
 */
export async function buildPdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (const lines of pages) {
    const page = doc.addPage([612, 792]);
    lines.forEach((line, i) => {
      page.drawText(line, { x: 72, y: 720 - i * 24, size: 12, font });
    });
  }

  return doc.save();
}

/**
 * Hand-assembled one-page PDF protected by the standard security handler
 * (RC4, revision 2). The /U entry matches no empty user password, so a
 * reader must ask for one.
 */
export function buildEncryptedPdf(): Uint8Array {
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>',
    `<< /Filter /Standard /V 1 /R 2 /Length 40 /P -44 /O <${'5a'.repeat(32)}> /U <${'00'.repeat(32)}> >>`,
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${offset.toString().padStart(10, '0')} 00000 n \n`;
  }

  const fileId = '0123456789abcdef'.repeat(2);
  pdf +=
    `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Encrypt 4 0 R /ID [<${fileId}> <${fileId}>] >>\n` +
    `startxref\n${xrefOffset}\n%%EOF\n`;

  return new TextEncoder().encode(pdf);
}

export interface CapturedRequest {
  url: string;
  headers: Headers;
  body: Record<string, unknown>;
}

export interface FakeResponse {
  status: number;
  json: unknown;
}

export interface FakeOpenAI {
  calls: CapturedRequest[];
  fetch: typeof fetch;
}

function parseBody(body: unknown): Record<string, unknown> {
  if (typeof body !== 'string') return {};
  const parsed: unknown = JSON.parse(body);
  return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
}

/**
 * Fake transport: records every request and answers with `respond`.
 */
export function createFakeOpenAI(
  respond: (request: CapturedRequest) => FakeResponse | Promise<FakeResponse>
): FakeOpenAI {
  const calls: CapturedRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request: CapturedRequest = {
      url: input instanceof Request ? input.url : input.toString(),
      headers: new Headers(init?.headers),
      body: parseBody(init?.body),
    };
    calls.push(request);

    const { status, json } = await respond(request);
    return new Response(JSON.stringify(json), {
      status,
      headers: { 'content-type': 'application/json' },
    });
  };

  return { calls, fetch: fakeFetch };
}

/**
 * Chat completion body whose message content is `content`.
 */
export function chatCompletion(content: string | null, refusal: string | null = null): unknown {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content, refusal },
        logprobs: null,
        finish_reason: 'stop',
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 20, total_tokens: 30 },
  };
}

export function recordsCompletion(entries: ExtractedRecord[]): FakeResponse {
  return { status: 200, json: chatCompletion(JSON.stringify({ entries })) };
}

/**
 * Read the first worksheet back as rows of cell values.
 */
export async function readSheet(buffer: Buffer): Promise<{
  workbook: Workbook;
  worksheet: Worksheet;
  rows: Array<[unknown, unknown, unknown]>;
}> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  const worksheet = workbook.worksheets[0];

  const rows: Array<[unknown, unknown, unknown]> = [];
  for (let r = 1; r <= worksheet.rowCount; r++) {
    const row = worksheet.getRow(r);
    rows.push([row.getCell(1).value, row.getCell(2).value, row.getCell(3).value]);
  }

  return { workbook, worksheet, rows };
}
