/**
 * HTML Views
 *
 * The upload form and the result page, rendered with Handlebars. Everything
 * interpolated is HTML-escaped; the credential is never echoed back.
 */

import Handlebars from 'handlebars';
import type { ExtractedRecord } from '@doc-structurer/shared';

export interface ResultView {
  fileName: string;
  downloadHref: string;
  records: ExtractedRecord[];
  recordCount: number;
  pageCount: number;
}

export interface PageView {
  warning: string | null;
  error: string | null;
  result: ResultView | null;
}

const PAGE_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>AI Document Structurer</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 0; display: flex; min-height: 100vh; }
    aside { width: 18rem; padding: 1.5rem; background: #f3f5f9; }
    main { flex: 1; padding: 1.5rem 2rem; }
    table { border-collapse: collapse; width: 100%; }
    th { background: #4f81bd; color: #fff; text-align: left; }
    th, td { border: 1px solid #ccc; padding: 0.4rem; vertical-align: top; white-space: pre-wrap; }
    .warning { background: #fff4ce; padding: 0.75rem; }
    .error { background: #fde7e9; padding: 0.75rem; }
    .success { background: #dff6dd; padding: 0.75rem; }
  </style>
</head>
<body>
  <form method="post" action="/process" enctype="multipart/form-data" style="display: contents">
    <aside>
      <h2>Configuration</h2>
      <label for="apiKey">OpenAI API Key</label>
      <input id="apiKey" name="apiKey" type="password" autocomplete="off" required>
      <p>Your key is used only for this request and is not stored.</p>
      <hr>
      <p><strong>Instructions:</strong></p>
      <ol>
        <li>Enter API Key.</li>
        <li>Upload PDF.</li>
        <li>Download Excel.</li>
      </ol>
    </aside>
    <main>
      <h1>AI-Powered Document Structuring</h1>
      <p>This tool transforms unstructured PDFs into structured Excel files.</p>
      <ul>
        <li><strong>Extracts Key:Value pairs</strong></li>
        <li><strong>Captures 100% of data</strong></li>
        <li><strong>Preserves original wording</strong></li>
      </ul>
      <hr>
      <label for="file">Upload your PDF</label>
      <input id="file" name="file" type="file" accept="application/pdf,.pdf" required>
      <button type="submit">Process Document</button>
      {{#if warning}}
      <p class="warning">{{warning}}</p>
      {{/if}}
      {{#if error}}
      <p class="error">{{error}}</p>
      {{/if}}
      {{#if result}}
      <p class="success">Processing Complete!</p>
      <h2>Data Preview</h2>
      <p>{{result.recordCount}} records from {{result.pageCount}} pages</p>
      <table>
        <thead>
          <tr><th>key</th><th>value</th><th>comments</th></tr>
        </thead>
        <tbody>
          {{#each result.records}}
          <tr><td>{{key}}</td><td>{{value}}</td><td>{{comments}}</td></tr>
          {{/each}}
        </tbody>
      </table>
      <p><a href="{{result.downloadHref}}" download="{{result.fileName}}">Download Formatted Excel</a></p>
      {{/if}}
    </main>
  </form>
</body>
</html>
`;

const renderPage = Handlebars.compile<PageView>(PAGE_TEMPLATE, { strict: true });

export function renderUploadPage(view: Partial<PageView> = {}): string {
  return renderPage({
    warning: view.warning ?? null,
    error: view.error ?? null,
    result: view.result ?? null,
  });
}

/**
 * data: URI carrying the workbook, so the download needs no server-side state.
 */
export function toDownloadHref(spreadsheet: Buffer, mimeType: string): string {
  return `data:${mimeType};base64,${spreadsheet.toString('base64')}`;
}
