/**
 * Multipart Upload Parsing
 *
 * Reads the `apiKey` field and the `file` part of a multipart/form-data
 * request with busboy, buffering the PDF in memory.
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { Readable } from 'node:stream';
import busboy from 'busboy';

export interface DocumentUpload {
  apiKey: string;
  file: {
    filename: string;
    mimeType: string;
    data: Buffer;
  } | null;
}

export class UploadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UploadError';
  }
}

/** The parts of an incoming request the parser reads; express requests qualify. */
export type UploadRequest = Readable & {
  headers: IncomingHttpHeaders;
  complete: boolean;
};

const PDF_MIME_TYPES = new Set(['application/pdf', 'application/x-pdf']);

function isPdfUpload(filename: string, mimeType: string): boolean {
  return PDF_MIME_TYPES.has(mimeType.toLowerCase()) || filename.toLowerCase().endsWith('.pdf');
}

/**
 * Parse the upload form. Rejects with UploadError on a malformed body, a
 * non-PDF file, a file over `maxFileBytes` or a request that closes before
 * its body is complete.
 */
export function parseDocumentUpload(req: UploadRequest, maxFileBytes: number): Promise<DocumentUpload> {
  const contentType = req.headers['content-type'] || '';
  if (!contentType.toLowerCase().startsWith('multipart/form-data')) {
    return Promise.reject(
      new UploadError('Invalid content type. Expected multipart/form-data')
    );
  }

  return new Promise<DocumentUpload>((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: req.headers,
        limits: { fileSize: maxFileBytes, files: 1 },
      });
    } catch (error) {
      reject(new UploadError('Invalid multipart/form-data request', { cause: error }));
      return;
    }

    let apiKey = '';
    let file: DocumentUpload['file'] = null;
    let failure: UploadError | null = null;

    parser.on('file', (fieldname, stream, info) => {
      if (fieldname !== 'file') {
        stream.resume();
        return;
      }

      if (!isPdfUpload(info.filename, info.mimeType)) {
        failure = new UploadError('Only PDF files are accepted');
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];

      stream.on('data', (data: Buffer) => {
        chunks.push(data);
      });

      stream.on('limit', () => {
        failure = new UploadError(`Uploaded file is larger than ${maxFileBytes} bytes`);
      });

      stream.on('end', () => {
        if (!failure && chunks.length > 0) {
          file = {
            filename: info.filename,
            mimeType: info.mimeType,
            data: Buffer.concat(chunks),
          };
        }
      });
    });

    parser.on('field', (fieldname, value) => {
      if (fieldname === 'apiKey') {
        apiKey = value;
      }
    });

    // busboy never finishes when the client goes away mid-body
    const onRequestClose = () => {
      if (req.complete) return;
      req.unpipe(parser);
      parser.destroy();
      reject(new UploadError('Upload was aborted before it completed'));
    };
    req.on('close', onRequestClose);

    parser.on('error', (error) => {
      req.off('close', onRequestClose);
      reject(new UploadError('Invalid multipart/form-data request', { cause: error }));
    });

    parser.on('close', () => {
      req.off('close', onRequestClose);
      if (failure) {
        reject(failure);
        return;
      }
      resolve({ apiKey, file });
    });

    req.pipe(parser);
  });
}
