import * as http from 'http';
import { BadRequestError } from '../errors.js';

/** One file part of a multipart body */
export interface MultipartFile {
  field: string;
  filename: string;
  contentType: string;
  data: Buffer;
}

/** Parsed multipart/form-data body */
export interface MultipartForm {
  files: MultipartFile[];
  fields: Record<string, string>;
}

/**
 * File Utilities
 * Request body reading and multipart encoding for the HTTP surface
 */
export class FileUtils {
  /**
   * Extract boundary from Content-Type header
   */
  static extractBoundary(contentType: string): string | null {
    const match = contentType.match(/boundary=(?:"([^"]+)"|([^;]+))/);
    return match ? (match[1] || match[2]) : null;
  }

  /**
   * Split buffer by delimiter
   */
  static splitBuffer(buffer: Buffer, delimiter: Buffer): Buffer[] {
    const parts: Buffer[] = [];
    let start = 0;
    let index = buffer.indexOf(delimiter);

    while (index !== -1) {
      parts.push(buffer.subarray(start, index));
      start = index + delimiter.length;
      index = buffer.indexOf(delimiter, start);
    }

    if (start < buffer.length) {
      parts.push(buffer.subarray(start));
    }

    return parts;
  }

  /**
   * Read a whole request body, refusing anything over `limit` bytes.
   * An oversized body is still drained so the error reply reaches the caller.
   */
  static readBody(req: http.IncomingMessage, limit: number = Infinity): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      let chunks: Buffer[] = [];
      let received = 0;
      let overflowed = false;

      req.on('data', (chunk: Buffer) => {
        if (overflowed) {
          return;
        }
        received += chunk.length;
        if (received > limit) {
          overflowed = true;
          chunks = [];
          reject(new BadRequestError(`Request body exceeds ${limit} bytes`));
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => resolve(Buffer.concat(chunks)));
      req.on('error', reject);
    });
  }

  /**
   * Read and parse a JSON request body
   */
  static async readJson(req: http.IncomingMessage, limit: number = 1024 * 1024): Promise<unknown> {
    const body = await FileUtils.readBody(req, limit);
    try {
      return JSON.parse(body.toString('utf-8'));
    } catch {
      throw new BadRequestError('Invalid JSON body');
    }
  }

  /**
   * Parse a multipart/form-data body
   */
  static parseMultipart(buffer: Buffer, boundary: string): MultipartForm {
    const form: MultipartForm = { files: [], fields: {} };
    const parts = FileUtils.splitBuffer(buffer, Buffer.from(`--${boundary}`));
    const separator = Buffer.from('\r\n\r\n');

    for (const part of parts) {
      if (part.length === 0) continue;

      const separatorIndex = part.indexOf(separator);
      if (separatorIndex === -1) continue;

      const headers = part.subarray(0, separatorIndex).toString('utf-8');
      let data = part.subarray(separatorIndex + separator.length);

      // Strip the CRLF that precedes the next boundary
      if (data.length >= 2 && data[data.length - 2] === 0x0d && data[data.length - 1] === 0x0a) {
        data = data.subarray(0, -2);
      }

      const nameMatch = headers.match(/name="([^"]*)"/);
      if (!nameMatch) continue;

      const filenameMatch = headers.match(/filename="([^"]*)"/);
      if (filenameMatch) {
        const contentTypeMatch = headers.match(/Content-Type: (.+)/i);
        form.files.push({
          field: nameMatch[1],
          filename: filenameMatch[1],
          contentType: contentTypeMatch ? contentTypeMatch[1].trim() : 'application/octet-stream',
          data,
        });
      } else {
        form.fields[nameMatch[1]] = data.toString('utf-8');
      }
    }

    return form;
  }

  /**
   * Read and parse a multipart/form-data request
   */
  static async readMultipart(req: http.IncomingMessage, limit?: number): Promise<MultipartForm> {
    const contentType = req.headers['content-type'] || '';
    if (!contentType.includes('multipart/form-data')) {
      throw new BadRequestError('Expected multipart/form-data');
    }

    const boundary = FileUtils.extractBoundary(contentType);
    if (!boundary) {
      throw new BadRequestError('Invalid multipart boundary');
    }

    return FileUtils.parseMultipart(await FileUtils.readBody(req, limit), boundary);
  }

  /**
   * Encode one file and some text fields as multipart/form-data
   */
  static buildMultipart(
    file: { field: string; filename: string; data: Buffer },
    fields: Record<string, string> = {}
  ): { body: Buffer; contentType: string } {
    const boundary = `----LanbeamBoundary${Date.now()}${Math.random().toString(16).slice(2)}`;
    const parts: Buffer[] = [];

    for (const [name, value] of Object.entries(fields)) {
      parts.push(Buffer.from(`--${boundary}\r\n`));
      parts.push(Buffer.from(`Content-Disposition: form-data; name="${name}"\r\n\r\n`));
      parts.push(Buffer.from(value, 'utf-8'));
      parts.push(Buffer.from('\r\n'));
    }

    parts.push(Buffer.from(`--${boundary}\r\n`));
    parts.push(Buffer.from(`Content-Disposition: form-data; name="${file.field}"; filename="${escapeQuotes(file.filename)}"\r\n`));
    parts.push(Buffer.from('Content-Type: application/octet-stream\r\n\r\n'));
    parts.push(file.data);
    parts.push(Buffer.from('\r\n'));
    parts.push(Buffer.from(`--${boundary}--\r\n`));

    return {
      body: Buffer.concat(parts),
      contentType: `multipart/form-data; boundary=${boundary}`,
    };
  }
}

function escapeQuotes(value: string): string {
  return value.replace(/"/g, '%22');
}
