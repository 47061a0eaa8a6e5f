import pdfParse from 'pdf-parse';
import { ExtractionFailure } from './errorHandler';
import { logger } from './logger';

export interface UploadedDocument {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

export function isPdf(file: UploadedDocument): boolean {
  return file.mimetype === 'application/pdf' || file.originalname.toLowerCase().endsWith('.pdf');
}

async function extractPdfText(buffer: Buffer): Promise<string> {
  let text: string;
  try {
    const pdfData = await pdfParse(buffer);
    text = pdfData.text;
  } catch (error) {
    logger.error('PDF conversion failed', { error });
    throw new ExtractionFailure('could not read PDF document');
  }

  if (!text.trim()) {
    throw new ExtractionFailure('PDF document contains no extractable text');
  }
  return text;
}

function decodeUtf8(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch (error) {
    logger.error('Text decoding failed', { error });
    throw new ExtractionFailure('document is not valid UTF-8 text');
  }
}

/**
 * Turn an uploaded document into plain text. PDFs are converted, everything
 * else is decoded as UTF-8. An empty text file is valid and yields "".
 * Length is bounded by the upload limit only; the text is never cut.
 */
export async function parseFile(file: UploadedDocument): Promise<string> {
  const text = isPdf(file) ? await extractPdfText(file.buffer) : decodeUtf8(file.buffer);

  // Normalize whitespace
  return text.replace(/\s+/g, ' ').trim();
}
