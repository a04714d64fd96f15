import pdf from 'pdf-parse';
import { ValidationError, errorMessage } from '../../core/errors.js';
import type { ITextExtractor, UploadedDocument } from '../../core/interfaces/ICollaborators.js';

const PDF_MAGIC = '%PDF';
// pdf-parse opens every page with a blank line
const PAGE_SEPARATOR = '\n\n';

export function isPdf(content: Buffer): boolean {
  return content.subarray(0, PDF_MAGIC.length).toString('latin1') === PDF_MAGIC;
}

/**
 * Reads the text layer of PDF uploads; anything else goes to `fallback`
 */
export class PdfTextExtractor implements ITextExtractor {
  constructor(private fallback: ITextExtractor) {}

  async extract(document: UploadedDocument): Promise<string> {
    if (!isPdf(document.content)) {
      return this.fallback.extract(document);
    }

    let raw: string;
    try {
      raw = (await pdf(document.content)).text;
    } catch (error) {
      throw new ValidationError(`Cannot read ${document.filename}: ${errorMessage(error)}`, [
        'document is not a readable PDF',
      ]);
    }

    const text = raw
      .split(PAGE_SEPARATOR)
      .map((page) => page.replace(/\r\n/g, '\n').trim())
      .filter((page) => page !== '')
      .join(PAGE_SEPARATOR);
    if (text === '') {
      throw new ValidationError(`No extractable text found in ${document.filename} (it might be scanned images)`, [
        'document has no text layer',
      ]);
    }
    return text;
  }
}
