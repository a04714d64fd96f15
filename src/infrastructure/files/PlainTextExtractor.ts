import { ValidationError } from '../../core/errors.js';
import type { ITextExtractor, UploadedDocument } from '../../core/interfaces/ICollaborators.js';
import { isPdf } from './PdfTextExtractor.js';

/**
 * Decodes UTF-8 text uploads. PDFs are left to PdfTextExtractor.
 */
export class PlainTextExtractor implements ITextExtractor {
  async extract(document: UploadedDocument): Promise<string> {
    if (isPdf(document.content)) {
      throw new ValidationError(`Cannot read ${document.filename}: PDF parsing is not available`, [
        'document must be plain UTF-8 text',
      ]);
    }

    const text = document.content.toString('utf8').replace(/\r\n/g, '\n').trim();
    if (text === '') {
      throw new ValidationError(`No text could be read from ${document.filename}`, ['document is empty']);
    }
    return text;
  }
}
