import { ExtractionFailedError, UnsupportedFileTypeError, errorMessage } from './errors';
import { SUPPORTED_FILE_TYPES, type FileType, type TextUnit } from './types';

/** Returns the text of every page, in page order, including empty pages. */
export type PdfPageReader = (bytes: Uint8Array) => Promise<string[]>;

export function isSupportedFileType(fileType: string): fileType is FileType {
  return SUPPORTED_FILE_TYPES.some(supported => supported === fileType);
}

export const readPdfPages: PdfPageReader = async bytes => {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdf.js takes ownership of the buffer it is given, so hand it a copy.
  const loadingTask = getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
  });
  const pdf = await loadingTask.promise;
  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      pages.push(
        content.items
          .map(item => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
          .join(''),
      );
      page.cleanup();
    }
    return pages;
  } finally {
    await loadingTask.destroy();
  }
};

export class TextExtractor {
  constructor(private readonly readPdf: PdfPageReader = readPdfPages) {}

  async extract(bytes: Uint8Array, fileType: string, fileName: string): Promise<TextUnit[]> {
    const type = fileType.toLowerCase();
    if (!isSupportedFileType(type)) {
      throw new UnsupportedFileTypeError(fileType, SUPPORTED_FILE_TYPES);
    }

    console.log(`[EXTRACT] Extracting ${fileName} (${type}, ${bytes.byteLength} bytes)`);
    return type === 'pdf' ? this.extractPdf(bytes, fileName) : [{ text: this.decodeText(bytes, fileName) }];
  }

  private async extractPdf(bytes: Uint8Array, fileName: string): Promise<TextUnit[]> {
    let pages: string[];
    try {
      pages = await this.readPdf(bytes);
    } catch (error) {
      console.error(`[EXTRACT] Failed to read PDF ${fileName}:`, error);
      throw new ExtractionFailedError(`Could not read PDF ${fileName}: ${errorMessage(error)}`, error);
    }

    const units: TextUnit[] = [];
    pages.forEach((text, index) => {
      if (text.trim()) {
        units.push({ text, pageNumber: index + 1 });
      }
    });
    console.log(`[EXTRACT] ${fileName}: ${units.length} of ${pages.length} pages contain text`);
    return units;
  }

  private decodeText(bytes: Uint8Array, fileName: string): string {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      throw new ExtractionFailedError(`${fileName} is not valid UTF-8 text`, error);
    }
  }
}
