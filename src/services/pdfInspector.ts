import fs from 'fs';
import { getDocumentProxy } from 'unpdf';

export interface PdfInspector {
  countPages(filePath: string): Promise<number>;
}

export class UnpdfInspector implements PdfInspector {
  async countPages(filePath: string): Promise<number> {
    const pdfBuffer: Buffer = await fs.promises.readFile(filePath);
    const binaryData = new Uint8Array(pdfBuffer.buffer.slice(pdfBuffer.byteOffset, pdfBuffer.byteOffset + pdfBuffer.byteLength));
    const document = await getDocumentProxy(binaryData);

    try {
      return document.numPages;
    } finally {
      await document.destroy();
    }
  }
}
