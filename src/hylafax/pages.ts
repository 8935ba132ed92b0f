import path from 'node:path';

import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';

const TEXT_LINES_PER_PAGE = 66;

function postscriptPages(text: string): number {
  const declared = /^%%Pages:\s*(\d+)/m.exec(text);
  if (declared) return Number(declared[1]);
  const pages = text.match(/^%%Page:/gm);
  return pages ? pages.length : 1;
}

/** Plain text is imaged at a fixed number of lines per page; form feeds start a new page. */
function textPages(text: string): number {
  return text.split('\f').reduce((total, sheet) => {
    const lines = sheet.replace(/\r?\n$/, '').split(/\r?\n/).length;
    return total + Math.max(1, Math.ceil(lines / TEXT_LINES_PER_PAGE));
  }, 0);
}

/**
 * Counts the pages a document will fax as, by its extension. Unknown types
 * count as zero.
 */
export async function countPages(fileName: string, content: Buffer): Promise<number> {
  const extension = path.extname(fileName).slice(1).toLowerCase();
  switch (extension) {
    case 'pdf': {
      const document = await PDFDocument.load(content, { ignoreEncryption: true, updateMetadata: false });
      return document.getPageCount();
    }
    case 'tif':
    case 'tiff': {
      const metadata = await sharp(content).metadata();
      return metadata.pages ?? 1;
    }
    case 'ps':
      return postscriptPages(content.toString('latin1'));
    case 'txt':
      return textPages(content.toString('utf8'));
    default:
      return 0;
  }
}
