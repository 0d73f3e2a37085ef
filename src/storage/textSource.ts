import fs from 'node:fs/promises';
import path from 'node:path';
import JSZip from 'jszip';
import { parse } from 'node-html-parser';
import { SourceReadError } from '../errors';
import logger from '../utils/logger';

/** Turns a source identifier into the plain text of that source. */
export interface TextSource {
  read(sourceId: string): Promise<string>;
}

const UNSUPPORTED_EXTENSIONS = new Set(['.mobi', '.docx']);

const EPUB_CONTAINER = 'META-INF/container.xml';

async function readPdfText(file: string): Promise<string> {
  // Loaded lazily: plain-text runs never pay for the PDF parser.
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const data = new Uint8Array(await fs.readFile(file));
  // verbosity 0 keeps font warnings off stdout, where the drill is printed.
  const pdf = await getDocument({ data, isEvalSupported: false, verbosity: 0 })
    .promise;
  try {
    let text = '';
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      for (const item of content.items) {
        if ('str' in item) {
          text += item.hasEOL ? `${item.str}\n` : item.str;
        }
      }
      text += '\n';
    }
    return text;
  } finally {
    await pdf.destroy();
  }
}

async function readZipEntry(zip: JSZip, name: string): Promise<string> {
  const entry = zip.file(name);
  if (!entry) {
    throw new Error(`EPUB entry ${name} is missing`);
  }
  return entry.async('string');
}

/**
 * Extract the text of an EPUB in reading order: container.xml points at the
 * package document, whose spine lists the content documents.
 */
async function readEpubText(file: string): Promise<string> {
  const zip = await JSZip.loadAsync(await fs.readFile(file));

  const container = parse(await readZipEntry(zip, EPUB_CONTAINER));
  const packagePath = container
    .querySelector('rootfile')
    ?.getAttribute('full-path');
  if (!packagePath) {
    throw new Error(`${EPUB_CONTAINER} names no package document`);
  }

  const packageDoc = parse(await readZipEntry(zip, packagePath));
  const baseDir = path.posix.dirname(packagePath);
  const manifest = new Map<string, string>();
  for (const item of packageDoc.querySelectorAll('item')) {
    const id = item.getAttribute('id');
    const href = item.getAttribute('href');
    if (id && href) manifest.set(id, href);
  }

  const chapters: string[] = [];
  for (const itemref of packageDoc.querySelectorAll('itemref')) {
    const href = manifest.get(itemref.getAttribute('idref') ?? '');
    if (!href) continue;
    const html = await readZipEntry(
      zip,
      path.posix.join(baseDir, decodeURIComponent(href))
    );
    const root = parse(html);
    chapters.push((root.querySelector('body') ?? root).structuredText);
  }
  return chapters.join('\n');
}

/**
 * Reads plain-text files as UTF-8, the text layer of PDFs and the spine
 * documents of EPUBs.
 */
export class FileTextSource implements TextSource {
  async read(sourceId: string): Promise<string> {
    const extension = path.extname(sourceId).toLowerCase();
    if (UNSUPPORTED_EXTENSIONS.has(extension)) {
      throw new SourceReadError(
        sourceId,
        `Unsupported practice text format "${extension}": ${sourceId}`
      );
    }

    try {
      let text: string;
      if (extension === '.pdf') {
        text = await readPdfText(sourceId);
      } else if (extension === '.epub') {
        text = await readEpubText(sourceId);
      } else {
        text = await fs.readFile(sourceId, 'utf8');
      }
      logger.debug(`Read ${text.length} characters from ${sourceId}`);
      return text;
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceReadError(
        sourceId,
        `Could not read practice text ${sourceId}: ${reason}`,
        { cause: error }
      );
    }
  }
}
