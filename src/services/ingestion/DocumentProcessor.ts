import { readFile } from 'fs/promises';
import { basename } from 'path';
import * as cheerio from 'cheerio';
import mammoth from 'mammoth';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { logger } from '../../utils/logger.js';
import { ConversionError, errorMessage } from '../../utils/errors.js';
import type { SourceFile } from '../../domain/entities/SourceFile.js';

export interface ExtractedText {
  text: string;
  metadata: {
    fileName: string;
    fileSize: number;
    pageCount?: number;
    title?: string;
  };
}

export interface TextExtractor {
  extract(source: SourceFile): Promise<ExtractedText>;
}

const HTML_NOISE = 'script, style, noscript, template';

export function collapseWhitespace(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function htmlToText(html: string): { text: string; title?: string } {
  const $ = cheerio.load(html);
  const title = $('title').first().text().trim() || undefined;
  $(HTML_NOISE).remove();
  $('br').replaceWith('\n');
  $('p, div, li, h1, h2, h3, h4, h5, h6, tr').append('\n');

  const body = $('body');
  const text = body.length > 0 ? body.text() : $.root().text();
  return { text: collapseWhitespace(text), title };
}

/**
 * Turns every supported source kind into plain text. Plain text files are
 * passed through even when empty; every other kind must yield some text.
 */
export class DocumentProcessor implements TextExtractor {
  async extract(source: SourceFile): Promise<ExtractedText> {
    const fileName = basename(source.absolutePath);
    let buffer: Buffer;
    try {
      buffer = await readFile(source.absolutePath);
    } catch (error) {
      throw new ConversionError(`Cannot read ${fileName}: ${errorMessage(error)}`, error);
    }

    const extracted = await this.extractByKind(source, fileName, buffer);
    if (source.kind !== 'text' && extracted.text.trim().length === 0) {
      throw new ConversionError(`${source.kind.toUpperCase()} extraction produced no text: ${fileName}`);
    }
    return extracted;
  }

  private async extractByKind(source: SourceFile, fileName: string, buffer: Buffer): Promise<ExtractedText> {
    switch (source.kind) {
      case 'pdf':
        return this.processPDF(fileName, buffer);
      case 'docx':
        return this.processDocx(fileName, buffer);
      case 'html':
        return this.processHtml(fileName, buffer);
      case 'text':
        return this.processText(fileName, buffer);
    }
  }

  private async processPDF(fileName: string, buffer: Buffer): Promise<ExtractedText> {
    try {
      const data = await pdfParse(buffer);
      logger.debug({ fileName, pageCount: data.numpages }, 'Processed PDF');
      return {
        text: data.text,
        metadata: { fileName, fileSize: buffer.length, pageCount: data.numpages },
      };
    } catch (error) {
      logger.error({ error, fileName }, 'PDF processing failed');
      throw new ConversionError(`Failed to process PDF file: ${errorMessage(error)}`, error);
    }
  }

  private async processDocx(fileName: string, buffer: Buffer): Promise<ExtractedText> {
    try {
      const result = await mammoth.extractRawText({ buffer });
      if (result.messages.length > 0) {
        logger.debug({ fileName, messages: result.messages.map(m => m.message) }, 'DOCX extraction notes');
      }
      logger.debug({ fileName, size: buffer.length }, 'Processed DOCX');
      return {
        text: result.value.trim(),
        metadata: { fileName, fileSize: buffer.length },
      };
    } catch (error) {
      logger.error({ error, fileName }, 'DOCX processing failed');
      throw new ConversionError(`Failed to process DOCX file: ${errorMessage(error)}`, error);
    }
  }

  private async processHtml(fileName: string, buffer: Buffer): Promise<ExtractedText> {
    try {
      const { text, title } = htmlToText(buffer.toString('utf-8'));
      logger.debug({ fileName, textLength: text.length }, 'Processed HTML');
      return {
        text,
        metadata: { fileName, fileSize: buffer.length, title },
      };
    } catch (error) {
      logger.error({ error, fileName }, 'HTML processing failed');
      throw new ConversionError(`Failed to process HTML file: ${errorMessage(error)}`, error);
    }
  }

  private async processText(fileName: string, buffer: Buffer): Promise<ExtractedText> {
    const text = buffer.toString('utf-8');
    logger.debug({ fileName, size: buffer.length }, 'Processed text file');
    return {
      text,
      metadata: { fileName, fileSize: buffer.length },
    };
  }
}
