/**
 * PPTX 문서 엔진
 * - 슬라이드 = 페이지 (프레젠테이션 표시 순서)
 * - <a:t> run = 조각, <a:p> = 문단
 *
 * zip 해제/압축은 fflate 비동기 API로 처리 (Node에서는 worker thread에서 실행됨)
 */

import { readFile, writeFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { unzip, zip } from 'fflate';
import type { EngineFragment } from '@/ai/page-translation/types';
import type { DocumentEngine, DocumentPage, PagedDocument } from '@/document/types';
import {
  decodeUtf8,
  encodeUtf8,
  extractParagraphTexts,
  extractRunTexts,
  replaceRunTexts,
  resolveSlideOrder,
} from './pptxXml';

const unzipAsync = promisify(
  (
    data: Uint8Array,
    cb: (err: Error | null, result: Record<string, Uint8Array>) => void,
  ) => unzip(data, cb),
);

const zipAsync = promisify(
  (
    data: Record<string, Uint8Array>,
    cb: (err: Error | null, result: Uint8Array) => void,
  ) => zip(data, cb),
);

class PptxSlidePage implements DocumentPage {
  private fragments: EngineFragment[] | null = null;

  constructor(
    readonly pageNumber: number,
    readonly path: string,
    private readonly xml: string,
  ) {}

  async extractFullText(): Promise<string> {
    return extractParagraphTexts(this.xml).join('\n');
  }

  async extractFragments(): Promise<EngineFragment[]> {
    // 같은 객체를 돌려줘야 번역 결과가 save()에 반영됨
    if (!this.fragments) {
      this.fragments = extractRunTexts(this.xml).map((text) => ({ text }));
    }
    return this.fragments;
  }

  async extractParagraphs(): Promise<string[]> {
    return extractParagraphTexts(this.xml);
  }

  /** 조각이 추출된 적이 없으면 원본 XML 그대로 */
  renderXml(): string {
    if (!this.fragments) return this.xml;
    return replaceRunTexts(this.xml, this.fragments.map((f) => f.text));
  }
}

export class PptxDocument implements PagedDocument {
  private readonly pages: PptxSlidePage[];

  constructor(private readonly files: Record<string, Uint8Array>) {
    this.pages = resolveSlideOrder(files).map((path, index) => {
      const data = files[path];
      if (!data) {
        throw new Error(`File not found in PPTX: ${path}`);
      }
      return new PptxSlidePage(index + 1, path, decodeUtf8(data));
    });
  }

  get pageCount(): number {
    return this.pages.length;
  }

  getPage(pageNumber: number): DocumentPage {
    const page = this.pages[pageNumber - 1];
    if (!page) {
      throw new RangeError(`Page ${pageNumber} is out of range (1..${this.pages.length})`);
    }
    return page;
  }

  async toBytes(): Promise<Uint8Array> {
    const output: Record<string, Uint8Array> = { ...this.files };
    for (const page of this.pages) {
      output[page.path] = encodeUtf8(page.renderXml());
    }
    return zipAsync(output);
  }

  async save(outputPath: string): Promise<void> {
    await writeFile(outputPath, await this.toBytes());
  }

  static async fromBytes(data: Uint8Array): Promise<PptxDocument> {
    return new PptxDocument(await unzipAsync(data));
  }
}

export const pptxDocumentEngine: DocumentEngine = {
  async openDocument(path: string): Promise<PagedDocument> {
    const buffer = await readFile(path);
    return PptxDocument.fromBytes(new Uint8Array(buffer));
  },
};
