/**
 * 문서 엔진 어댑터 계약
 *
 * 파이프라인은 이 인터페이스로만 문서에 접근합니다.
 * extractFragments()가 돌려주는 객체는 엔진이 소유한 원본이며,
 * text를 바꾸면 save() 시 해당 위치에 반영되어야 합니다.
 */

import type { EngineFragment } from '@/ai/page-translation/types';

export interface DocumentPage {
  /** 1부터 시작 */
  readonly pageNumber: number;
  extractFullText(): Promise<string>;
  /** 항상 같은 순서/같은 객체를 돌려줘야 함 */
  extractFragments(): Promise<EngineFragment[]>;
  extractParagraphs(): Promise<string[]>;
}

export interface PagedDocument {
  readonly pageCount: number;
  getPage(pageNumber: number): DocumentPage;
  save(outputPath: string): Promise<void>;
}

export interface DocumentEngine {
  openDocument(path: string): Promise<PagedDocument>;
}
