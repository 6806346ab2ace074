/**
 * 문서 전체 페이지 스케줄러
 *
 * - 페이지마다 파이프라인을 동시에 실행 (worker pool, concurrency 0 = 전체 동시)
 * - 모든 페이지 작업이 끝날 때까지 기다린 뒤(join) 문서를 한 번만 저장
 * - 기본은 best-effort: 실패한 페이지는 원문을 유지한 채 저장하고 RunReport로 보고
 * - failFast: 첫 실패에서 나머지 페이지를 취소하고 저장하지 않음 (PageRunFailedError)
 */

import type { DocumentPage, PagedDocument } from '@/document/types';
import type { PageProgressStoreApi } from '@/stores/pageProgressStore';
import type { DiagnosticsSink } from '@/utils/diagnostics';
import {
  ExtractionFailureError,
  PageRunFailedError,
  PersistenceFailureError,
  type PageFailure,
} from './errors';
import type { FailedPageOutcome, PageOutcome, RunReport } from './types';

export interface PageRunner {
  runPage(page: DocumentPage, options?: { signal?: AbortSignal | undefined }): Promise<PageOutcome>;
}

export interface PageSchedulerOptions {
  pipeline: PageRunner;
  sink: DiagnosticsSink;
  /** 동시에 처리할 페이지 수 (0 이하 = 전체 페이지 동시) */
  concurrency?: number | undefined;
  failFast?: boolean | undefined;
  store?: PageProgressStoreApi | undefined;
}

export class PageScheduler {
  constructor(private readonly options: PageSchedulerOptions) {}

  async processDocument(document: PagedDocument, outputPath: string): Promise<RunReport> {
    const { pipeline, sink, store } = this.options;
    const failFast = this.options.failFast ?? false;
    const totalPages = document.pageCount;
    const concurrency = this.options.concurrency ?? 0;
    const workerCount = concurrency > 0 ? Math.min(concurrency, totalPages) : totalPages;

    store?.getState().initPages(totalPages);
    sink.info(`Translating ${totalPages} page(s) with ${workerCount} worker(s)${failFast ? ' (fail-fast)' : ''}`);

    const controller = new AbortController();
    const outcomes = new Map<number, PageOutcome>();
    const skipped: number[] = [];
    let nextPage = 1;

    const runOne = async (pageNumber: number): Promise<PageOutcome> => {
      let page: DocumentPage;
      try {
        page = document.getPage(pageNumber);
      } catch (error) {
        const failure = new ExtractionFailureError(pageNumber, 'extract_full_text', error);
        store?.getState().markFailed(pageNumber, failure.kind, failure.message);
        return { status: 'failed', pageNumber, error: failure, timings: [] };
      }
      return pipeline.runPage(page, failFast ? { signal: controller.signal } : undefined);
    };

    const worker = async () => {
      while (nextPage <= totalPages) {
        const pageNumber = nextPage++;
        if (controller.signal.aborted) {
          skipped.push(pageNumber);
          store?.getState().markSkipped(pageNumber);
          continue;
        }

        const outcome = await runOne(pageNumber);
        outcomes.set(pageNumber, outcome);

        if (outcome.status === 'failed' && failFast && !controller.signal.aborted) {
          sink.warn(`Page ${pageNumber} failed, cancelling remaining pages: ${outcome.error.message}`);
          controller.abort();
        }
      }
    };

    // join: 모든 작업이 끝난 뒤에만 저장 여부를 판단
    const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    const crashed = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (crashed) {
      throw crashed.reason;
    }

    const ordered = [...outcomes.values()].sort((a, b) => a.pageNumber - b.pageNumber);
    const succeeded = ordered.filter((outcome) => outcome.status === 'success').map((outcome) => outcome.pageNumber);
    const failed = ordered.filter((outcome): outcome is FailedPageOutcome => outcome.status === 'failed');
    skipped.sort((a, b) => a - b);

    if (failFast && failed.length > 0) {
      const failures = rootFailures(failed);
      this.logSummary(totalPages, succeeded, failed, skipped, false);
      throw new PageRunFailedError(failures);
    }

    try {
      await document.save(outputPath);
    } catch (error) {
      throw new PersistenceFailureError(outputPath, error);
    }
    store?.getState().markSaved();
    sink.info(`Saved translated document to ${outputPath}`);
    this.logSummary(totalPages, succeeded, failed, skipped, true);

    return { totalPages, succeeded, failed, skipped, saved: true, outputPath };
  }

  private logSummary(
    totalPages: number,
    succeeded: number[],
    failed: FailedPageOutcome[],
    skipped: number[],
    saved: boolean
  ): void {
    const { sink } = this.options;
    sink.addMessage('run_summary', `Pages: ${totalPages}, succeeded: ${succeeded.length}, failed: ${failed.length}, skipped: ${skipped.length}`);
    for (const outcome of failed) {
      sink.addMessage('run_summary', `- page ${outcome.pageNumber} (${outcome.error.kind}): ${outcome.error.message}`);
    }
    sink.addMessage('run_summary', saved ? 'Document saved' : 'Document NOT saved');
    sink.flushGroup('run_summary', { title: 'Run summary', color: failed.length > 0 ? 'yellow' : 'green' });
  }
}

/**
 * 취소로 끝난 페이지를 빼고 실제 원인만 남긴다
 */
function rootFailures(failed: FailedPageOutcome[]): PageFailure[] {
  const causes = failed.filter((outcome) => outcome.error.kind !== 'aborted');
  return (causes.length > 0 ? causes : failed).map((outcome) => outcome.error);
}
