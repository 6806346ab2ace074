/**
 * 페이지 단위 문서 번역 CLI
 *
 * 사용법:
 * npx tsx src/cli.ts <input.pptx> <output.pptx> --from German --to English [--concurrency 4] [--fail-fast]
 *
 * 환경변수:
 * - PAGE_TRANSLATOR_PROVIDER (openai | anthropic | mock)
 * - OPENAI_API_KEY / ANTHROPIC_API_KEY
 */

import { getPipelineConfig, type PipelineConfig } from '@/ai/config';
import { PageRunFailedError } from '@/ai/page-translation/errors';
import { CliUsageError, parseCliArgs, USAGE, type CliArgs } from '@/cli/args';
import { translateDocumentFile } from '@/index';
import { createPageProgressStore, type PageProgressStoreApi } from '@/stores/pageProgressStore';
import { BoxDiagnosticsSink, type DiagnosticsSink } from '@/utils/diagnostics';

/**
 * 페이지가 끝날 때마다 한 줄씩 진행 상황 출력
 */
function reportProgress(store: PageProgressStoreApi, sink: DiagnosticsSink): () => void {
  return store.subscribe((state, previous) => {
    for (const page of Object.values(state.pages)) {
      const before = previous.pages[page.pageNumber];
      if (before?.status === page.status) continue;
      if (page.status === 'done' || page.status === 'error' || page.status === 'skipped') {
        const label = page.status === 'error' ? `failed (${page.errorKind ?? 'unknown'})` : page.status;
        sink.info(
          `[${state.getCompletedCount()}/${state.getTotalCount()}] page ${page.pageNumber} ${label}`
        );
      }
    }
  });
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config: PipelineConfig = {
    ...getPipelineConfig(),
    ...(args.concurrency !== undefined ? { concurrency: args.concurrency } : {}),
    ...(args.failFast ? { failFast: true } : {}),
  };
  const sink = new BoxDiagnosticsSink({
    dir: config.diagnosticsDir,
    boxWidth: config.boxWidth,
    logFileName: 'page_translation',
  });
  const store = createPageProgressStore();
  const unsubscribe = reportProgress(store, sink);

  try {
    const report = await translateDocumentFile({
      inputPath: args.inputPath,
      outputPath: args.outputPath,
      sourceLanguage: args.sourceLanguage,
      targetLanguage: args.targetLanguage,
      config,
      sink,
      store,
    });

    if (report.failed.length > 0) {
      sink.error(
        `${report.failed.length} of ${report.totalPages} page(s) failed and kept their original text: ${report.failed
          .map((f) => f.pageNumber)
          .join(', ')}`
      );
      return 1;
    }
    sink.info(`All ${report.totalPages} page(s) translated -> ${report.outputPath}`);
    return 0;
  } catch (error) {
    if (error instanceof PageRunFailedError) {
      sink.error(`${error.message}\nNothing was saved.`);
      return 1;
    }
    sink.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    unsubscribe();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
