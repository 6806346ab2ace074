import { createStore } from 'zustand/vanilla';
import type { PageErrorKind } from '@/ai/page-translation/errors';
import type { PageStage } from '@/ai/page-translation/types';

// ============================================
// Types
// ============================================

export type PageStatus = 'pending' | 'running' | 'done' | 'error' | 'skipped';

export interface PageProgress {
  pageNumber: number;
  status: PageStatus;
  stage?: PageStage | undefined;
  /** 정렬 요청 시도 횟수 */
  attempts: number;
  errorKind?: PageErrorKind | undefined;
  error?: string | undefined;
  startedAt?: number | undefined;
  finishedAt?: number | undefined;
}

interface PageProgressState {
  pages: Record<number, PageProgress>;
  saved: boolean;
}

interface PageProgressActions {
  initPages: (pageCount: number) => void;
  markStarted: (pageNumber: number) => void;
  setStage: (pageNumber: number, stage: PageStage) => void;
  recordAttempt: (pageNumber: number, attempt: number) => void;
  markDone: (pageNumber: number) => void;
  markFailed: (pageNumber: number, kind: PageErrorKind, error: string) => void;
  markSkipped: (pageNumber: number) => void;
  markSaved: () => void;

  // 헬퍼 셀렉터
  getCompletedCount: () => number;
  getTotalCount: () => number;
  getProgress: () => number;
}

export type PageProgressStore = PageProgressState & PageProgressActions;

// ============================================
// Initial State
// ============================================

const initialState: PageProgressState = {
  pages: {},
  saved: false,
};

// ============================================
// Store Implementation
// ============================================

/**
 * 실행(run)마다 새 스토어를 만든다 (페이지 번호 → 진행 상태)
 */
export function createPageProgressStore() {
  return createStore<PageProgressStore>((set, get) => {
    const updatePage = (pageNumber: number, patch: Partial<PageProgress>) => {
      set((state) => {
        const current = state.pages[pageNumber] ?? { pageNumber, status: 'pending', attempts: 0 };
        return { pages: { ...state.pages, [pageNumber]: { ...current, ...patch } } };
      });
    };

    return {
      ...initialState,

      initPages: (pageCount: number) => {
        const pages: Record<number, PageProgress> = {};
        for (let n = 1; n <= pageCount; n++) {
          pages[n] = { pageNumber: n, status: 'pending', attempts: 0 };
        }
        set({ pages, saved: false });
      },

      markStarted: (pageNumber: number) => {
        updatePage(pageNumber, { status: 'running', startedAt: Date.now() });
      },

      setStage: (pageNumber: number, stage: PageStage) => {
        updatePage(pageNumber, { stage });
      },

      recordAttempt: (pageNumber: number, attempt: number) => {
        updatePage(pageNumber, { attempts: attempt });
      },

      markDone: (pageNumber: number) => {
        updatePage(pageNumber, { status: 'done', finishedAt: Date.now() });
      },

      markFailed: (pageNumber: number, kind: PageErrorKind, error: string) => {
        updatePage(pageNumber, { status: 'error', errorKind: kind, error, finishedAt: Date.now() });
      },

      markSkipped: (pageNumber: number) => {
        updatePage(pageNumber, { status: 'skipped', finishedAt: Date.now() });
      },

      markSaved: () => {
        set({ saved: true });
      },

      getCompletedCount: () => {
        return Object.values(get().pages).filter(
          (page) => page.status === 'done' || page.status === 'error' || page.status === 'skipped'
        ).length;
      },

      getTotalCount: () => {
        return Object.keys(get().pages).length;
      },

      getProgress: () => {
        const total = get().getTotalCount();
        if (total === 0) return 0;
        return Math.round((get().getCompletedCount() / total) * 100);
      },
    };
  });
}

export type PageProgressStoreApi = ReturnType<typeof createPageProgressStore>;
