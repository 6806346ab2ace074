import { describe, it, expect } from 'vitest';
import { MemoryDiagnosticsSink } from '@/utils/diagnostics';
import { buildAndPersistRequest, buildTranslationRequest, requestArtifactName } from './requestBuilder';

describe('buildTranslationRequest', () => {
  it('조각 순서와 개수를 유지하고 번역 칸은 비워둔다', () => {
    const request = buildTranslationRequest(3, 'Hallo Welt', 'Hello world', [
      { index: 0, text: 'Hallo' },
      { index: 1, text: '' },
      { index: 2, text: 'Welt' },
    ]);

    expect(request).toEqual({
      page_number: 3,
      page_context: { original: 'Hallo Welt', translated: 'Hello world' },
      text_fragments: [
        { fragment_index: 0, original_text_fragment: 'Hallo', translated_text_fragment: '' },
        { fragment_index: 1, original_text_fragment: '', translated_text_fragment: '' },
        { fragment_index: 2, original_text_fragment: 'Welt', translated_text_fragment: '' },
      ],
    });
  });

  it('조각이 없으면 빈 목록', () => {
    expect(buildTranslationRequest(1, '', '', []).text_fragments).toEqual([]);
  });
});

describe('buildAndPersistRequest', () => {
  it('요청을 page_data_json_<n>_data.json 산출물로 저장한다', async () => {
    const sink = new MemoryDiagnosticsSink();

    const request = await buildAndPersistRequest(sink, 7, 'a', 'b', [{ index: 0, text: 'a' }]);

    expect(requestArtifactName(7)).toBe('page_data_json_7_data.json');
    expect(sink.artifacts.get('page_data_json_7_data.json')).toBe(request);
  });
});
