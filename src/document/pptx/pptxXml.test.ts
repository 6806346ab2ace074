import { describe, it, expect } from 'vitest';
import {
  encodeUtf8,
  escapeXml,
  extractParagraphTexts,
  extractRunTexts,
  replaceRunTexts,
  resolveSlideOrder,
  unescapeXml,
} from './pptxXml';

const SLIDE_XML = [
  '<p:sld><p:cSld><p:spTree><p:sp><p:txBody>',
  '<a:p><a:pPr algn="l"/><a:r><a:rPr lang="de-DE"/><a:t>Hallo </a:t></a:r><a:r><a:t>Welt</a:t></a:r></a:p>',
  '<a:p/>',
  '<a:p><a:r><a:t xml:space="preserve">Tom &amp; Jerry</a:t></a:r></a:p>',
  '<a:p><a:r><a:t>   </a:t></a:r></a:p>',
  '</p:txBody></p:sp></p:spTree></p:cSld></p:sld>',
].join('');

describe('extractRunTexts', () => {
  it('모든 <a:t> run을 순서대로 추출하고 엔티티를 복원한다', () => {
    expect(extractRunTexts(SLIDE_XML)).toEqual(['Hallo ', 'Welt', 'Tom & Jerry', '   ']);
  });
});

describe('extractParagraphTexts', () => {
  it('문단별로 run을 합치고 빈 문단은 제외한다', () => {
    expect(extractParagraphTexts(SLIDE_XML)).toEqual(['Hallo Welt', 'Tom & Jerry']);
  });

  it('self-closing <a:p/>가 다음 문단을 삼키지 않는다', () => {
    const xml = '<a:p/><a:p><a:r><a:t>one</a:t></a:r></a:p>';
    expect(extractParagraphTexts(xml)).toEqual(['one']);
  });
});

describe('replaceRunTexts', () => {
  it('i번째 run의 내용을 교체하고 속성을 유지한다', () => {
    const replaced = replaceRunTexts(SLIDE_XML, ['Hello ', 'World', 'Tom < Jerry', '   ']);

    expect(replaced).toContain('<a:r><a:rPr lang="de-DE"/><a:t>Hello </a:t></a:r><a:r><a:t>World</a:t></a:r>');
    expect(replaced).toContain('<a:t xml:space="preserve">Tom &lt; Jerry</a:t>');
    expect(extractRunTexts(replaced)).toEqual(['Hello ', 'World', 'Tom < Jerry', '   ']);
  });

  it('run 개수가 다르면 에러', () => {
    expect(() => replaceRunTexts(SLIDE_XML, ['only one'])).toThrow(
      'Run count mismatch: slide has 4 run(s), got 1 text(s)'
    );
  });
});

describe('escapeXml / unescapeXml', () => {
  it('특수 문자를 왕복 변환한다', () => {
    const text = `a & b < c > d "e" 'f'`;
    expect(escapeXml(text)).toBe('a &amp; b &lt; c &gt; d &quot;e&quot; &apos;f&apos;');
    expect(unescapeXml(escapeXml(text))).toBe(text);
  });

  it('숫자 문자 참조를 복원한다', () => {
    expect(unescapeXml('caf&#233; &#x2014;')).toBe('café —');
  });

  it('&amp;lt; 는 한 번만 복원한다', () => {
    expect(unescapeXml('&amp;lt;')).toBe('&lt;');
  });
});

describe('resolveSlideOrder', () => {
  it('presentation.xml의 sldIdLst 순서를 따른다', () => {
    const files: Record<string, Uint8Array> = {
      'ppt/presentation.xml': encodeUtf8(
        '<p:presentation><p:sldIdLst><p:sldId id="256" r:id="rId3"/><p:sldId id="257" r:id="rId2"/></p:sldIdLst></p:presentation>'
      ),
      'ppt/_rels/presentation.xml.rels': encodeUtf8(
        '<Relationships><Relationship Id="rId2" Type="slide" Target="slides/slide1.xml"/><Relationship Id="rId3" Type="slide" Target="slides/slide2.xml"/></Relationships>'
      ),
      'ppt/slides/slide1.xml': encodeUtf8('<p:sld/>'),
      'ppt/slides/slide2.xml': encodeUtf8('<p:sld/>'),
    };

    expect(resolveSlideOrder(files)).toEqual(['ppt/slides/slide2.xml', 'ppt/slides/slide1.xml']);
  });

  it('presentation.xml이 없으면 파일 번호 순서로 정렬한다', () => {
    const files: Record<string, Uint8Array> = {
      'ppt/slides/slide10.xml': encodeUtf8('<p:sld/>'),
      'ppt/slides/slide2.xml': encodeUtf8('<p:sld/>'),
      'ppt/slides/_rels/slide2.xml.rels': encodeUtf8('<Relationships/>'),
    };

    expect(resolveSlideOrder(files)).toEqual(['ppt/slides/slide2.xml', 'ppt/slides/slide10.xml']);
  });
});
