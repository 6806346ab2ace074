import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from './args';

describe('parseCliArgs', () => {
  it('위치 인자와 옵션을 읽는다', () => {
    expect(
      parseCliArgs(['in.pptx', 'out.pptx', '--from', 'German', '--to=English', '--concurrency', '4', '--fail-fast'])
    ).toEqual({
      inputPath: 'in.pptx',
      outputPath: 'out.pptx',
      sourceLanguage: 'German',
      targetLanguage: 'English',
      concurrency: 4,
      failFast: true,
      help: false,
    });
  });

  it('concurrency를 주지 않으면 undefined', () => {
    const args = parseCliArgs(['a.pptx', 'b.pptx', '--from', 'de', '--to', 'en']);
    expect(args.concurrency).toBeUndefined();
    expect(args.failFast).toBe(false);
  });

  it('--help는 다른 필수 인자 없이 통과한다', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it.each([
    [['a.pptx', '--from', 'de', '--to', 'en'], 'Input and output paths are required'],
    [['a.pptx', 'b.pptx', '--to', 'en'], 'Both --from and --to are required'],
    [['a.pptx', 'b.pptx', '--from', '--to', 'en'], 'Missing value for --from'],
    [['a.pptx', 'b.pptx', '--from', 'de', '--to', 'en', '--concurrency=-1'], '--concurrency must be a non-negative integer, got "-1"'],
    [['a.pptx', 'b.pptx', '--from', 'de', '--to', 'en', '--verbose'], 'Unknown option: --verbose'],
    [['a.pptx', 'a.pptx', '--from', 'de', '--to', 'en'], 'Output path must differ from the input path'],
  ])('잘못된 인자 %j → %s', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(CliUsageError);
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});
