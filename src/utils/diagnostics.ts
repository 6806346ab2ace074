/**
 * 진단 로그 싱크
 *
 * 페이지/단계별로 메시지를 그룹에 모았다가 박스 형태로 한 번에 출력합니다.
 * 콘솔에는 ANSI 색상, 파일에는 색상 없이 기록하고,
 * 요청/응답 JSON은 artifacts 디렉터리에 별도 파일로 남깁니다.
 *
 * 전역 싱글톤이 아니라 실행(run)마다 만들어 파이프라인에 주입합니다.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export type BoxColor = 'yellow' | 'green' | 'blue' | 'red' | 'magenta' | 'purple';

export interface FlushOptions {
  color?: BoxColor | undefined;
  /** 박스 위에 표시할 제목 (기본값: 그룹 이름) */
  title?: string | undefined;
}

export interface DiagnosticsSink {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** 그룹에 메시지 추가 (flushGroup 전까지 출력하지 않음) */
  addMessage(group: string, message: string): void;
  /** 그룹 메시지를 박스로 출력하고 그룹을 비움 */
  flushGroup(group: string, options?: FlushOptions): void;
  /** JSON 산출물 저장 (예: page_data_json_3_data.json) */
  writeArtifact(name: string, data: unknown): Promise<void>;
}

// ============================================
// Box rendering
// ============================================

const ANSI_COLORS: Record<BoxColor, string> = {
  yellow: '\x1b[93m',
  green: '\x1b[92m',
  blue: '\x1b[94m',
  red: '\x1b[91m',
  magenta: '\x1b[95m',
  purple: '\x1b[35m',
};
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

export const MIN_BOX_WIDTH = 60;
// 테두리와 여백을 빼고 한 글자 이상 남는 폭
const MIN_TERMINAL_BOX_WIDTH = 10;

/**
 * 60 이상으로 지정된 폭은 그대로, 아니면 터미널 폭 (알 수 없으면 80)
 */
export function resolveBoxWidth(forced: number, terminalColumns: number | undefined): number {
  if (forced >= MIN_BOX_WIDTH) return forced;
  return Math.max(terminalColumns ?? 80, MIN_TERMINAL_BOX_WIDTH);
}

/**
 * 메시지 목록을 박스 문자열 줄로 변환
 * - 메시지 내 줄바꿈은 각각의 줄로 분리
 * - (width - 4)보다 긴 줄은 잘라서 다음 줄로 넘김
 */
export function renderBox(messages: string[], width: number): string[] {
  const inner = width - 4;
  const lines: string[] = [];

  for (const message of messages) {
    for (const line of message.split('\n')) {
      if (line.length === 0) {
        lines.push('');
        continue;
      }
      for (let i = 0; i < line.length; i += inner) {
        lines.push(line.slice(i, i + inner));
      }
    }
  }

  return [
    `╔${'═'.repeat(width - 2)}╗`,
    ...lines.map((line) => `║ ${line.padEnd(inner)} ║`),
    `╚${'═'.repeat(width - 2)}╝`,
  ];
}

function pickColor(group: string): BoxColor {
  const colors: BoxColor[] = ['yellow', 'green', 'blue', 'red', 'magenta', 'purple'];
  let sum = 0;
  for (let i = 0; i < group.length; i++) {
    sum += group.charCodeAt(i);
  }
  return colors[sum % colors.length] ?? 'blue';
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}

// ============================================
// Grouping base
// ============================================

abstract class GroupingSink implements DiagnosticsSink {
  private readonly groups = new Map<string, string[]>();

  abstract info(message: string): void;
  abstract warn(message: string): void;
  abstract error(message: string): void;
  abstract writeArtifact(name: string, data: unknown): Promise<void>;
  protected abstract emitBox(title: string, messages: string[], color: BoxColor): void;

  addMessage(group: string, message: string): void {
    const existing = this.groups.get(group);
    if (existing) {
      existing.push(message);
    } else {
      this.groups.set(group, [message]);
    }
  }

  flushGroup(group: string, options?: FlushOptions): void {
    const messages = this.groups.get(group);
    if (!messages) {
      this.warn(`No messages found for group: ${group}`);
      return;
    }
    this.groups.delete(group);
    this.emitBox(options?.title ?? group, messages, options?.color ?? pickColor(group));
  }
}

// ============================================
// Console + file sink
// ============================================

export interface BoxDiagnosticsSinkOptions {
  dir: string;
  logFileName?: string | undefined;
  /** 60 이상이면 이 폭으로 고정, 아니면 터미널 폭 */
  boxWidth?: number | undefined;
  /** 터미널 폭 (기본값: process.stdout.columns, 알 수 없으면 80) */
  terminalColumns?: number | undefined;
  consoleLogging?: boolean | undefined;
  fileLogging?: boolean | undefined;
  /** 콘솔 출력 대상 (기본값: process.stdout) */
  write?: ((text: string) => void) | undefined;
}

export class BoxDiagnosticsSink extends GroupingSink {
  private readonly dir: string;
  private readonly boxWidth: number;
  private readonly consoleLogging: boolean;
  private readonly logFilePath: string | null;
  private readonly write: (text: string) => void;

  constructor(options: BoxDiagnosticsSinkOptions) {
    super();
    this.dir = options.dir;
    this.boxWidth = resolveBoxWidth(options.boxWidth ?? 80, options.terminalColumns ?? process.stdout.columns);
    this.consoleLogging = options.consoleLogging ?? true;
    this.write = options.write ?? ((text) => process.stdout.write(text));

    if (options.fileLogging ?? true) {
      mkdirSync(this.dir, { recursive: true });
      const now = new Date();
      this.logFilePath = join(this.dir, `${options.logFileName ?? 'debug_logs'}_${formatTimestamp(now)}.log`);
      appendFileSync(this.logFilePath, `Log started at: ${now.toISOString()}\n${'='.repeat(50)}\n`);
    } else {
      this.logFilePath = null;
    }
  }

  info(message: string): void {
    this.emitLine(message);
  }

  warn(message: string): void {
    this.emitLine(`[warn] ${message}`);
  }

  error(message: string): void {
    this.emitLine(`[error] ${message}`);
  }

  async writeArtifact(name: string, data: unknown): Promise<void> {
    const artifactDir = join(this.dir, 'artifacts');
    await mkdir(artifactDir, { recursive: true });
    const body = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
    await writeFile(join(artifactDir, name), body, 'utf-8');
  }

  protected emitBox(title: string, messages: string[], color: BoxColor): void {
    const box = renderBox(messages, this.boxWidth);

    if (this.consoleLogging) {
      const colorCode = ANSI_COLORS[color];
      this.write(
        `${BOLD}${title}${RESET}\n${box.map((line) => `${colorCode}${line}${RESET}`).join('\n')}\n`
      );
    }
    if (this.logFilePath) {
      appendFileSync(this.logFilePath, `${title}\n${box.join('\n')}\n`);
    }
  }

  private emitLine(message: string): void {
    if (this.consoleLogging) {
      this.write(`${message}\n`);
    }
    if (this.logFilePath) {
      appendFileSync(this.logFilePath, `${message}\n`);
    }
  }
}

// ============================================
// In-memory sink
// ============================================

export interface RecordedBox {
  title: string;
  messages: string[];
  color: BoxColor;
}

export class MemoryDiagnosticsSink extends GroupingSink {
  readonly lines: Array<{ level: 'info' | 'warn' | 'error'; message: string }> = [];
  readonly boxes: RecordedBox[] = [];
  readonly artifacts = new Map<string, unknown>();

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  async writeArtifact(name: string, data: unknown): Promise<void> {
    this.artifacts.set(name, data);
  }

  protected emitBox(title: string, messages: string[], color: BoxColor): void {
    this.boxes.push({ title, messages: [...messages], color });
  }
}
